import { Pool } from 'pg';
import { z } from 'zod';
import {
    CHECKPOINT_ACTUAL_KEY,
    CHECKPOINT_EXPECTED_KEY,
} from '../constants';
import { ProgressCheckpoint } from '../progress/progress-state';
import {
    CheckpointStore,
    checkpointFromState,
    parseStepCheckpointState,
    stateFromCheckpoint,
} from './checkpoint-store';

export interface PostgresCheckpointStoreOptions {
    pool?: Pool;
    schemaName?: string;
    tableName?: string;
    storeKey: string;
}

const DEFAULT_SCHEMA_NAME = 'remote_chunking';
const DEFAULT_TABLE_NAME = 'step_checkpoints';

// pg hands BIGINT back as a string; pg-mem as a number.
const StoredCounterSchema = z
    .union([
        z.number(),
        z.string().regex(/^\d+$/).transform(Number),
    ])
    .nullable();

const CheckpointRowSchema = z.object({
    expected: StoredCounterSchema,
    actual: StoredCounterSchema,
});

function validateSqlIdentifier(
    value: string,
    fieldName: string,
): string {
    const trimmed = value.trim();

    if (trimmed.length === 0) {
        throw new Error(`${fieldName} is required`);
    }

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(trimmed)) {
        throw new Error(
            `${fieldName} must match [A-Za-z_][A-Za-z0-9_]*`,
        );
    }

    return trimmed;
}

function parseCheckpointRow(raw: unknown): ProgressCheckpoint | null {
    const parsed = CheckpointRowSchema.safeParse(raw);

    if (!parsed.success) {
        throw new Error(
            'invalid persisted checkpoint row: ' +
            (parsed.error.issues[0]?.message || 'unknown issue'),
        );
    }

    return checkpointFromState(parseStepCheckpointState({
        [CHECKPOINT_EXPECTED_KEY]: parsed.data.expected ?? undefined,
        [CHECKPOINT_ACTUAL_KEY]: parsed.data.actual ?? undefined,
    }));
}

/**
 * One row per step key holding the EXPECTED/ACTUAL pair. Both columns are
 * written by a single upsert, and every read goes to the table so a
 * checkpoint taken by another process is seen.
 */
export class PostgresCheckpointStore implements CheckpointStore {
    private readonly ownsPool: boolean;

    private readonly pool: Pool;

    private readonly ready: Promise<void>;

    private readonly storeKey: string;

    private readonly tableQualified: string;

    constructor(
        pgUrl: string,
        options: PostgresCheckpointStoreOptions,
    ) {
        const schemaName = validateSqlIdentifier(
            options.schemaName || DEFAULT_SCHEMA_NAME,
            'checkpoint schema name',
        );
        const tableName = validateSqlIdentifier(
            options.tableName || DEFAULT_TABLE_NAME,
            'checkpoint table name',
        );

        this.storeKey = options.storeKey.trim();

        if (this.storeKey.length === 0) {
            throw new Error('checkpoint store key is required');
        }

        this.tableQualified = `"${schemaName}"."${tableName}"`;

        if (options.pool) {
            this.pool = options.pool;
            this.ownsPool = false;
        } else {
            const connectionString = pgUrl.trim();

            if (connectionString.length === 0) {
                throw new Error('CHUNK_CHECKPOINT_PG_URL is required');
            }

            this.pool = new Pool({
                allowExitOnIdle: true,
                connectionString,
            });
            this.ownsPool = true;
        }

        this.ready = this.pool
            .query(
                `CREATE TABLE IF NOT EXISTS ${this.tableQualified} (
                    store_key TEXT PRIMARY KEY,
                    expected BIGINT,
                    actual BIGINT,
                    updated_at TIMESTAMPTZ
                )`,
            )
            .then(() => undefined);
        // Surfaced again by read/write; keeps an early failure from being
        // reported as an unhandled rejection.
        this.ready.catch(() => undefined);
    }

    async read(): Promise<ProgressCheckpoint | null> {
        await this.ready;

        const result = await this.pool.query(
            `SELECT expected, actual
            FROM ${this.tableQualified}
            WHERE store_key = $1`,
            [
                this.storeKey,
            ],
        );

        if (result.rows.length === 0) {
            return null;
        }

        return parseCheckpointRow(result.rows[0]);
    }

    async write(checkpoint: ProgressCheckpoint): Promise<void> {
        const state = stateFromCheckpoint(checkpoint);

        await this.ready;

        const client = await this.pool.connect();

        try {
            await client.query('BEGIN');
            await client.query(
                `INSERT INTO ${this.tableQualified} (
                    store_key,
                    expected,
                    actual,
                    updated_at
                ) VALUES (
                    $1,
                    $2::bigint,
                    $3::bigint,
                    now()
                )
                ON CONFLICT (store_key) DO UPDATE SET
                    expected = EXCLUDED.expected,
                    actual = EXCLUDED.actual,
                    updated_at = EXCLUDED.updated_at`,
                [
                    this.storeKey,
                    state[CHECKPOINT_EXPECTED_KEY],
                    state[CHECKPOINT_ACTUAL_KEY],
                ],
            );
            await client.query('COMMIT');
        } catch (error) {
            await client.query('ROLLBACK');
            throw error;
        } finally {
            client.release();
        }
    }

    async close(): Promise<void> {
        if (!this.ownsPool) {
            return;
        }

        await this.pool.end();
    }
}
