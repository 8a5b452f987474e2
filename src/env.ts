import {
    DEFAULT_CHECKPOINT_STORE_KEY,
    DEFAULT_DRAIN_MAX_ATTEMPTS,
    DEFAULT_FLUSH_POLL_TIMEOUT_MS,
    DEFAULT_POLL_INTERVAL_MS,
    DEFAULT_THROTTLE_LIMIT,
} from './constants';

export interface CoordinatorConfig {
    throttleLimit: number;
    drainMaxAttempts: number;
    pollIntervalMs: number;
    flushPollTimeoutMs: number;
}

export interface ChunkingEnv extends CoordinatorConfig {
    checkpointPgUrl?: string;
    checkpointStoreKey: string;
}

export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = {
    throttleLimit: DEFAULT_THROTTLE_LIMIT,
    drainMaxAttempts: DEFAULT_DRAIN_MAX_ATTEMPTS,
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    flushPollTimeoutMs: DEFAULT_FLUSH_POLL_TIMEOUT_MS,
};

function parseNonNegativeInteger(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    if (!raw || raw.trim() === '') {
        return defaultValue;
    }

    const parsed = Number(raw);

    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new Error(`${fieldName} must be a non-negative integer`);
    }

    return parsed;
}

function parseStrictPositiveInteger(
    raw: string | undefined,
    fieldName: string,
    defaultValue: number,
): number {
    const parsed = parseNonNegativeInteger(raw, fieldName, defaultValue);

    if (parsed <= 0) {
        throw new Error(`${fieldName} must be greater than zero`);
    }

    return parsed;
}

function parseOptionalString(raw: string | undefined): string | undefined {
    if (!raw) {
        return undefined;
    }

    const trimmed = raw.trim();

    return trimmed ? trimmed : undefined;
}

function assertPositiveInteger(value: number, fieldName: string): void {
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${fieldName} must be a positive integer`);
    }
}

export function createCoordinatorConfig(
    overrides?: Partial<CoordinatorConfig>,
): CoordinatorConfig {
    const config: CoordinatorConfig = {
        ...DEFAULT_COORDINATOR_CONFIG,
        ...(overrides || {}),
    };

    assertPositiveInteger(config.throttleLimit, 'throttleLimit');
    assertPositiveInteger(config.drainMaxAttempts, 'drainMaxAttempts');
    assertPositiveInteger(config.pollIntervalMs, 'pollIntervalMs');

    if (
        !Number.isInteger(config.flushPollTimeoutMs) ||
        config.flushPollTimeoutMs < 0
    ) {
        throw new Error('flushPollTimeoutMs must be a non-negative integer');
    }

    return config;
}

export function parseChunkingEnv(
    env: NodeJS.ProcessEnv,
): ChunkingEnv {
    return {
        throttleLimit: parseStrictPositiveInteger(
            env.CHUNK_THROTTLE_LIMIT,
            'CHUNK_THROTTLE_LIMIT',
            DEFAULT_THROTTLE_LIMIT,
        ),
        drainMaxAttempts: parseStrictPositiveInteger(
            env.CHUNK_DRAIN_MAX_ATTEMPTS,
            'CHUNK_DRAIN_MAX_ATTEMPTS',
            DEFAULT_DRAIN_MAX_ATTEMPTS,
        ),
        pollIntervalMs: parseStrictPositiveInteger(
            env.CHUNK_POLL_INTERVAL_MS,
            'CHUNK_POLL_INTERVAL_MS',
            DEFAULT_POLL_INTERVAL_MS,
        ),
        flushPollTimeoutMs: parseNonNegativeInteger(
            env.CHUNK_FLUSH_POLL_TIMEOUT_MS,
            'CHUNK_FLUSH_POLL_TIMEOUT_MS',
            DEFAULT_FLUSH_POLL_TIMEOUT_MS,
        ),
        checkpointPgUrl: parseOptionalString(env.CHUNK_CHECKPOINT_PG_URL),
        checkpointStoreKey: parseOptionalString(
            env.CHUNK_CHECKPOINT_STORE_KEY,
        ) || DEFAULT_CHECKPOINT_STORE_KEY,
    };
}
