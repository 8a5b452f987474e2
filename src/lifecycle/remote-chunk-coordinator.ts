import { TransactionalItemBuffer } from '../buffer/transactional-item-buffer';
import { InboundReplyChannel, OutboundChunkChannel } from '../channels/types';
import {
    CheckpointStore,
    InMemoryCheckpointStore,
} from '../checkpoint/checkpoint-store';
import { ChunkDispatcher, FlushResult } from '../chunks/chunk-dispatcher';
import {
    BufferStateError,
    ChunkingError,
    DrainTimeoutError,
    isChunkingError,
} from '../chunks/errors';
import { ReplyDrain } from '../chunks/reply-drain';
import { CoordinatorPhase, StepStatus } from '../constants';
import { CoordinatorConfig, createCoordinatorConfig } from '../env';
import { ChunkingLogger, consoleChunkingLogger } from '../logger';
import { ProgressSnapshot, ProgressState } from '../progress/progress-state';

export type StepOutcome =
    | {
        status: 'continue';
    }
    | {
        status: 'finished';
        description: string;
        waitedFor: number;
    }
    | {
        status: 'failed';
        description: string;
        error: ChunkingError;
    };

export interface StepLifecycle {
    onStepStart(jobId: number, skipCount: number): Promise<void>;
    onStepEnd(status: StepStatus): Promise<StepOutcome>;
}

export interface RemoteChunkCoordinatorOptions {
    config?: Partial<CoordinatorConfig>;
    checkpoints?: CheckpointStore;
    logger?: ChunkingLogger;
}

function describeError(error: Error): string {
    return `${error.name}: ${error.message}`;
}

/**
 * Producer side of remote chunking for one step attempt: buffers items
 * per transaction, ships them as chunks, throttles on unacknowledged
 * chunks and turns the end-of-step drain into a step outcome.
 */
export class RemoteChunkCoordinator<T> implements StepLifecycle {
    private readonly config: CoordinatorConfig;

    private readonly checkpoints: CheckpointStore;

    private readonly logger: ChunkingLogger;

    private readonly progress = new ProgressState();

    private readonly buffer = new TransactionalItemBuffer<T>();

    private readonly replies: ReplyDrain;

    private readonly dispatcher: ChunkDispatcher<T>;

    private currentPhase: CoordinatorPhase = 'init';

    constructor(
        outbound: OutboundChunkChannel<T>,
        inbound: InboundReplyChannel,
        options: RemoteChunkCoordinatorOptions = {},
    ) {
        this.config = createCoordinatorConfig(options.config);
        this.checkpoints = options.checkpoints ?? new InMemoryCheckpointStore();
        this.logger = options.logger ?? consoleChunkingLogger;
        this.replies = new ReplyDrain(inbound, this.progress, this.logger);
        this.dispatcher = new ChunkDispatcher<T>(
            this.buffer,
            outbound,
            this.replies,
            this.progress,
            this.config,
            this.logger,
        );
    }

    get phase(): CoordinatorPhase {
        return this.currentPhase;
    }

    progressSnapshot(): ProgressSnapshot {
        return this.progress.snapshot();
    }

    /**
     * Binds the job identity, restores the persisted counters and, when a
     * previous attempt left chunks in flight, waits for them before any
     * new work is accepted.
     */
    async onStepStart(jobId: number, skipCount: number): Promise<void> {
        if (this.currentPhase !== 'init') {
            throw new Error(
                `step already started (phase ${this.currentPhase})`,
            );
        }

        this.progress.bindStep(jobId, skipCount);

        const checkpoint = await this.checkpoints.read();

        if (checkpoint) {
            this.progress.restore(checkpoint);
        }

        if (this.progress.outstanding === 0) {
            this.currentPhase = 'active';

            return;
        }

        this.logger.info('draining back log from previous attempt', {
            job_id: jobId,
            expected: this.progress.expected,
            actual: this.progress.actual,
        });

        try {
            const result = await this.replies.drain(
                this.config.drainMaxAttempts,
                this.config.pollIntervalMs,
            );

            if (!result.drained) {
                this.currentPhase = 'timed_out';
                this.logger.warn('timed out draining back log on open', {
                    job_id: jobId,
                    outstanding: result.outstanding,
                    attempts: result.attempts,
                });

                throw new DrainTimeoutError(jobId, result.outstanding, 'init');
            }
        } catch (error: unknown) {
            if (this.currentPhase !== 'timed_out') {
                this.currentPhase = 'failed';
            }

            throw error;
        }

        this.currentPhase = 'active';
    }

    write(transactionId: string, item: T): void {
        this.assertActive(transactionId);

        const size = this.buffer.write(transactionId, item);

        this.logger.debug('added item to chunk', {
            transaction_id: transactionId,
            buffered: size,
        });
    }

    async flush(transactionId: string): Promise<FlushResult<T>> {
        this.assertActive(transactionId);

        try {
            return await this.dispatcher.flush(transactionId);
        } catch (error: unknown) {
            this.currentPhase = 'failed';
            this.logger.warn('chunk flush failed', {
                transaction_id: transactionId,
                error_kind: isChunkingError(error) ? error.kind : 'unexpected',
                message: error instanceof Error ? error.message : String(error),
            });

            throw error;
        }
    }

    /**
     * Rollback hook: the transaction's buffered items are dropped without
     * being sent.
     */
    clear(transactionId: string): number {
        return this.buffer.clear(transactionId);
    }

    updateSkipCount(skipCount: number): void {
        this.progress.updateSkipCount(skipCount);
    }

    async checkpoint(): Promise<void> {
        await this.checkpoints.write(this.progress.toCheckpoint());
    }

    async onStepEnd(status: StepStatus): Promise<StepOutcome> {
        if (status !== 'completed') {
            return {
                status: 'continue',
            };
        }

        if (this.currentPhase !== 'active') {
            throw new Error(
                `step cannot finish from phase ${this.currentPhase}`,
            );
        }

        const jobId = this.progress.jobId;
        const waitedFor = this.progress.outstanding;

        this.currentPhase = 'draining';
        this.logger.info('waiting for results at end of step', {
            job_id: jobId,
            outstanding: waitedFor,
        });

        let drained: boolean;
        let remaining: number;

        try {
            const result = await this.replies.drain(
                this.config.drainMaxAttempts,
                this.config.pollIntervalMs,
            );

            drained = result.drained;
            remaining = result.outstanding;
        } catch (error: unknown) {
            this.currentPhase = 'failed';

            if (!isChunkingError(error)) {
                throw error;
            }

            this.logger.warn('detected failure waiting for results', {
                job_id: jobId,
                error_kind: error.kind,
                message: error.message,
            });

            return {
                status: 'failed',
                description: describeError(error),
                error,
            };
        }

        if (!drained) {
            const error = new DrainTimeoutError(jobId, remaining, 'draining');

            this.currentPhase = 'timed_out';
            this.logger.warn('timed out waiting for results', {
                job_id: jobId,
                outstanding: remaining,
            });

            return {
                status: 'failed',
                description: describeError(error),
                error,
            };
        }

        this.currentPhase = 'complete';
        this.logger.info('finished waiting for results', {
            job_id: jobId,
            waited_for: waitedFor,
        });

        return {
            status: 'finished',
            description: `Waited for ${waitedFor} results.`,
            waitedFor,
        };
    }

    /**
     * Ends the attempt: counters and open buffers are discarded so the
     * instance can start another attempt from `init`.
     */
    close(): void {
        const openTransactions = this.buffer.openTransactionCount;

        if (openTransactions > 0) {
            this.logger.warn('discarding open transactions on close', {
                job_id: this.progress.jobId,
                open_transactions: openTransactions,
            });
        }

        this.progress.reset();
        this.buffer.clearAll();
        this.currentPhase = 'init';
    }

    private assertActive(transactionId: string): void {
        if (this.currentPhase !== 'active') {
            throw new BufferStateError(
                transactionId,
                `items cannot be buffered in phase ${this.currentPhase}`,
            );
        }
    }
}
