import { ChunkReplySink, ChunkRequestSource } from '../channels/types';
import { ChunkRequest, ChunkResponse } from '../chunks/models';
import { ChunkingLogger, silentChunkingLogger } from '../logger';

export type ChunkProcessor<T> = (
    items: readonly T[],
    request: ChunkRequest<T>,
) => void | Promise<void>;

export interface LocalChunkWorkerOptions {
    pollIntervalMs?: number;
    logger?: ChunkingLogger;
}

/**
 * Consumer side for in-process runs: takes chunk requests off a channel,
 * runs the processor over each chunk and answers with one reply per
 * chunk.
 */
export class LocalChunkWorker<T> {
    private running = false;

    private loop: Promise<void> | null = null;

    private processedChunks = 0;

    private failure: unknown = undefined;

    private readonly pollIntervalMs: number;

    private readonly logger: ChunkingLogger;

    constructor(
        private readonly requests: ChunkRequestSource<T>,
        private readonly replies: ChunkReplySink,
        private readonly processor: ChunkProcessor<T>,
        options: LocalChunkWorkerOptions = {},
    ) {
        this.pollIntervalMs = options.pollIntervalMs ?? 10;
        this.logger = options.logger ?? silentChunkingLogger;
    }

    get processed(): number {
        return this.processedChunks;
    }

    async handle(request: ChunkRequest<T>): Promise<ChunkResponse> {
        try {
            await this.processor(request.items, request);
        } catch (error: unknown) {
            const description = error instanceof Error
                ? error.message
                : String(error);

            this.logger.warn('chunk processing failed', {
                job_id: request.jobId,
                item_count: request.items.length,
                message: description,
            });

            return {
                jobId: request.jobId,
                outcome: 'FAILED',
                description,
            };
        }

        return {
            jobId: request.jobId,
            outcome: 'CONTINUABLE',
        };
    }

    async processNext(timeoutMs: number): Promise<boolean> {
        const request = await this.requests.receive(timeoutMs);

        if (!request) {
            return false;
        }

        const response = await this.handle(request);

        await this.replies.send(response);
        this.processedChunks += 1;

        return true;
    }

    /**
     * No-op while a loop exists, including one a pending `stop()` is still
     * waiting on.
     */
    start(): void {
        if (this.loop !== null) {
            return;
        }

        this.running = true;
        this.failure = undefined;
        this.loop = this.run().catch((error: unknown) => {
            this.running = false;
            this.failure = error;
            this.logger.warn('chunk worker stopped on error', {
                message: error instanceof Error ? error.message : String(error),
            });
        });
    }

    async stop(): Promise<void> {
        this.running = false;

        if (this.loop) {
            await this.loop;
            this.loop = null;
        }

        if (this.failure !== undefined) {
            const failure = this.failure;

            this.failure = undefined;
            throw failure;
        }
    }

    private async run(): Promise<void> {
        while (this.running) {
            await this.processNext(this.pollIntervalMs);
        }
    }
}
