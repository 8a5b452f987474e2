import { TransactionalItemBuffer } from '../buffer/transactional-item-buffer';
import { OutboundChunkChannel } from '../channels/types';
import { CoordinatorConfig } from '../env';
import { ChunkingLogger, silentChunkingLogger } from '../logger';
import { ProgressState } from '../progress/progress-state';
import { ChunkSendError } from './errors';
import { buildChunkRequest, ChunkRequest } from './models';
import { ReplyDrain } from './reply-drain';

export interface FlushResult<T> {
    dispatched: ChunkRequest<T> | null;
    expected: number;
    actual: number;
}

export class ChunkDispatcher<T> {
    constructor(
        private readonly buffer: TransactionalItemBuffer<T>,
        private readonly outbound: OutboundChunkChannel<T>,
        private readonly replies: ReplyDrain,
        private readonly progress: ProgressState,
        private readonly config: CoordinatorConfig,
        private readonly logger: ChunkingLogger = silentChunkingLogger,
    ) {}

    /**
     * Sends whatever the transaction has buffered as one chunk, waiting
     * first until the new chunk fits under the throttle limit. The
     * transaction's buffer is released whether or not dispatch succeeds.
     */
    async flush(transactionId: string | undefined): Promise<FlushResult<T>> {
        const items = this.buffer.ensure(transactionId);

        try {
            // Leave room for the chunk about to go out so that in-flight
            // never exceeds the limit.
            const maxOutstanding = items.length > 0
                ? this.config.throttleLimit - 1
                : this.config.throttleLimit;

            await this.replies.throttleWait(
                maxOutstanding,
                this.config.pollIntervalMs,
            );

            let dispatched: ChunkRequest<T> | null = null;

            if (items.length > 0) {
                dispatched = await this.dispatch(
                    this.buffer.detach(transactionId),
                );
            }

            await this.replies.pollOnce(this.config.flushPollTimeoutMs);

            return {
                dispatched,
                expected: this.progress.expected,
                actual: this.progress.actual,
            };
        } finally {
            this.buffer.release(transactionId);
        }
    }

    private async dispatch(items: T[]): Promise<ChunkRequest<T>> {
        const jobId = this.progress.jobId;

        if (jobId === null) {
            throw new Error('job identity must be bound before dispatch');
        }

        const request = buildChunkRequest(
            items,
            jobId,
            this.progress.skipCount,
        );

        this.logger.debug('dispatching chunk', {
            job_id: jobId,
            item_count: items.length,
            skip_count: request.skipCount,
        });

        try {
            await this.outbound.send(request);
        } catch (error: unknown) {
            throw new ChunkSendError(jobId, items.length, error);
        }

        this.progress.recordDispatch();

        return request;
    }
}
