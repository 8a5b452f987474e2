import { InboundReplyChannel } from '../channels/types';
import { ChunkingLogger, silentChunkingLogger } from '../logger';
import { ProgressState } from '../progress/progress-state';
import {
    AsynchronousFailureError,
    ChunkResponseValidationError,
} from './errors';
import { isContinuable } from './models';

export interface DrainResult {
    drained: boolean;
    attempts: number;
    outstanding: number;
}

/**
 * Sole reader of the reply channel. Applies replies to the progress
 * counters and implements both the unbounded throttle wait and the
 * bounded drain.
 */
export class ReplyDrain {
    constructor(
        private readonly inbound: InboundReplyChannel,
        private readonly progress: ProgressState,
        private readonly logger: ChunkingLogger = silentChunkingLogger,
    ) {}

    /**
     * Receives at most one reply. Returns true when a reply was applied.
     * Throws on a reply for another job and on any non-continuable
     * outcome.
     */
    async pollOnce(timeoutMs: number): Promise<boolean> {
        const response = await this.inbound.receive(timeoutMs);

        if (!response) {
            return false;
        }

        const jobId = this.progress.jobId;

        if (
            response.jobId === null ||
            jobId === null ||
            response.jobId !== jobId
        ) {
            throw new ChunkResponseValidationError(
                jobId,
                response.jobId,
            );
        }

        const counted = this.progress.recordResponse();

        if (counted) {
            this.logger.debug('chunk reply applied', {
                job_id: jobId,
                outcome: response.outcome,
                expected: this.progress.expected,
                actual: this.progress.actual,
            });
        } else {
            this.logger.warn('chunk reply received with nothing outstanding', {
                job_id: jobId,
                outcome: response.outcome,
                expected: this.progress.expected,
            });
        }

        if (!isContinuable(response)) {
            throw new AsynchronousFailureError(
                jobId,
                response.outcome,
                response.description,
            );
        }

        return true;
    }

    async throttleWait(
        maxOutstanding: number,
        pollIntervalMs: number,
    ): Promise<void> {
        while (this.progress.outstanding > maxOutstanding) {
            await this.pollOnce(pollIntervalMs);
        }
    }

    async drain(
        maxAttempts: number,
        pollTimeoutMs: number,
    ): Promise<DrainResult> {
        let attempts = 0;

        while (this.progress.outstanding > 0 && attempts < maxAttempts) {
            attempts += 1;
            await this.pollOnce(pollTimeoutMs);
        }

        return {
            drained: this.progress.outstanding === 0,
            attempts,
            outstanding: this.progress.outstanding,
        };
    }
}
