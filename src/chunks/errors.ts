import { ChunkOutcome, CoordinatorPhase } from '../constants';

export type ChunkingErrorKind =
    | 'buffer_state'
    | 'validation'
    | 'asynchronous_failure'
    | 'timeout'
    | 'send_failure';

/**
 * Base class for every fatal condition raised by the coordinator. The
 * `kind` discriminant lets the step lifecycle branch without string
 * matching on messages.
 */
export abstract class ChunkingError extends Error {
    abstract readonly kind: ChunkingErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class BufferStateError extends ChunkingError {
    readonly kind = 'buffer_state' as const;

    constructor(
        readonly transactionId: string | undefined,
        message: string,
    ) {
        super(message);
    }
}

export class ChunkResponseValidationError extends ChunkingError {
    readonly kind = 'validation' as const;

    constructor(
        readonly expectedJobId: number | null,
        readonly receivedJobId: number | null,
    ) {
        super(
            receivedJobId === null
                ? 'Message did not contain job instance id.'
                : `Message contained wrong job instance id [${receivedJobId}] ` +
                `should have been [${expectedJobId}].`,
        );
    }
}

export class AsynchronousFailureError extends ChunkingError {
    readonly kind = 'asynchronous_failure' as const;

    constructor(
        readonly jobId: number,
        readonly outcome: ChunkOutcome,
        readonly workerDescription?: string,
    ) {
        super(
            `Failure or early completion detected in handler: ${outcome}` +
            (workerDescription ? ` (${workerDescription})` : ''),
        );
    }
}

export class DrainTimeoutError extends ChunkingError {
    readonly kind = 'timeout' as const;

    constructor(
        readonly jobId: number | null,
        readonly outstanding: number,
        readonly phase: Extract<CoordinatorPhase, 'init' | 'draining'>,
    ) {
        super(
            phase === 'init'
                ? `Timed out waiting for back log on open: ${outstanding} outstanding`
                : `Timed out waiting for back log at end of step: ${outstanding} outstanding`,
        );
    }
}

export class ChunkSendError extends ChunkingError {
    readonly kind = 'send_failure' as const;

    constructor(
        readonly jobId: number | null,
        readonly itemCount: number,
        cause: unknown,
    ) {
        super(
            `failed to send chunk of ${itemCount} items: ` +
            (cause instanceof Error ? cause.message : String(cause)),
            { cause },
        );
    }
}

export function isChunkingError(error: unknown): error is ChunkingError {
    return error instanceof ChunkingError;
}
