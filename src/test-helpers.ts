import { InMemoryChannel } from './channels/in-memory-channel';
import { OutboundChunkChannel } from './channels/types';
import { CheckpointStore } from './checkpoint/checkpoint-store';
import { ChunkOutcome } from './constants';
import { ChunkRequest, ChunkResponse } from './chunks/models';
import { CoordinatorConfig } from './env';
import { RemoteChunkCoordinator } from './lifecycle/remote-chunk-coordinator';
import { ChunkingLogger, LogFields } from './logger';

export const TEST_JOB_ID = 4201;

export const FAST_CONFIG: CoordinatorConfig = {
    throttleLimit: 6,
    drainMaxAttempts: 5,
    pollIntervalMs: 5,
    flushPollTimeoutMs: 1,
};

export interface RecordedLogEntry {
    level: 'debug' | 'info' | 'warn';
    message: string;
    fields: LogFields;
}

export class RecordingLogger implements ChunkingLogger {
    readonly entries: RecordedLogEntry[] = [];

    debug(message: string, fields?: LogFields): void {
        this.entries.push({ level: 'debug', message, fields: fields ?? {} });
    }

    info(message: string, fields?: LogFields): void {
        this.entries.push({ level: 'info', message, fields: fields ?? {} });
    }

    warn(message: string, fields?: LogFields): void {
        this.entries.push({ level: 'warn', message, fields: fields ?? {} });
    }

    messages(level: RecordedLogEntry['level']): string[] {
        return this.entries
            .filter((entry) => entry.level === level)
            .map((entry) => entry.message);
    }
}

export class RejectingOutboundChannel<T> implements OutboundChunkChannel<T> {
    attempts = 0;

    constructor(private readonly message = 'transport unavailable') {}

    async send(_request: ChunkRequest<T>): Promise<void> {
        this.attempts += 1;
        throw new Error(this.message);
    }
}

export function reply(
    outcome: ChunkOutcome = 'CONTINUABLE',
    jobId: number | null = TEST_JOB_ID,
): ChunkResponse {
    return {
        jobId,
        outcome,
    };
}

export interface CoordinatorFixture<T> {
    coordinator: RemoteChunkCoordinator<T>;
    requests: InMemoryChannel<ChunkRequest<T>>;
    replies: InMemoryChannel<ChunkResponse>;
    logger: RecordingLogger;
}

export function buildCoordinator<T>(
    config: Partial<CoordinatorConfig> = {},
    checkpoints?: CheckpointStore,
): CoordinatorFixture<T> {
    const requests = new InMemoryChannel<ChunkRequest<T>>('requests');
    const replies = new InMemoryChannel<ChunkResponse>('replies');
    const logger = new RecordingLogger();
    const coordinator = new RemoteChunkCoordinator<T>(requests, replies, {
        config: {
            ...FAST_CONFIG,
            ...config,
        },
        checkpoints,
        logger,
    });

    return {
        coordinator,
        requests,
        replies,
        logger,
    };
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(resolve, ms);
    });
}
