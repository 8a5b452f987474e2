import { InMemoryChannel } from './channels/in-memory-channel';
import {
    DecodingReplyChannel,
    DecodingRequestSource,
    EncodingReplySink,
    EncodingRequestChannel,
} from './channels/json-payload-channels';
import { InboundReplyChannel, OutboundChunkChannel } from './channels/types';
import {
    CheckpointStore,
    InMemoryCheckpointStore,
} from './checkpoint/checkpoint-store';
import { PostgresCheckpointStore } from './checkpoint/postgres-checkpoint-store';
import { ChunkingEnv, parseChunkingEnv } from './env';
import { RemoteChunkCoordinator } from './lifecycle/remote-chunk-coordinator';
import { ChunkingLogger, consoleChunkingLogger } from './logger';
import { LocalChunkWorker } from './worker/local-chunk-worker';

export * from './constants';
export * from './env';
export * from './logger';
export * from './chunks/errors';
export * from './chunks/models';
export * from './chunks/reply-drain';
export * from './chunks/chunk-dispatcher';
export * from './buffer/transactional-item-buffer';
export * from './progress/progress-state';
export * from './channels/types';
export * from './channels/in-memory-channel';
export * from './channels/json-payload-channels';
export * from './checkpoint/checkpoint-store';
export * from './checkpoint/postgres-checkpoint-store';
export * from './lifecycle/remote-chunk-coordinator';
export * from './worker/local-chunk-worker';

export function createCheckpointStore(env: ChunkingEnv): CheckpointStore {
    if (!env.checkpointPgUrl) {
        return new InMemoryCheckpointStore();
    }

    return new PostgresCheckpointStore(env.checkpointPgUrl, {
        storeKey: env.checkpointStoreKey,
    });
}

export function createRemoteChunkCoordinator<T>(
    outbound: OutboundChunkChannel<T>,
    inbound: InboundReplyChannel,
    env: ChunkingEnv,
    logger: ChunkingLogger = consoleChunkingLogger,
): RemoteChunkCoordinator<T> {
    return new RemoteChunkCoordinator<T>(outbound, inbound, {
        config: {
            throttleLimit: env.throttleLimit,
            drainMaxAttempts: env.drainMaxAttempts,
            pollIntervalMs: env.pollIntervalMs,
            flushPollTimeoutMs: env.flushPollTimeoutMs,
        },
        checkpoints: createCheckpointStore(env),
        logger,
    });
}

function parseDemoItem(item: unknown): string {
    if (typeof item !== 'string') {
        throw new Error('demo chunk items must be strings');
    }

    return item;
}

async function main(): Promise<void> {
    const env = parseChunkingEnv(process.env);
    // Both directions carry JSON strings, as a broker would.
    const requestPayloads = new InMemoryChannel<string>('requests');
    const replyPayloads = new InMemoryChannel<string>('replies');
    const worker = new LocalChunkWorker<string>(
        new DecodingRequestSource(requestPayloads, parseDemoItem),
        new EncodingReplySink(replyPayloads),
        (items) => {
            console.log('worker processed chunk', {
                item_count: items.length,
            });
        },
    );
    const coordinator = createRemoteChunkCoordinator<string>(
        new EncodingRequestChannel<string>(requestPayloads),
        new DecodingReplyChannel(replyPayloads),
        env,
    );

    worker.start();

    try {
        await coordinator.onStepStart(1, 0);

        for (let chunk = 0; chunk < 3; chunk += 1) {
            const transactionId = `tx-${chunk}`;

            for (let item = 0; item < 5; item += 1) {
                coordinator.write(transactionId, `item-${chunk}-${item}`);
            }

            await coordinator.flush(transactionId);
            await coordinator.checkpoint();
        }

        const outcome = await coordinator.onStepEnd('completed');

        console.log('remote chunking step finished', {
            outcome: outcome.status,
            progress: coordinator.progressSnapshot(),
            throttle_limit: env.throttleLimit,
            checkpoint_pg_configured: env.checkpointPgUrl !== undefined,
        });
    } finally {
        await worker.stop();
    }
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('remote chunking run failed', error);
        process.exitCode = 1;
    });
}
