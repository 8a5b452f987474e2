import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { InMemoryChannel } from '../channels/in-memory-channel';
import {
    buildChunkRequest,
    ChunkRequest,
    ChunkResponse,
} from '../chunks/models';
import { sleep, TEST_JOB_ID } from '../test-helpers';
import { LocalChunkWorker } from './local-chunk-worker';

function buildChannels(): {
    requests: InMemoryChannel<ChunkRequest<number>>;
    replies: InMemoryChannel<ChunkResponse>;
} {
    return {
        requests: new InMemoryChannel<ChunkRequest<number>>('requests'),
        replies: new InMemoryChannel<ChunkResponse>('replies'),
    };
}

describe('LocalChunkWorker', () => {
    test('handle replies continuable when processing succeeds', async () => {
        const { requests, replies } = buildChannels();
        const seen: number[] = [];
        const worker = new LocalChunkWorker<number>(
            requests,
            replies,
            (items) => {
                seen.push(...items);
            },
        );

        const response = await worker.handle(
            buildChunkRequest([1, 2, 3], TEST_JOB_ID, 0),
        );

        assert.deepEqual(seen, [1, 2, 3]);
        assert.deepEqual(response, {
            jobId: TEST_JOB_ID,
            outcome: 'CONTINUABLE',
        });
    });

    test('handle replies failed with the error message', async () => {
        const { requests, replies } = buildChannels();
        const worker = new LocalChunkWorker<number>(
            requests,
            replies,
            async () => {
                throw new Error('item 2 rejected');
            },
        );

        const response = await worker.handle(
            buildChunkRequest([1, 2], TEST_JOB_ID, 0),
        );

        assert.deepEqual(response, {
            jobId: TEST_JOB_ID,
            outcome: 'FAILED',
            description: 'item 2 rejected',
        });
    });

    test('processNext moves one request to one reply', async () => {
        const { requests, replies } = buildChannels();
        const worker = new LocalChunkWorker<number>(
            requests,
            replies,
            () => undefined,
        );

        await requests.send(buildChunkRequest([5], TEST_JOB_ID, 0));

        assert.equal(await worker.processNext(5), true);
        assert.equal(await worker.processNext(5), false);
        assert.equal(worker.processed, 1);
        assert.deepEqual(await replies.receive(5), {
            jobId: TEST_JOB_ID,
            outcome: 'CONTINUABLE',
        });
    });

    test('start and stop run the polling loop', async () => {
        const { requests, replies } = buildChannels();
        const worker = new LocalChunkWorker<number>(
            requests,
            replies,
            () => undefined,
            { pollIntervalMs: 2 },
        );

        worker.start();
        await requests.send(buildChunkRequest([1], TEST_JOB_ID, 0));
        await requests.send(buildChunkRequest([2], TEST_JOB_ID, 0));

        const first = await replies.receive(500);
        const second = await replies.receive(500);

        await worker.stop();

        assert.equal(first?.outcome, 'CONTINUABLE');
        assert.equal(second?.outcome, 'CONTINUABLE');
        assert.equal(worker.processed, 2);
    });

    test('stop reports a reply channel failure', async () => {
        const { requests, replies } = buildChannels();
        const worker = new LocalChunkWorker<number>(
            requests,
            replies,
            () => undefined,
            { pollIntervalMs: 2 },
        );

        replies.close();
        worker.start();
        await requests.send(buildChunkRequest([1], TEST_JOB_ID, 0));

        await assert.rejects(
            () => worker.stop(),
            /channel replies is closed/,
        );
    });

    test('start during a pending stop does not start a second loop', async () => {
        const { requests, replies } = buildChannels();
        const worker = new LocalChunkWorker<number>(
            requests,
            replies,
            () => undefined,
            { pollIntervalMs: 2 },
        );

        worker.start();
        const stopping = worker.stop();
        worker.start();
        await stopping;

        await requests.send(buildChunkRequest([1], TEST_JOB_ID, 0));
        await sleep(20);

        assert.equal(requests.size, 1);
        assert.equal(worker.processed, 0);
    });

    test('closing the request channel ends the loop', async () => {
        const { requests, replies } = buildChannels();
        const worker = new LocalChunkWorker<number>(
            requests,
            replies,
            () => undefined,
            { pollIntervalMs: 2 },
        );

        worker.start();
        await sleep(5);
        requests.close();
        await sleep(5);

        await assert.rejects(
            () => worker.stop(),
            /channel requests is closed/,
        );
        assert.equal(worker.processed, 0);
    });
});
