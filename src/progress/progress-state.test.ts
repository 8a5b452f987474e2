import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { ProgressState } from './progress-state';

describe('ProgressState', () => {
    test('starts at zero with no job bound', () => {
        const progress = new ProgressState();

        assert.deepEqual(progress.snapshot(), {
            expected: 0,
            actual: 0,
            jobId: null,
            skipCount: 0,
            outstanding: 0,
        });
    });

    test('dispatch and response move outstanding', () => {
        const progress = new ProgressState();

        progress.recordDispatch();
        progress.recordDispatch();
        assert.equal(progress.outstanding, 2);

        assert.equal(progress.recordResponse(), true);
        assert.equal(progress.actual, 1);
        assert.equal(progress.outstanding, 1);
    });

    test('surplus response leaves counters untouched', () => {
        const progress = new ProgressState();

        progress.recordDispatch();
        progress.recordResponse();

        assert.equal(progress.recordResponse(), false);
        assert.equal(progress.expected, 1);
        assert.equal(progress.actual, 1);
        assert.equal(progress.outstanding, 0);
    });

    test('outstanding never goes negative over mixed events', () => {
        const progress = new ProgressState();
        const events = 'drrdrrrddrdrrr';

        for (const event of events) {
            if (event === 'd') {
                progress.recordDispatch();
            } else {
                progress.recordResponse();
            }

            assert.ok(progress.outstanding >= 0);
            assert.ok(progress.expected >= progress.actual);
        }

        assert.equal(progress.expected, 5);
        assert.equal(progress.actual, 5);
    });

    test('bindStep captures identity', () => {
        const progress = new ProgressState();

        progress.bindStep(99, 4);

        assert.equal(progress.jobId, 99);
        assert.equal(progress.skipCount, 4);
    });

    test('bindStep rejects a negative skip count', () => {
        const progress = new ProgressState();

        assert.throws(
            () => progress.bindStep(1, -1),
            /skipCount must be a non-negative integer/,
        );
    });

    test('restore loads both counters', () => {
        const progress = new ProgressState();

        progress.restore({ expected: 3, actual: 1 });

        assert.deepEqual(progress.toCheckpoint(), {
            expected: 3,
            actual: 1,
        });
        assert.equal(progress.outstanding, 2);
    });

    test('restore rejects actual above expected', () => {
        const progress = new ProgressState();

        assert.throws(
            () => progress.restore({ expected: 1, actual: 2 }),
            /actual must not exceed expected/,
        );
        assert.equal(progress.expected, 0);
        assert.equal(progress.actual, 0);
    });

    test('reset zeroes counters and keeps identity', () => {
        const progress = new ProgressState();

        progress.bindStep(5, 0);
        progress.restore({ expected: 4, actual: 2 });
        progress.reset();

        assert.equal(progress.outstanding, 0);
        assert.equal(progress.expected, 0);
        assert.equal(progress.jobId, 5);
    });
});
