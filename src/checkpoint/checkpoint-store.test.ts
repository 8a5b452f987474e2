import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import {
    checkpointFromState,
    InMemoryCheckpointStore,
    parseStepCheckpointState,
} from './checkpoint-store';

describe('checkpointFromState', () => {
    test('absence of both fields means a fresh run', () => {
        assert.equal(checkpointFromState({}), null);
    });

    test('both fields form a checkpoint', () => {
        assert.deepEqual(
            checkpointFromState({ EXPECTED: 3, ACTUAL: 1 }),
            { expected: 3, actual: 1 },
        );
    });

    test('one field without the other is rejected', () => {
        assert.throws(
            () => checkpointFromState({ EXPECTED: 3 }),
            /EXPECTED and ACTUAL must be stored together/,
        );
        assert.throws(
            () => checkpointFromState({ ACTUAL: 0 }),
            /EXPECTED and ACTUAL must be stored together/,
        );
    });

    test('actual above expected is rejected', () => {
        assert.throws(
            () => checkpointFromState({ EXPECTED: 1, ACTUAL: 2 }),
            /ACTUAL exceeds EXPECTED/,
        );
    });
});

describe('parseStepCheckpointState', () => {
    test('rejects negative counters', () => {
        assert.throws(
            () => parseStepCheckpointState({ EXPECTED: -1, ACTUAL: 0 }),
            /invalid persisted checkpoint payload/,
        );
    });

    test('rejects unknown keys', () => {
        assert.throws(
            () => parseStepCheckpointState({ EXPECTING: 2 }),
            /invalid persisted checkpoint payload/,
        );
    });

    test('rejects non-object payloads', () => {
        assert.throws(
            () => parseStepCheckpointState('EXPECTED=2'),
            /invalid persisted checkpoint payload/,
        );
    });
});

describe('InMemoryCheckpointStore', () => {
    test('read returns null before the first write', async () => {
        const store = new InMemoryCheckpointStore();

        assert.equal(await store.read(), null);
    });

    test('write stores both fields together', async () => {
        const store = new InMemoryCheckpointStore();

        await store.write({ expected: 4, actual: 2 });

        assert.deepEqual(await store.read(), { expected: 4, actual: 2 });
        assert.deepEqual(store.snapshot(), { EXPECTED: 4, ACTUAL: 2 });
    });

    test('accepts a seeded state', async () => {
        const store = new InMemoryCheckpointStore({ EXPECTED: 3, ACTUAL: 1 });

        assert.deepEqual(await store.read(), { expected: 3, actual: 1 });
    });

    test('refuses to write an inconsistent pair', async () => {
        const store = new InMemoryCheckpointStore();

        await assert.rejects(
            () => store.write({ expected: 1, actual: 3 }),
            /ACTUAL exceeds EXPECTED/,
        );
        assert.equal(await store.read(), null);
    });
});
