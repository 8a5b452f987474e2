import { z } from 'zod';
import {
    CHECKPOINT_ACTUAL_KEY,
    CHECKPOINT_EXPECTED_KEY,
} from '../constants';
import { ProgressCheckpoint } from '../progress/progress-state';

/**
 * Persisted form of the progress counters. Both keys are written together;
 * an empty object means no checkpoint has been taken yet.
 */
export interface StepCheckpointState {
    [CHECKPOINT_EXPECTED_KEY]?: number;
    [CHECKPOINT_ACTUAL_KEY]?: number;
}

const CounterSchema = z.number().int().nonnegative().safe();

const StepCheckpointStateSchema = z
    .object({
        [CHECKPOINT_EXPECTED_KEY]: CounterSchema.optional(),
        [CHECKPOINT_ACTUAL_KEY]: CounterSchema.optional(),
    })
    .strict();

export interface CheckpointStore {
    read(): Promise<ProgressCheckpoint | null>;
    write(checkpoint: ProgressCheckpoint): Promise<void>;
}

export function createEmptyStepCheckpointState(): StepCheckpointState {
    return {};
}

export function parseStepCheckpointState(raw: unknown): StepCheckpointState {
    const parsed = StepCheckpointStateSchema.safeParse(raw);

    if (!parsed.success) {
        throw new Error(
            'invalid persisted checkpoint payload: ' +
            (parsed.error.issues[0]?.message || 'unknown issue'),
        );
    }

    const state: StepCheckpointState = {};
    const expected = parsed.data[CHECKPOINT_EXPECTED_KEY];
    const actual = parsed.data[CHECKPOINT_ACTUAL_KEY];

    if (expected !== undefined) {
        state[CHECKPOINT_EXPECTED_KEY] = expected;
    }

    if (actual !== undefined) {
        state[CHECKPOINT_ACTUAL_KEY] = actual;
    }

    return state;
}

export function checkpointFromState(
    state: StepCheckpointState,
): ProgressCheckpoint | null {
    const expected = state[CHECKPOINT_EXPECTED_KEY];
    const actual = state[CHECKPOINT_ACTUAL_KEY];

    if (expected === undefined && actual === undefined) {
        return null;
    }

    if (expected === undefined || actual === undefined) {
        throw new Error(
            'invalid persisted checkpoint: ' +
            `${CHECKPOINT_EXPECTED_KEY} and ${CHECKPOINT_ACTUAL_KEY} ` +
            'must be stored together',
        );
    }

    if (actual > expected) {
        throw new Error(
            'invalid persisted checkpoint: ' +
            `${CHECKPOINT_ACTUAL_KEY} exceeds ${CHECKPOINT_EXPECTED_KEY}`,
        );
    }

    return {
        expected,
        actual,
    };
}

export function stateFromCheckpoint(
    checkpoint: ProgressCheckpoint,
): StepCheckpointState {
    const state = parseStepCheckpointState({
        [CHECKPOINT_EXPECTED_KEY]: checkpoint.expected,
        [CHECKPOINT_ACTUAL_KEY]: checkpoint.actual,
    });

    checkpointFromState(state);

    return state;
}

export class InMemoryCheckpointStore implements CheckpointStore {
    private state: StepCheckpointState;

    constructor(initialState?: StepCheckpointState) {
        this.state = parseStepCheckpointState(
            initialState ?? createEmptyStepCheckpointState(),
        );
    }

    async read(): Promise<ProgressCheckpoint | null> {
        return checkpointFromState(this.state);
    }

    async write(checkpoint: ProgressCheckpoint): Promise<void> {
        this.state = stateFromCheckpoint(checkpoint);
    }

    snapshot(): StepCheckpointState {
        return { ...this.state };
    }
}
