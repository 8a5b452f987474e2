export const CHECKPOINT_EXPECTED_KEY = 'EXPECTED';
export const CHECKPOINT_ACTUAL_KEY = 'ACTUAL';

export const DEFAULT_THROTTLE_LIMIT = 6;
export const DEFAULT_DRAIN_MAX_ATTEMPTS = 40;
export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_FLUSH_POLL_TIMEOUT_MS = 1;

export const DEFAULT_CHECKPOINT_STORE_KEY = 'remote-chunk-step';

export const CHUNK_OUTCOMES = [
    'CONTINUABLE',
    'FINISHED',
    'FAILED',
] as const;

export type ChunkOutcome = (typeof CHUNK_OUTCOMES)[number];

export const STEP_STATUSES = [
    'starting',
    'started',
    'stopping',
    'stopped',
    'completed',
    'failed',
    'abandoned',
] as const;

export type StepStatus = (typeof STEP_STATUSES)[number];

export const COORDINATOR_PHASES = [
    'init',
    'active',
    'draining',
    'complete',
    'failed',
    'timed_out',
] as const;

export type CoordinatorPhase = (typeof COORDINATOR_PHASES)[number];
