export interface ProgressCheckpoint {
    expected: number;
    actual: number;
}

export interface ProgressSnapshot extends ProgressCheckpoint {
    jobId: number | null;
    skipCount: number;
    outstanding: number;
}

function assertCounter(value: number, fieldName: string): void {
    if (!Number.isSafeInteger(value) || value < 0) {
        throw new Error(`${fieldName} must be a non-negative integer`);
    }
}

/**
 * Dispatch/acknowledge counters for one step attempt. `expected` counts
 * chunks sent, `actual` counts replies accepted; the difference is what
 * is still in flight.
 */
export class ProgressState {
    private expectedCount = 0;

    private actualCount = 0;

    private currentJobId: number | null = null;

    private currentSkipCount = 0;

    get expected(): number {
        return this.expectedCount;
    }

    get actual(): number {
        return this.actualCount;
    }

    get outstanding(): number {
        return this.expectedCount - this.actualCount;
    }

    get jobId(): number | null {
        return this.currentJobId;
    }

    get skipCount(): number {
        return this.currentSkipCount;
    }

    bindStep(jobId: number, skipCount: number): void {
        if (!Number.isSafeInteger(jobId)) {
            throw new Error('jobId must be an integer');
        }

        assertCounter(skipCount, 'skipCount');

        this.currentJobId = jobId;
        this.currentSkipCount = skipCount;
    }

    updateSkipCount(skipCount: number): void {
        assertCounter(skipCount, 'skipCount');
        this.currentSkipCount = skipCount;
    }

    recordDispatch(): void {
        this.expectedCount += 1;
    }

    /**
     * Returns false when nothing is outstanding: a reply beyond what was
     * counted as dispatched (a redelivery, or a chunk sent before a crash
     * that was never checkpointed) must not drive `outstanding` negative.
     */
    recordResponse(): boolean {
        if (this.outstanding === 0) {
            return false;
        }

        this.actualCount += 1;

        return true;
    }

    toCheckpoint(): ProgressCheckpoint {
        return {
            expected: this.expectedCount,
            actual: this.actualCount,
        };
    }

    restore(checkpoint: ProgressCheckpoint): void {
        assertCounter(checkpoint.expected, 'expected');
        assertCounter(checkpoint.actual, 'actual');

        if (checkpoint.actual > checkpoint.expected) {
            throw new Error('actual must not exceed expected');
        }

        this.expectedCount = checkpoint.expected;
        this.actualCount = checkpoint.actual;
    }

    reset(): void {
        this.expectedCount = 0;
        this.actualCount = 0;
    }

    snapshot(): ProgressSnapshot {
        return {
            expected: this.expectedCount,
            actual: this.actualCount,
            jobId: this.currentJobId,
            skipCount: this.currentSkipCount,
            outstanding: this.outstanding,
        };
    }
}
