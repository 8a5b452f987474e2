interface PendingReceive<T> {
    resolve: (message: T | null) => void;
    reject: (error: Error) => void;
    timer: NodeJS.Timeout;
}

/**
 * FIFO message queue with a bounded receive. Used as the in-process
 * transport for local workers and tests.
 *
 * Once closed, queued messages are still handed out; after that every
 * receive rejects, so pollers stop instead of spinning on `null`.
 */
export class InMemoryChannel<T> {
    private readonly messages: T[] = [];

    private readonly waiting: PendingReceive<T>[] = [];

    private closed = false;

    constructor(private readonly name = 'in-memory') {}

    async send(message: T): Promise<void> {
        if (this.closed) {
            throw this.closedError();
        }

        const receiver = this.waiting.shift();

        if (receiver) {
            clearTimeout(receiver.timer);
            receiver.resolve(message);

            return;
        }

        this.messages.push(message);
    }

    receive(timeoutMs: number): Promise<T | null> {
        const next = this.messages.shift();

        if (next !== undefined) {
            return Promise.resolve(next);
        }

        if (this.closed) {
            return Promise.reject(this.closedError());
        }

        return new Promise<T | null>((resolve, reject) => {
            const pending: PendingReceive<T> = {
                resolve,
                reject,
                timer: setTimeout(() => {
                    const index = this.waiting.indexOf(pending);

                    if (index !== -1) {
                        this.waiting.splice(index, 1);
                    }

                    resolve(null);
                }, Math.max(0, timeoutMs)),
            };

            this.waiting.push(pending);
        });
    }

    close(): void {
        this.closed = true;

        for (const receiver of this.waiting.splice(0)) {
            clearTimeout(receiver.timer);
            receiver.reject(this.closedError());
        }
    }

    get size(): number {
        return this.messages.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    drainMessages(): T[] {
        return this.messages.splice(0);
    }

    private closedError(): Error {
        return new Error(`channel ${this.name} is closed`);
    }
}
