import { BufferStateError } from '../chunks/errors';

function normalizeTransactionId(
    transactionId: string | undefined,
): string {
    const trimmed = String(transactionId ?? '').trim();

    if (trimmed.length === 0) {
        throw new BufferStateError(
            transactionId,
            'Processed items not bound to transaction.',
        );
    }

    return trimmed;
}

/**
 * Staging lists keyed by transaction id. A list is created on the first
 * write of a transaction and lives until it is detached by a flush or
 * discarded by a rollback.
 */
export class TransactionalItemBuffer<T> {
    private readonly buffers = new Map<string, T[]>();

    write(transactionId: string | undefined, item: T): number {
        const items = this.ensure(transactionId);

        items.push(item);

        return items.length;
    }

    ensure(transactionId: string | undefined): T[] {
        const key = normalizeTransactionId(transactionId);
        const existing = this.buffers.get(key);

        if (existing) {
            return existing;
        }

        const created: T[] = [];

        this.buffers.set(key, created);

        return created;
    }

    /**
     * Removes the transaction's list and hands its items to the caller.
     */
    detach(transactionId: string | undefined): T[] {
        const key = normalizeTransactionId(transactionId);
        const items = this.buffers.get(key);

        if (!items) {
            throw new BufferStateError(
                key,
                'Processed items not bound to transaction.',
            );
        }

        this.buffers.delete(key);

        return items;
    }

    release(transactionId: string | undefined): boolean {
        return this.buffers.delete(normalizeTransactionId(transactionId));
    }

    clear(transactionId: string | undefined): number {
        const key = normalizeTransactionId(transactionId);
        const discarded = this.buffers.get(key)?.length ?? 0;

        this.buffers.delete(key);

        return discarded;
    }

    clearAll(): void {
        this.buffers.clear();
    }

    get openTransactionCount(): number {
        return this.buffers.size;
    }
}
