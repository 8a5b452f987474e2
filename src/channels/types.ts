import { ChunkRequest, ChunkResponse } from '../chunks/models';

export interface OutboundChunkChannel<T> {
    /**
     * Hands a chunk to the transport. A rejected promise means the chunk
     * was not accepted and must be treated as never sent.
     */
    send(request: ChunkRequest<T>): Promise<void>;
}

export interface InboundReplyChannel {
    /**
     * Resolves the next reply, or null once `timeoutMs` has elapsed
     * without one.
     */
    receive(timeoutMs: number): Promise<ChunkResponse | null>;
}

export interface ChunkRequestSource<T> {
    receive(timeoutMs: number): Promise<ChunkRequest<T> | null>;
}

export interface ChunkReplySink {
    send(response: ChunkResponse): Promise<void>;
}

/**
 * String transport seen from the sending end, e.g. a queue producer.
 */
export interface PayloadSender {
    send(payload: string): Promise<void>;
}

export interface PayloadReceiver {
    receive(timeoutMs: number): Promise<string | null>;
}
