import {
    ChunkRequest,
    ChunkResponse,
    decodeChunkRequest,
    decodeChunkResponse,
    encodeChunkRequest,
    encodeChunkResponse,
} from '../chunks/models';
import {
    ChunkReplySink,
    ChunkRequestSource,
    InboundReplyChannel,
    OutboundChunkChannel,
    PayloadReceiver,
    PayloadSender,
} from './types';

export class EncodingRequestChannel<T> implements OutboundChunkChannel<T> {
    constructor(private readonly transport: PayloadSender) {}

    async send(request: ChunkRequest<T>): Promise<void> {
        await this.transport.send(encodeChunkRequest(request));
    }
}

/**
 * Decodes reply payloads. A payload without a job id decodes with
 * `jobId: null` and is rejected by the drain, not here.
 */
export class DecodingReplyChannel implements InboundReplyChannel {
    constructor(private readonly transport: PayloadReceiver) {}

    async receive(timeoutMs: number): Promise<ChunkResponse | null> {
        const payload = await this.transport.receive(timeoutMs);

        if (payload === null) {
            return null;
        }

        return decodeChunkResponse(payload);
    }
}

export class DecodingRequestSource<T> implements ChunkRequestSource<T> {
    constructor(
        private readonly transport: PayloadReceiver,
        private readonly parseItem: (item: unknown) => T,
    ) {}

    async receive(timeoutMs: number): Promise<ChunkRequest<T> | null> {
        const payload = await this.transport.receive(timeoutMs);

        if (payload === null) {
            return null;
        }

        return decodeChunkRequest(payload, this.parseItem);
    }
}

export class EncodingReplySink implements ChunkReplySink {
    constructor(private readonly transport: PayloadSender) {}

    async send(response: ChunkResponse): Promise<void> {
        await this.transport.send(encodeChunkResponse(response));
    }
}
