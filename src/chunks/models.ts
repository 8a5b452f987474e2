import { z } from 'zod';
import { CHUNK_OUTCOMES, ChunkOutcome } from '../constants';

const JobIdSchema = z.number().int().safe();

export const ChunkOutcomeSchema = z.enum(CHUNK_OUTCOMES);

export const ChunkRequestSchema = z
    .object({
        items: z.array(z.unknown()),
        jobId: JobIdSchema,
        skipCount: z.number().int().nonnegative(),
    })
    .strict();

export interface ChunkRequest<T> {
    readonly items: readonly T[];
    readonly jobId: number;
    readonly skipCount: number;
}

// jobId is nullable so that a reply missing its job identity reaches the
// drain loop and fails there as a validation error.
export const ChunkResponseSchema = z
    .object({
        jobId: JobIdSchema.nullable().optional(),
        outcome: ChunkOutcomeSchema,
        description: z.string().optional(),
    })
    .strict();

export interface ChunkResponse {
    jobId: number | null;
    outcome: ChunkOutcome;
    description?: string;
}

export function buildChunkRequest<T>(
    items: readonly T[],
    jobId: number,
    skipCount: number,
): ChunkRequest<T> {
    return Object.freeze({
        items: Object.freeze([...items]),
        jobId,
        skipCount,
    });
}

export function isContinuable(response: ChunkResponse): boolean {
    return response.outcome === 'CONTINUABLE';
}

// JSON codec for transports that carry strings; see
// channels/json-payload-channels.ts. In-process channels pass the objects.
export function encodeChunkRequest<T>(request: ChunkRequest<T>): string {
    return JSON.stringify({
        items: request.items,
        jobId: request.jobId,
        skipCount: request.skipCount,
    });
}

export function decodeChunkRequest<T>(
    raw: string,
    parseItem: (item: unknown) => T,
): ChunkRequest<T> {
    const parsed = ChunkRequestSchema.safeParse(parseJson(raw, 'request'));

    if (!parsed.success) {
        throw new Error(
            'invalid chunk request payload: ' +
            (parsed.error.issues[0]?.message || 'unknown issue'),
        );
    }

    return buildChunkRequest(
        parsed.data.items.map(parseItem),
        parsed.data.jobId,
        parsed.data.skipCount,
    );
}

export function encodeChunkResponse(response: ChunkResponse): string {
    return JSON.stringify(response);
}

export function decodeChunkResponse(raw: string): ChunkResponse {
    const parsed = ChunkResponseSchema.safeParse(parseJson(raw, 'response'));

    if (!parsed.success) {
        throw new Error(
            'invalid chunk response payload: ' +
            (parsed.error.issues[0]?.message || 'unknown issue'),
        );
    }

    const response: ChunkResponse = {
        jobId: parsed.data.jobId ?? null,
        outcome: parsed.data.outcome,
    };

    if (parsed.data.description !== undefined) {
        response.description = parsed.data.description;
    }

    return response;
}

function parseJson(raw: string, kind: string): unknown {
    try {
        return JSON.parse(raw) as unknown;
    } catch {
        throw new Error(`chunk ${kind} payload must be valid JSON`);
    }
}
