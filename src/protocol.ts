/**
 * JSON-RPC 2.0 envelopes as exchanged with MCP clients over stdio.
 *
 * Incoming lines are decoded with zod at this boundary only; everything past
 * `decodeEnvelope` works with the typed `Envelope`.
 */

import { z } from 'zod';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export const JSONRPC_VERSION = '2.0';

// ── Error codes ────────────────────────────────────────────────────────────────

export const RpcErrorCode = {
    ParseError: ErrorCode.ParseError,
    MethodNotFound: ErrorCode.MethodNotFound,
    InvalidParams: ErrorCode.InvalidParams,
    InternalError: ErrorCode.InternalError,
    // Not part of the SDK enum: request received before the handshake completed
    ServerNotInitialized: -32002,
} as const;

export const NOT_INITIALIZED_MESSAGE = 'Server not initialized. Send initialize request first.';

// ── Envelopes ──────────────────────────────────────────────────────────────────

const RequestIdSchema = z.union([z.string(), z.number(), z.null()]);

const EnvelopeSchema = z.object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: RequestIdSchema.optional(),
    method: z.string().optional(),
    params: z.unknown().optional(),
    result: z.unknown().optional(),
    error: z.object({ code: z.number(), message: z.string() }).passthrough().optional(),
});

export type RequestId = z.infer<typeof RequestIdSchema>;

/** A request or notification sent by the client. */
export interface Envelope {
    jsonrpc: typeof JSONRPC_VERSION;
    /** Absent on notifications. */
    id?: RequestId;
    method: string;
    params?: unknown;
}

export interface RpcError {
    code: number;
    message: string;
}

export type ResponseEnvelope =
    | { jsonrpc: typeof JSONRPC_VERSION; id: RequestId; result: unknown }
    | { jsonrpc: typeof JSONRPC_VERSION; id: RequestId; error: RpcError };

export type DecodedLine =
    | { kind: 'message'; envelope: Envelope }
    /** A response from the peer. The server never sends requests, so these are dropped. */
    | { kind: 'response'; id: RequestId | undefined }
    | { kind: 'invalid'; reason: string };

/**
 * Decodes one input line. Never throws.
 */
export function decodeEnvelope(line: string): DecodedLine {
    let raw: unknown;
    try {
        raw = JSON.parse(line);
    } catch (err) {
        return { kind: 'invalid', reason: err instanceof Error ? err.message : String(err) };
    }

    const parsed = EnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
        return { kind: 'invalid', reason: 'not a JSON-RPC 2.0 message' };
    }

    const { id, method, params, result, error } = parsed.data;
    if (method === undefined) {
        if (result !== undefined || error !== undefined) {
            return { kind: 'response', id };
        }
        return { kind: 'invalid', reason: 'missing method' };
    }

    const envelope: Envelope = { jsonrpc: JSONRPC_VERSION, method };
    if (id !== undefined) envelope.id = id;
    if (params !== undefined) envelope.params = params;
    return { kind: 'message', envelope };
}

/** Requests carry an id (possibly null) and expect a response; notifications don't. */
export function isRequest(envelope: Envelope): envelope is Envelope & { id: RequestId } {
    return envelope.id !== undefined;
}

export function successResponse(id: RequestId, result: unknown): ResponseEnvelope {
    return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function errorResponse(id: RequestId, code: number, message: string): ResponseEnvelope {
    return { jsonrpc: JSONRPC_VERSION, id, error: { code, message } };
}

export function parseErrorResponse(reason: string): ResponseEnvelope {
    return errorResponse(null, RpcErrorCode.ParseError, `Parse error: ${reason}`);
}

// ── Outcomes ───────────────────────────────────────────────────────────────────

/**
 * Result of a handler or tool: either a value or a failure message. The session
 * turns failures into `InternalError` envelopes.
 */
export type Outcome<T> =
    | { ok: true; value: T }
    | { ok: false; message: string };

export function ok<T>(value: T): Outcome<T> {
    return { ok: true, value };
}

export function fail<T = never>(message: string): Outcome<T> {
    return { ok: false, message };
}

/** First zod issue message, prefixed with its path when the message doesn't already name it. */
export function describeZodError(error: z.ZodError): string {
    const issue = error.issues[0];
    if (!issue) return 'invalid value';
    const path = issue.path.join('.');
    return path && !issue.message.startsWith(path) ? `${path}: ${issue.message}` : issue.message;
}
