/**
 * MCP protocol session: lifecycle state machine and request dispatcher.
 *
 * One instance per connection. The session starts in `awaiting-handshake` and
 * only serves `initialize` until the client sends `notifications/initialized`,
 * after which every registered method is available. Every request produces
 * exactly one response envelope and notifications produce none; nothing thrown
 * by a handler escapes `handle`.
 */

import { z } from 'zod';
import { SUPPORTED_PROTOCOL_VERSIONS } from '@modelcontextprotocol/sdk/types.js';
import { SERVER_INFO } from './config.js';
import type { ServerInfo } from './config.js';
import { createLogger, errorMessage } from './log.js';
import type { Logger } from './log.js';
import {
    NOT_INITIALIZED_MESSAGE,
    RpcErrorCode,
    decodeEnvelope,
    describeZodError,
    errorResponse,
    isRequest,
    ok,
    parseErrorResponse,
    successResponse,
} from './protocol.js';
import type { Envelope, Outcome, RequestId, ResponseEnvelope, RpcError } from './protocol.js';
import type { DocsSearch } from './search.js';
import { callTool, listTools } from './tools.js';

export type SessionState = 'awaiting-handshake' | 'ready';

export const HANDSHAKE_METHOD = 'initialize';
export const INITIALIZED_NOTIFICATION = 'notifications/initialized';
export const DEFAULT_PROTOCOL_VERSION = '2024-11-05';

export interface SessionOptions {
    /** Accessor for the search backend, called once per tool call. */
    search: () => DocsSearch;
    logger?: Logger;
    serverInfo?: ServerInfo;
}

type MethodReply = { result: unknown } | { error: RpcError };
type MethodHandler = (params: unknown) => Promise<MethodReply>;

/**
 * Wraps a typed handler: params are decoded with `schema` first, and a failed
 * decode is reported as invalid params without calling the handler.
 */
function method<S extends z.ZodTypeAny>(
    schema: S,
    handle: (params: z.infer<S>) => Outcome<unknown> | Promise<Outcome<unknown>>,
): MethodHandler {
    return async (raw) => {
        const parsed = schema.safeParse(raw ?? {});
        if (!parsed.success) {
            return {
                error: {
                    code: RpcErrorCode.InvalidParams,
                    message: `Invalid params: ${describeZodError(parsed.error)}`,
                },
            };
        }
        const outcome = await handle(parsed.data);
        return outcome.ok
            ? { result: outcome.value }
            : { error: { code: RpcErrorCode.InternalError, message: outcome.message } };
    };
}

// ── Param schemas ──────────────────────────────────────────────────────────────

const NoParams = z.object({}).passthrough();

const InitializeParams = z.object({
    protocolVersion: z.string().optional(),
    clientInfo: z.object({
        name: z.string().optional(),
        version: z.string().optional(),
    }).passthrough().optional(),
}).passthrough();

const CallToolParams = z.object({
    name: z.string({ required_error: 'name is required' }),
    arguments: z.record(z.unknown()).optional(),
}).passthrough();

// ── Session ────────────────────────────────────────────────────────────────────

export class McpSession {
    private currentState: SessionState = 'awaiting-handshake';
    private readonly log: Logger;
    private readonly serverInfo: ServerInfo;
    private readonly methods: ReadonlyMap<string, MethodHandler>;

    constructor(private readonly options: SessionOptions) {
        this.log = options.logger ?? createLogger('session');
        this.serverInfo = options.serverInfo ?? SERVER_INFO;
        this.methods = new Map<string, MethodHandler>([
            [HANDSHAKE_METHOD, method(InitializeParams, params => this.initialize(params))],
            ['ping', method(NoParams, () => ok({}))],
            ['tools/list', method(NoParams, () => ok({ tools: listTools() }))],
            ['tools/call', method(CallToolParams, params => this.callTool(params))],
            ['resources/list', method(NoParams, () => ok({ resources: [] }))],
            ['prompts/list', method(NoParams, () => ok({ prompts: [] }))],
        ]);
    }

    get state(): SessionState {
        return this.currentState;
    }

    /**
     * Decodes and handles one line of input. Lines that are not valid JSON-RPC
     * produce a parse error with a null id.
     */
    async receive(line: string): Promise<ResponseEnvelope | null> {
        const decoded = decodeEnvelope(line);
        switch (decoded.kind) {
            case 'invalid':
                this.log(`Parse error: ${decoded.reason}`);
                return parseErrorResponse(decoded.reason);
            case 'response':
                this.log(`Ignoring response from client (id: ${JSON.stringify(decoded.id ?? null)})`);
                return null;
            case 'message':
                return this.handle(decoded.envelope);
        }
    }

    async handle(envelope: Envelope): Promise<ResponseEnvelope | null> {
        if (!isRequest(envelope)) {
            this.handleNotification(envelope.method);
            return null;
        }

        const id = envelope.id;
        try {
            return await this.dispatch(id, envelope.method, envelope.params);
        } catch (err) {
            const message = errorMessage(err);
            this.log(`Method error (${envelope.method}): ${message}`);
            return errorResponse(id, RpcErrorCode.InternalError, message);
        }
    }

    private handleNotification(name: string): void {
        if (name !== INITIALIZED_NOTIFICATION) {
            this.log(`Ignoring notification: ${name}`);
            return;
        }
        if (this.currentState === 'ready') {
            this.log('Duplicate initialized notification ignored');
            return;
        }
        this.currentState = 'ready';
        this.log('Client initialized, session ready');
    }

    private async dispatch(id: RequestId, name: string, params: unknown): Promise<ResponseEnvelope> {
        this.log(`Handling method: ${name}`);

        if (this.currentState !== 'ready' && name !== HANDSHAKE_METHOD) {
            return errorResponse(id, RpcErrorCode.ServerNotInitialized, NOT_INITIALIZED_MESSAGE);
        }

        const handler = this.methods.get(name);
        if (!handler) {
            return errorResponse(id, RpcErrorCode.MethodNotFound, `Method not found: ${name}`);
        }

        const reply = await handler(params);
        if ('error' in reply) {
            this.log(`Method error (${name}): ${reply.error.message}`);
            return errorResponse(id, reply.error.code, reply.error.message);
        }
        return successResponse(id, reply.result);
    }

    // ── Handlers ───────────────────────────────────────────────────────────────

    private initialize(params: z.infer<typeof InitializeParams>): Outcome<unknown> {
        this.log(`Client connected: ${params.clientInfo?.name ?? 'unknown'}`);

        const requested = params.protocolVersion;
        const protocolVersion = requested && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
            ? requested
            : DEFAULT_PROTOCOL_VERSION;

        return ok({
            protocolVersion,
            serverInfo: { ...this.serverInfo },
            capabilities: {
                tools: {},
                resources: {},
                prompts: {},
            },
        });
    }

    private callTool(params: z.infer<typeof CallToolParams>): Outcome<unknown> {
        const args = params.arguments ?? {};
        this.log(`Tool call: ${params.name} with args: ${JSON.stringify(args)}`);

        const outcome = callTool(params.name, args, { search: this.options.search });
        if (!outcome.ok) return outcome;
        return ok({ content: [{ type: 'text', text: outcome.value }] });
    }
}
