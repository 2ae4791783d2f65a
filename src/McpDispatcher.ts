import debug from 'debug';
import { ZodError } from 'zod';
import {
    ClientCapabilitiesSchema,
    ErrorCode,
    ImplementationSchema,
    LATEST_PROTOCOL_VERSION,
    SUPPORTED_PROTOCOL_VERSIONS,
    type CallToolResult,
    type Implementation,
    type InitializeResult,
    type ListToolsResult,
} from '@modelcontextprotocol/sdk/types.js';
import {
    JsonRpcError,
    SessionUnavailableError,
    describeIssues,
    errorResponse,
    type JsonRpcErrorResponse,
} from './errors.js';
import {
    isNotification,
    isRecord,
    parseEnvelope,
    requestIdOf,
    successResponse,
    type JsonRpcRequest,
    type JsonRpcSuccessResponse,
} from './jsonrpc.js';
import type { SessionManager, CreateSessionOptions } from './SessionManager.js';
import { toolFailure, type ToolRegistry } from './ToolRegistry.js';
import type { AuthContext, JsonRpcId, Session } from './types.js';

const log = debug('mcp:McpDispatcher');

const DEFAULT_INSTRUCTIONS =
    'Call tools/list to discover the inventory and task tools, then tools/call to run them. ' +
    'A tool that cannot complete returns success: false with an error message describing what to fix.';

export interface McpDispatcherOptions {
    sessions: SessionManager;
    tools: ToolRegistry;

    /** @default { name: 'pantry-mcp-gateway', version: '0.1.0' } */
    serverInfo?: Implementation;

    /** Free-text usage hints returned by `initialize`. */
    instructions?: string;

    /**
     * Recreate a session, bound to the caller, when a non-initialize request carries no session id
     * or one this process does not know (for instance after a restart).
     *
     * When disabled such requests fail with HTTP 400 (missing id) or 404 (unknown id), which tells
     * MCP clients to initialize again.
     *
     * Sessions are never expired, so a client that keeps omitting the header adds one session per
     * request for the life of the process.
     *
     * @default true
     */
    sessionRecovery?: boolean;
}

export interface DispatchContext {
    auth: AuthContext;
    /** Value of the `Mcp-Session-Id` request header */
    sessionId?: string;
}

export interface DispatchResult {
    /** HTTP status to answer with */
    status: number;
    /** Session id to return in the `Mcp-Session-Id` response header */
    sessionId?: string;
    /** Absent for notifications */
    body?: JsonRpcSuccessResponse | JsonRpcErrorResponse;
}

/**
 * Per-request protocol state machine: validate the envelope, resolve the session, run the method
 * and build the response envelope. Authentication has already happened by the time a message
 * reaches {@link dispatch}.
 */
export class McpDispatcher {
    private sessions: SessionManager;
    private tools: ToolRegistry;
    private serverInfo: Implementation;
    private instructions: string;
    readonly sessionRecovery: boolean;

    constructor(options: McpDispatcherOptions) {
        this.sessions = options.sessions;
        this.tools = options.tools;
        this.serverInfo = options.serverInfo ?? { name: 'pantry-mcp-gateway', version: '0.1.0' };
        this.instructions = options.instructions ?? DEFAULT_INSTRUCTIONS;
        this.sessionRecovery = options.sessionRecovery ?? true;
    }

    async dispatch(message: unknown, context: DispatchContext): Promise<DispatchResult> {
        let request: JsonRpcRequest;
        try {
            request = parseEnvelope(message);
        } catch (error) {
            if (error instanceof JsonRpcError) {
                return {
                    status: 400,
                    sessionId: this.liveSessionId(context),
                    body: errorResponse(requestIdOf(message), error.toErrorObject()),
                };
            }
            throw error;
        }

        if (isNotification(request)) {
            log('accepted notification %s', request.method);
            return { status: 202, sessionId: this.liveSessionId(context) };
        }

        const id: JsonRpcId = request.id ?? null;

        let session: Session;
        try {
            session = this.resolveSession(request, context);
        } catch (error) {
            if (error instanceof SessionUnavailableError) {
                log('session unavailable for %s: %s', context.auth.subject, error.message);
                return { status: error.status, body: errorResponse(id, error.toErrorObject()) };
            }
            throw error;
        }

        try {
            const result = await this.handle(request, session, context.auth);
            return { status: 200, sessionId: session.sessionId, body: successResponse(id, result) };
        } catch (error) {
            if (error instanceof JsonRpcError) {
                return { status: 200, sessionId: session.sessionId, body: errorResponse(id, error.toErrorObject()) };
            }
            log('internal error while handling %s', request.method, error);
            return {
                status: 500,
                sessionId: session.sessionId,
                body: errorResponse(id, { code: ErrorCode.InternalError, message: 'Internal error' }),
            };
        }
    }

    private resolveSession(request: JsonRpcRequest, { auth, sessionId }: DispatchContext): Session {
        // initialize never reuses a session, whatever id the client sent
        if (request.method === 'initialize') {
            return this.sessions.create(auth, readInitializeParams(request.params));
        }

        if (!sessionId) {
            if (!this.sessionRecovery) {
                throw new SessionUnavailableError('Bad Request: Mcp-Session-Id header is required', 400);
            }
            const session = this.sessions.create(auth);
            log('created session %s for %s request without a session id', session.sessionId, request.method);
            return session;
        }

        const existing = this.sessions.get(sessionId);
        if (existing) {
            if (existing.subject !== auth.subject) {
                // Do not reveal that the session exists
                throw new SessionUnavailableError('Session not found', 404);
            }
            return existing;
        }

        if (!this.sessionRecovery) {
            throw new SessionUnavailableError('Session not found', 404);
        }
        log('recovering unknown session %s for %s', sessionId, auth.subject);
        return this.sessions.create(auth, { sessionId });
    }

    private liveSessionId({ auth, sessionId }: DispatchContext): string | undefined {
        if (!sessionId) {
            return undefined;
        }
        const session = this.sessions.get(sessionId);
        return session?.subject === auth.subject ? session.sessionId : undefined;
    }

    private async handle(request: JsonRpcRequest, session: Session, auth: AuthContext): Promise<unknown> {
        switch (request.method) {
            case 'initialize':
                return this.initialize(session);
            case 'tools/list':
                return this.listTools();
            case 'tools/call':
                return this.callTool(request.params, auth);
            default:
                throw JsonRpcError.methodNotFound(`Unknown method: ${request.method}`, { method: request.method });
        }
    }

    private initialize(session: Session): InitializeResult {
        return {
            protocolVersion: session.protocolVersion,
            capabilities: {
                tools: { listChanged: false },
            },
            serverInfo: this.serverInfo,
            instructions: this.instructions,
        };
    }

    private listTools(): ListToolsResult {
        return { tools: this.tools.list() };
    }

    private async callTool(params: unknown, auth: AuthContext): Promise<CallToolResult> {
        if (!isRecord(params) || typeof params.name !== 'string') {
            throw JsonRpcError.invalidParams('Invalid params: tools/call requires a tool name');
        }
        const args = params.arguments ?? {};
        if (!isRecord(args)) {
            throw JsonRpcError.invalidParams('Invalid params: arguments must be an object');
        }

        const tool = this.tools.get(params.name);
        if (!tool) {
            throw JsonRpcError.methodNotFound(`Unknown tool: ${params.name}`, { name: params.name });
        }

        try {
            return await tool.handler(args, auth);
        } catch (error) {
            log('tool %s failed for %s', tool.name, auth.subject, error);
            return toolFailure(failureMessage(error));
        }
    }
}

function readInitializeParams(params: unknown): CreateSessionOptions {
    if (!isRecord(params)) {
        return {};
    }

    const options: CreateSessionOptions = {};
    if (typeof params.protocolVersion === 'string') {
        options.protocolVersion = SUPPORTED_PROTOCOL_VERSIONS.includes(params.protocolVersion)
            ? params.protocolVersion
            : LATEST_PROTOCOL_VERSION;
    }
    const clientInfo = ImplementationSchema.safeParse(params.clientInfo);
    if (clientInfo.success) {
        options.clientInfo = clientInfo.data;
    }
    const capabilities = ClientCapabilitiesSchema.safeParse(params.capabilities);
    if (capabilities.success) {
        options.clientCapabilities = capabilities.data;
    }
    return options;
}

function failureMessage(error: unknown): string {
    if (error instanceof ZodError) {
        return `Invalid arguments: ${describeIssues(error)}`;
    }
    if (error instanceof Error && error.message) {
        return error.message;
    }
    if (typeof error === 'string' && error) {
        return error;
    }
    return 'Tool execution failed';
}
