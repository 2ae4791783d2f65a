import express, { type ErrorRequestHandler, type RequestHandler } from 'express';
import debug from 'debug';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { ServerErrorCode, errorResponse } from '../errors.js';
import { isRecord } from '../jsonrpc.js';
import type { McpDispatcher } from '../McpDispatcher.js';
import type { SessionManager } from '../SessionManager.js';

const log = debug('mcp:handler');

export const SESSION_HEADER = 'Mcp-Session-Id';

export interface McpHandlerOptions {
    dispatcher: McpDispatcher;
    sessions: SessionManager;
    /** Authentication middleware, usually {@link requireBearerAuth} */
    authMiddleware: RequestHandler;
}

/**
 * The MCP endpoint over stateless HTTP: one JSON-RPC request per POST, session continuity through
 * the `Mcp-Session-Id` header.
 */
export function mcpHandler({ dispatcher, sessions, authMiddleware }: McpHandlerOptions): RequestHandler {
    const router = express.Router();

    router.post('/', parseJsonBody(), authMiddleware, async (req, res) => {
        const auth = req.authContext;
        if (!auth) {
            throw new Error('authContext is missing, the auth middleware did not run');
        }

        if (res.locals.jsonParseFailed === true) {
            res.status(400).json(errorResponse(null, { code: ErrorCode.ParseError, message: 'Parse error' }));
            return;
        }

        const result = await dispatcher.dispatch(req.body, { auth, sessionId: req.get(SESSION_HEADER) });

        if (result.sessionId) {
            res.set(SESSION_HEADER, result.sessionId);
        }
        if (result.body) {
            res.status(result.status).json(result.body);
        } else {
            res.status(result.status).end();
        }
    });

    router.delete('/', authMiddleware, (req, res) => {
        const auth = req.authContext;
        if (!auth) {
            throw new Error('authContext is missing, the auth middleware did not run');
        }

        const sessionId = req.get(SESSION_HEADER);
        if (!sessionId) {
            res.status(400).json(
                errorResponse(null, {
                    code: ServerErrorCode.SessionUnavailable,
                    message: 'Bad Request: Mcp-Session-Id header is required',
                }),
            );
            return;
        }

        const session = sessions.get(sessionId);
        if (session && session.subject !== auth.subject) {
            res.status(404).json(
                errorResponse(null, { code: ServerErrorCode.SessionUnavailable, message: 'Session not found' }),
            );
            return;
        }

        sessions.destroy(sessionId);
        res.status(204).end();
    });

    // No server-initiated message stream
    router.get('/', (_req, res) => {
        res.set('Allow', 'POST, DELETE');
        res.status(405).json(errorResponse(null, { code: ServerErrorCode.SessionUnavailable, message: 'Method not allowed' }));
    });

    router.use(handleErrors);

    return router;
}

/**
 * `express.json()`, except that malformed JSON is only flagged on `res.locals` so that the bearer
 * challenge is answered before the parse error.
 */
function parseJsonBody(): RequestHandler {
    const parse = express.json();
    return (req, res, next) => {
        parse(req, res, (error?: unknown) => {
            if (isRecord(error) && error.type === 'entity.parse.failed') {
                res.locals.jsonParseFailed = true;
                next();
                return;
            }
            next(error);
        });
    };
}

const handleErrors: ErrorRequestHandler = (error: unknown, _req, res, next) => {
    if (res.headersSent) {
        next(error);
        return;
    }

    log('unhandled error', error);
    res.status(500).json(errorResponse(null, { code: ErrorCode.InternalError, message: 'Internal error' }));
};
