import type { RequestHandler, Response } from 'express';
import debug from 'debug';
import { InsufficientScopeError, InvalidTokenError, OAuthError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { BearerAuthenticator } from '../BearerAuthenticator.js';
import { ServerErrorCode, errorResponse } from '../errors.js';
import { requestIdOf } from '../jsonrpc.js';
import type { AuthContext, JsonRpcId } from '../types.js';

const log = debug('oauth:bearerAuth');

const warn = debug('auth:warning');
warn.enabled = true;

declare global {
    namespace Express {
        interface Request {
            /** Set by {@link requireBearerAuth} */
            authContext?: AuthContext;
        }
    }
}

export interface BearerAuthMiddlewareOptions {
    authenticator: BearerAuthenticator;

    /**
     * URL of the protected resource metadata, advertised in the `WWW-Authenticate` challenge so that
     * clients can discover where to re-authorize.
     */
    resourceMetadataUrl?: string;

    /**
     * Skips token verification and injects this identity into every request instead.
     *
     * For local debugging only. The identity is attached per request; nothing process-wide is toggled.
     */
    bypass?: AuthContext;
}

/**
 * Express middleware that requires a valid bearer token and attaches the authenticated principal
 * to `req.authContext`.
 *
 * Failures are answered as JSON-RPC error envelopes carrying the request id, with HTTP 401 for
 * missing or invalid tokens and 403 for insufficient scope.
 */
export function requireBearerAuth({ authenticator, resourceMetadataUrl, bypass }: BearerAuthMiddlewareOptions): RequestHandler {
    if (bypass) {
        warn('AUTHENTICATION IS DISABLED: every request runs as %s (client %s)', bypass.subject, bypass.clientId);
    }

    return async (req, res, next) => {
        if (bypass) {
            warn('authentication bypassed for %s %s', req.method, req.originalUrl);
            req.authContext = { ...bypass, scopes: [...bypass.scopes] };
            next();
            return;
        }

        let authContext: AuthContext;
        try {
            authContext = await authenticator.authenticate(req.headers.authorization);
        } catch (error) {
            const id = requestIdOf(req.body);
            if (error instanceof InvalidTokenError) {
                sendChallenge(res, 401, error, id, resourceMetadataUrl);
            } else if (error instanceof InsufficientScopeError) {
                sendChallenge(res, 403, error, id, resourceMetadataUrl);
            } else {
                log('unexpected error while authenticating', error);
                res.status(500).json(errorResponse(id, { code: ErrorCode.InternalError, message: 'Internal error' }));
            }
            return;
        }

        req.authContext = authContext;
        next();
    };
}

function sendChallenge(res: Response, status: number, error: OAuthError, id: JsonRpcId, resourceMetadataUrl?: string) {
    let challenge = `Bearer error="${error.errorCode}", error_description="${error.message}"`;
    if (resourceMetadataUrl) {
        challenge += `, resource_metadata="${resourceMetadataUrl}"`;
    }
    res.set('WWW-Authenticate', challenge);
    res.status(status).json(
        errorResponse(id, {
            code: ServerErrorCode.Unauthorized,
            message: error.message,
            data: error.toResponseObject(),
        }),
    );
}
