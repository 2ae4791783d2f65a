import type { RequestHandler, Response } from 'express';
import debug from 'debug';
import {
    InsufficientScopeError,
    InvalidTokenError,
    OAuthError,
    ServerError,
} from '@modelcontextprotocol/sdk/server/auth/errors.js';

const log = debug('oauth:handlers');

/**
 * Writes an OAuth error response (`{error, error_description}`).
 * Anything that is not an {@link OAuthError} is logged and reported as `server_error`.
 */
export function sendOAuthError(res: Response, error: unknown) {
    if (error instanceof OAuthError) {
        res.status(oauthErrorStatus(error)).json(error.toResponseObject());
        return;
    }

    log('unexpected error', error);
    res.status(500).json(new ServerError('Internal Server Error').toResponseObject());
}

function oauthErrorStatus(error: OAuthError): number {
    if (error instanceof InvalidTokenError) return 401;
    if (error instanceof InsufficientScopeError) return 403;
    if (error instanceof ServerError) return 500;
    return 400;
}

export function methodNotAllowed(allowed: string[]): RequestHandler {
    return (req, res) => {
        res.set('Allow', allowed.join(', '));
        res.status(405).json({
            error: 'method_not_allowed',
            error_description: `The method ${req.method} is not allowed for this endpoint`,
        });
    };
}
