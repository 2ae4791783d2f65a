import express, { type RequestHandler } from 'express';
import type { OAuthServer } from '../OAuthServer.js';
import { methodNotAllowed, sendOAuthError } from './errors.js';

export interface AuthorizationHandlerOptions {
    provider: OAuthServer;
}

/**
 * `GET /authorize`: redirects back to the client with `code` (and `state`) once consent is
 * obtained. Invalid requests are answered with HTTP 400 and are never redirected.
 */
export function authorizationHandler({ provider }: AuthorizationHandlerOptions): RequestHandler {
    const router = express.Router();

    router.get('/', async (req, res) => {
        res.set('Cache-Control', 'no-store');
        try {
            const targetUrl = await provider.authorize(req.query, req);
            res.redirect(302, targetUrl.href);
        } catch (error) {
            sendOAuthError(res, error);
        }
    });
    router.all('/', methodNotAllowed(['GET']));

    return router;
}
