import express, { type RequestHandler } from 'express';
import type { OAuthServer } from '../OAuthServer.js';
import { methodNotAllowed, sendOAuthError } from './errors.js';

export interface TokenHandlerOptions {
    provider: OAuthServer;
}

/** `POST /token`: exchanges an authorization code (and PKCE verifier) for an access token. */
export function tokenHandler({ provider }: TokenHandlerOptions): RequestHandler {
    const router = express.Router();
    router.use(express.urlencoded({ extended: false }), express.json());

    router.post('/', async (req, res) => {
        res.set('Cache-Control', 'no-store');
        try {
            const tokens = await provider.exchangeAuthorizationCode(req.body);
            res.status(200).json(tokens);
        } catch (error) {
            sendOAuthError(res, error);
        }
    });
    router.all('/', methodNotAllowed(['POST']));

    return router;
}
