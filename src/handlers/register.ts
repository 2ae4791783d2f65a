import express, { type RequestHandler } from 'express';
import type { OAuthServer } from '../OAuthServer.js';
import { methodNotAllowed, sendOAuthError } from './errors.js';

export interface ClientRegistrationHandlerOptions {
    provider: OAuthServer;
}

/** `POST /register`: dynamic client registration for public clients. */
export function clientRegistrationHandler({ provider }: ClientRegistrationHandlerOptions): RequestHandler {
    const router = express.Router();
    router.use(express.json());

    router.post('/', async (req, res) => {
        res.set('Cache-Control', 'no-store');
        try {
            const client = await provider.registerClient(req.body);
            res.status(201).json(client);
        } catch (error) {
            sendOAuthError(res, error);
        }
    });
    router.all('/', methodNotAllowed(['POST']));

    return router;
}
