import express, { type RequestHandler } from 'express';
import { z } from 'zod';
import { InvalidRequestError } from '@modelcontextprotocol/sdk/server/auth/errors.js';
import type { OAuthServer } from '../OAuthServer.js';
import { methodNotAllowed, sendOAuthError } from './errors.js';

const RevocationRequestSchema = z.object({
    token: z.string().min(1),
    token_type_hint: z.string().optional(),
});

export interface RevocationHandlerOptions {
    provider: OAuthServer;
}

/**
 * `POST /revoke`: answers 200 whether or not the token was known.
 *
 * @see https://www.rfc-editor.org/rfc/rfc7009
 */
export function revocationHandler({ provider }: RevocationHandlerOptions): RequestHandler {
    const router = express.Router();
    router.use(express.urlencoded({ extended: false }), express.json());

    router.post('/', async (req, res) => {
        res.set('Cache-Control', 'no-store');
        try {
            const parsed = RevocationRequestSchema.safeParse(req.body ?? {});
            if (!parsed.success) {
                throw new InvalidRequestError('token is required');
            }
            await provider.revokeToken(parsed.data.token);
            res.status(200).end();
        } catch (error) {
            sendOAuthError(res, error);
        }
    });
    router.all('/', methodNotAllowed(['POST']));

    return router;
}
