import express, { type RequestHandler } from 'express';
import { methodNotAllowed } from './errors.js';

/** Serves a static discovery document. */
export function metadataHandler(metadata: object): RequestHandler {
    const router = express.Router();

    router.get('/', (_req, res) => {
        res.status(200).json(metadata);
    });
    router.all('/', methodNotAllowed(['GET']));

    return router;
}
