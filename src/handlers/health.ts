import type { RequestHandler } from 'express';
import debug from 'debug';

const log = debug('http:health');

/** Liveness probe of the store behind the tools. Throws or rejects when unhealthy. */
export type HealthCheck = () => Promise<void> | void;

/**
 * `GET /health`. Reports the delegated store only; OAuth and session state play no part.
 */
export function healthHandler(check?: HealthCheck): RequestHandler {
    return async (_req, res) => {
        const timestamp = new Date().toISOString();
        try {
            await check?.();
            res.status(200).json({ status: 'healthy', timestamp });
        } catch (error) {
            log('health check failed', error);
            res.status(503).json({
                status: 'unhealthy',
                error: error instanceof Error ? error.message : String(error),
                timestamp,
            });
        }
    };
}
