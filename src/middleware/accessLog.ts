import type { RequestHandler } from 'express';
import debug from 'debug';

const log = debug('http');

export function accessLog(): RequestHandler {
    return (req, res, next) => {
        const start = process.hrtime.bigint();
        res.on('finish', () => {
            const ms = Number(process.hrtime.bigint() - start) / 1e6;
            log('%s %s %d %sms', req.method, req.originalUrl, res.statusCode, ms.toFixed(1));
        });
        next();
    };
}
