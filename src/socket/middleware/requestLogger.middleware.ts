// src/socket/middleware/requestLogger.middleware.ts
import { Request, Response, NextFunction } from 'express';
import { container } from 'tsyringe';
import { v4 as uuidv4 } from 'uuid';
import { LoggingService } from '../../services/logging.service';

/**
 * Tags each request with an id in `res.locals.requestId` and logs it once the response
 * is sent. Socket.IO handshakes and favicon requests are skipped.
 */
export const requestLoggerMiddleware = (req: Request, res: Response, next: NextFunction): void => {
    if (req.url.startsWith('/socket.io/') || req.url === '/favicon.ico') {
        return next();
    }

    const requestId = uuidv4();
    res.locals.requestId = requestId;
    const startedAt = process.hrtime.bigint();
    const logger = container.resolve(LoggingService).getLogger('app', { service: 'RequestLogger', requestId });

    res.on('finish', () => {
        const { statusCode } = res;
        const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
        const entry = { event: 'request_completed', method: req.method, url: req.originalUrl, statusCode, durationMs };

        if (statusCode >= 500) {
            logger.error(entry);
        } else if (statusCode >= 400) {
            logger.warn(entry);
        } else {
            logger.info(entry);
        }
    });

    next();
};
