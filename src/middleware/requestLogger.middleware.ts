// src/middleware/requestLogger.middleware.ts
import { Request, Response, NextFunction } from 'express';
import { container } from 'tsyringe';
import { LoggingService } from '../services/logging.service';

/**
 * Logs each finished request with its status and duration.
 */
export const requestLoggerMiddleware = (req: Request, res: Response, next: NextFunction): void => {
    if (req.url === '/favicon.ico') {
        next();
        return;
    }

    const startedAt = process.hrtime.bigint();
    const logger = container.resolve(LoggingService).getLogger('app', { service: 'http' });

    res.on('finish', () => {
        const { statusCode } = res;
        const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
        const entry = { method: req.method, url: req.originalUrl, statusCode, durationMs };

        if (statusCode >= 500) {
            logger.error(entry, 'Request failed.');
        } else if (statusCode >= 400) {
            logger.warn(entry, 'Request rejected.');
        } else {
            logger.info(entry, 'Request completed.');
        }
    });

    next();
};
