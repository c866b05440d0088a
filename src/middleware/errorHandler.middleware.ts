// src/middleware/errorHandler.middleware.ts
import { Request, Response, NextFunction } from 'express';
import { container } from 'tsyringe';
import { ConfigService } from '../config/config.service';
import { LoggingService } from '../services/logging.service';
import { DatasetError } from '../errors/dataset.errors';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * Error carrying an HTTP status. `isOperational` marks expected failures
 * (bad input, missing route, unavailable dataset) as opposed to bugs.
 */
export interface HttpError extends Error {
    status?: number;
    statusCode?: number;
    isOperational?: boolean;
}

export interface ErrorResponseBody {
    status: 'error';
    statusCode: number;
    message: string;
}

const resolveStatus = (err: HttpError): number => {
    if (err instanceof DatasetError) return err.statusCode;
    return err.status || err.statusCode || 500;
};

/**
 * Builds the JSON body sent for an error. Server-side messages are masked in production.
 */
export const buildErrorResponse = (err: HttpError, isProduction: boolean): ErrorResponseBody => {
    const statusCode = resolveStatus(err);
    const message = err.message || 'Internal Server Error';
    const clientMessage = statusCode === 500 && isProduction
        ? 'An unexpected error occurred on the server.'
        : message;
    return { status: 'error', statusCode, message: clientMessage };
};

export const errorHandlerMiddleware = (
    err: HttpError,
    req: Request,
    res: Response,
    // Express recognizes error handlers by their four parameters.
    next: NextFunction
): void => {
    const logger = container.resolve(LoggingService).getLogger('app', { service: 'errorHandler' })
        .child({ method: req.method, url: req.originalUrl });
    const configService = container.resolve(ConfigService);

    const body = buildErrorResponse(err, configService.isProduction);
    const isServerError = !err.isOperational || body.statusCode >= 500;
    const { message, stack } = getErrorMessageAndStack(err);

    if (isServerError) {
        logger.error({ statusCode: body.statusCode, errorMessage: message, stack }, 'Server error while handling request.');
    } else {
        logger.warn({ statusCode: body.statusCode, errorMessage: message }, 'Handled operational error.');
    }

    if (res.headersSent) {
        logger.warn({ errorMessage: message }, 'Headers already sent. Cannot send error response.');
        return;
    }
    res.status(body.statusCode).json(body);
};

export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
    const error: HttpError = new Error(`Not Found - ${req.originalUrl}`);
    error.status = 404;
    error.isOperational = true;
    next(error);
};
