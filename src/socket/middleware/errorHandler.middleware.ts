// src/socket/middleware/errorHandler.middleware.ts
import { Request, Response, NextFunction } from 'express';
import { container } from 'tsyringe';
import { LoggingService } from '../../services/logging.service';
import { ConfigService } from '../../config/config.service';
import { RequestValidationError } from '../../types/legacySystem.types';
import { getErrorMessageAndStack } from '../../utils/errorUtils';

/**
 * Error shape the handler understands. Domain errors (`UploadServiceError` and subclasses)
 * carry `status` and `isOperational`; body-parser errors carry `statusCode`.
 */
interface HttpError extends Error {
    status?: number;
    statusCode?: number;
    /**
     * Operational errors (validation, unknown task, busy task) are expected and their message
     * is returned to the client. Anything else is a server error.
     */
    isOperational?: boolean;
}

const requestIdOf = (res: Response): string | undefined =>
    typeof res.locals.requestId === 'string' ? res.locals.requestId : undefined;

/**
 * Global error handler: logs the error and answers with a JSON body.
 * Must be registered after every route.
 */
export const errorHandlerMiddleware = (
    err: HttpError,
    req: Request,
    res: Response,
    // Express recognizes error handlers by their four parameters
    _next: NextFunction,
): void => {
    const logger = container.resolve(LoggingService).getLogger('app', {
        service: 'ErrorHandler',
        requestId: requestIdOf(res),
        method: req.method,
        url: req.originalUrl,
    });

    const statusCode = err.status || err.statusCode || 500;
    const isServerError = !err.isOperational || statusCode >= 500;
    const { message, stack } = getErrorMessageAndStack(err);

    if (isServerError) {
        logger.error({ event: 'request_failed', statusCode, err: { message, stack } }, 'Unhandled server error.');
    } else {
        logger.warn({ event: 'request_rejected', statusCode, errorMessage: message }, 'Handled operational error.');
    }

    const clientMessage = statusCode >= 500 && container.resolve(ConfigService).isProduction
        ? 'An unexpected error occurred on the server.'
        : message || 'Internal Server Error';

    if (res.headersSent) {
        logger.warn({ event: 'error_after_headers_sent', errorMessage: message }, 'Headers already sent, cannot send error body.');
        return;
    }
    res.status(statusCode).json({
        status: 'error',
        statusCode,
        message: clientMessage,
        ...(err instanceof RequestValidationError ? { issues: err.issues } : {}),
    });
};

/**
 * Turns requests to unknown routes into a 404 for `errorHandlerMiddleware`.
 */
export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
    const error: HttpError = new Error(`Not Found - ${req.originalUrl}`);
    error.status = 404;
    error.isOperational = true;
    next(error);
};
