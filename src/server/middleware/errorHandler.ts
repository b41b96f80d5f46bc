import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { getEnv } from '../config/env.js';
import { NotFoundError, toAppError } from '../types/errors.js';
import type { ErrorResponse } from '../types/errors.js';

/**
 * Transform any thrown value into the standardized ErrorResponse body.
 * Non-operational errors keep their message out of the response.
 */
export function transformErrorToResponse(err: unknown, req: Request): ErrorResponse {
    const appError = toAppError(err);
    const exposeDetails = appError.isOperational;

    const response: ErrorResponse = {
        error: appError.name === 'AppError' ? 'InternalServerError' : appError.name,
        code: appError.code,
        message: exposeDetails ? appError.message : 'An unexpected error occurred',
        statusCode: appError.statusCode,
        timestamp: new Date().toISOString(),
        path: req.originalUrl,
    };

    if (exposeDetails && appError.context) {
        response.context = appError.context;
    }
    if (getEnv().NODE_ENV === 'development' && appError.stack) {
        response.stack = appError.stack;
    }
    return response;
}

/**
 * Catch-all for routes no router matched
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    const errorResponse = transformErrorToResponse(err, req);
    const logContext = {
        path: req.path,
        method: req.method,
        statusCode: errorResponse.statusCode,
        code: errorResponse.code,
        error: err instanceof Error ? { message: err.message, stack: err.stack } : String(err),
    };

    // Expected client errors are not worth an error-level line
    if (err instanceof NotFoundError || errorResponse.statusCode < 500) {
        logger.info(logContext, 'Request failed');
    } else {
        logger.error(logContext, 'Request failed');
    }

    if (res.headersSent) {
        next(err);
        return;
    }
    res.status(errorResponse.statusCode).json(errorResponse);
}
