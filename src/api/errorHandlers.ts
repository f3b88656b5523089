import { Request, Response, NextFunction } from 'express';
import { NotFoundError, RequestValidationError } from '../types/errors';
import { logger } from '../utils/logger';

/**
 * Generic error handler for API routes
 * Transforms errors into appropriate HTTP responses
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
    if (err instanceof RequestValidationError) {
        return res.status(400).json({
            status: 'error',
            error: 'Bad request',
            message: err.message
        });
    }

    if (err instanceof NotFoundError) {
        return res.status(404).json({
            status: 'error',
            error: 'Not found',
            message: err.message
        });
    }

    // General errors
    const errorMessage = err instanceof Error ? err.message : String(err);
    const stackTrace = err instanceof Error && err.stack ? `\nStack: ${err.stack}` : '';
    logger.error(`[API Error] ${req.method} ${req.originalUrl}: ${errorMessage}${stackTrace}`);

    return res.status(500).json({
        status: 'error',
        error: 'Internal server error',
        message: process.env.NODE_ENV === 'production'
            ? 'An unexpected error occurred'
            : errorMessage
    });
}

export function notFoundHandler(req: Request, res: Response) {
    res.status(404).json({
        status: 'error',
        error: 'Not found',
        message: `No route for ${req.method} ${req.path}`
    });
}
