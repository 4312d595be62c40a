import { Request, Response, NextFunction } from 'express';
import {
    CompositionConfigError,
    RendererUnavailableError,
    ScriptValidationError,
} from '../../domain/errors/CompositionErrors';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string,
        public readonly details?: unknown
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request', details?: unknown) {
        super(400, message, details);
        this.name = 'BadRequestError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
        details?: unknown;
    };
}

/**
 * Maps domain errors onto HTTP errors; anything else stays as is.
 */
function toAppError(err: Error): Error {
    if (err instanceof SyntaxError && 'body' in err) {
        return new BadRequestError('Request body is not valid JSON');
    }
    if (err instanceof CompositionConfigError || err instanceof ScriptValidationError) {
        const appError = new BadRequestError(err.message, err.details);
        appError.name = err.name;
        return appError;
    }
    if (err instanceof RendererUnavailableError) {
        const appError = new AppError(503, err.message);
        appError.name = err.name;
        return appError;
    }
    return err;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    error: Error,
    req: Request,
    res: Response,
    // Express recognizes error handlers by their four parameters
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    next: NextFunction
): void {
    const err = toAppError(error);

    if (err instanceof AppError && err.statusCode < 500) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (err instanceof AppError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.name,
                ...(err.details !== undefined ? { details: err.details } : {}),
            },
        };
        res.status(err.statusCode).json(response);
        return;
    }

    // Generic server error
    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
