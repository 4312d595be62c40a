import { Request, Response, NextFunction } from 'express';
import {
    errorHandler,
    asyncHandler,
    AppError,
    NotFoundError,
    BadRequestError,
} from '../../../../src/presentation/middleware/errorHandler';
import {
    CompositionCancelledError,
    CompositionConfigError,
    RendererUnavailableError,
    ScriptValidationError,
} from '../../../../src/domain/errors/CompositionErrors';

describe('Error Handling Middleware', () => {
    describe('AppError Classes', () => {
        test('AppError should set properties correctly', () => {
            const err = new AppError(418, 'I am a teapot', { hint: 'tea' });
            expect(err.statusCode).toBe(418);
            expect(err.message).toBe('I am a teapot');
            expect(err.details).toEqual({ hint: 'tea' });
            expect(err.name).toBe('AppError');
        });

        test('NotFoundError should default to 404', () => {
            const err = new NotFoundError();
            expect(err.statusCode).toBe(404);
            expect(err.message).toBe('Resource not found');
            expect(err.name).toBe('NotFoundError');
        });

        test('BadRequestError should default to 400', () => {
            const err = new BadRequestError('Bad input');
            expect(err.statusCode).toBe(400);
            expect(err.message).toBe('Bad input');
            expect(err.name).toBe('BadRequestError');
        });
    });

    describe('errorHandler', () => {
        let req: Partial<Request>;
        let res: Partial<Response>;
        let next: NextFunction;

        beforeEach(() => {
            req = {
                method: 'POST',
                path: '/api/compositions'
            };
            res = {
                status: jest.fn().mockReturnThis(),
                json: jest.fn()
            };
            next = jest.fn();
            jest.spyOn(console, 'error').mockImplementation(() => { });
            jest.spyOn(console, 'warn').mockImplementation(() => { });
        });

        afterEach(() => {
            jest.restoreAllMocks();
        });

        test('should handle AppError correctly', () => {
            const err = new BadRequestError('script or sections is required');
            errorHandler(err, req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(400);
            expect(res.json).toHaveBeenCalledWith({
                error: {
                    message: 'script or sections is required',
                    code: 'BadRequestError'
                }
            });
            expect(console.warn).toHaveBeenCalledWith(
                '[WARN] BadRequestError: script or sections is required (POST /api/compositions)'
            );
        });

        test('should map invalid scripts to 400 with details', () => {
            const err = new CompositionConfigError('Invalid script: index 1 is used more than once', ['index 1 is used more than once']);
            errorHandler(err, req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(400);
            expect(res.json).toHaveBeenCalledWith({
                error: {
                    message: 'Invalid script: index 1 is used more than once',
                    code: 'CompositionConfigError',
                    details: ['index 1 is used more than once']
                }
            });
        });

        test('should map script validation errors to 400', () => {
            const err = new ScriptValidationError('Invalid script: / must be object', ['/ must be object']);
            errorHandler(err, req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(400);
            expect(res.json).toHaveBeenCalledWith({
                error: {
                    message: 'Invalid script: / must be object',
                    code: 'ScriptValidationError',
                    details: ['/ must be object']
                }
            });
        });

        test('should map a missing renderer to 503', () => {
            errorHandler(new RendererUnavailableError(), req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(503);
            expect(res.json).toHaveBeenCalledWith({
                error: {
                    message: 'No timeline renderer is configured',
                    code: 'RendererUnavailableError'
                }
            });
            expect(console.error).toHaveBeenCalledWith('[ERROR] RendererUnavailableError: No timeline renderer is configured');
        });

        test('should reject malformed JSON bodies', () => {
            const err = Object.assign(new SyntaxError('Unexpected token } in JSON'), { body: '{"script": }' });
            errorHandler(err, req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(400);
            expect(res.json).toHaveBeenCalledWith({
                error: {
                    message: 'Request body is not valid JSON',
                    code: 'BadRequestError'
                }
            });
        });

        test('should handle generic Error as 500 Internal Server Error (production)', () => {
            const originalEnv = process.env.NODE_ENV;
            process.env.NODE_ENV = 'production';

            const err = new Error('Catalog disk unavailable');
            errorHandler(err, req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(500);
            expect(res.json).toHaveBeenCalledWith({
                error: {
                    message: 'Internal server error',
                    code: 'INTERNAL_ERROR'
                }
            });
            expect(console.error).toHaveBeenCalled();

            process.env.NODE_ENV = originalEnv;
        });

        test('should show error details in non-production', () => {
            const originalEnv = process.env.NODE_ENV;
            process.env.NODE_ENV = 'development';

            errorHandler(new CompositionCancelledError(), req as Request, res as Response, next);

            expect(res.status).toHaveBeenCalledWith(500);
            expect(res.json).toHaveBeenCalledWith({
                error: {
                    message: 'Composition was cancelled',
                    code: 'INTERNAL_ERROR'
                }
            });

            process.env.NODE_ENV = originalEnv;
        });
    });

    describe('asyncHandler', () => {
        test('should execute the function and catch errors', async () => {
            const mockFn = jest.fn().mockRejectedValue(new Error('Async error'));
            const req = {} as Request;
            const res = {} as Response;
            const next = jest.fn();

            const wrapped = asyncHandler(mockFn);
            await wrapped(req, res, next);

            expect(mockFn).toHaveBeenCalledWith(req, res, next);
            expect(next).toHaveBeenCalledWith(expect.any(Error));
        });

        test('should work with successful async function', async () => {
            const mockFn = jest.fn().mockResolvedValue(undefined);
            const req = {} as Request;
            const res = {} as Response;
            const next = jest.fn();

            const wrapped = asyncHandler(mockFn);
            await wrapped(req, res, next);

            expect(mockFn).toHaveBeenCalled();
            expect(next).not.toHaveBeenCalled();
        });
    });
});
