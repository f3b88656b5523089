import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Async handler wrapper for express route handlers
 * Forwards rejections to the error handler instead of leaving them unhandled
 * @param fn Express route handler function
 */
export const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
    (req, res, next) => {
        fn(req, res, next).catch(next);
    };
