import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { getRequestLogger } from '../types/request.ts';
import { createChildLogger } from './logging/logger.ts';

const defaultLogger = createChildLogger('http:async-handler');

/** Controller function returning a promise */
type ControllerHandler = (
  req: Request,
  res: Response,
  next: NextFunction,
) => Promise<void>;

/**
 * Async handler wrapper for Express route handlers
 * Catches promise rejections and answers with the error's status code
 * (500 when it carries none) and a JSON body.
 */
export const asyncHandler = (
  fn: ControllerHandler,
  operation?: string,
): RequestHandler => {
  return async (
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> => {
    try {
      await fn(req, res, next);
    } catch (error) {
      const logger = getRequestLogger(req, defaultLogger);
      logger.error(
        { err: error, operation },
        `Error ${operation || 'in request'}`,
      );

      // A handler that took over the socket cannot be answered
      if (res.headersSent || req.socket.destroyed) {
        return;
      }

      const statusCode =
        error instanceof Error &&
        'statusCode' in error &&
        typeof error.statusCode === 'number'
          ? error.statusCode
          : 500;

      if (statusCode < 500 && error instanceof Error) {
        res.status(statusCode).json({ error: error.message });
        return;
      }

      const responseMessage = operation
        ? `Failed to ${operation}`
        : 'An error occurred';
      res.status(statusCode).json({ error: responseMessage });
    }
  };
};
