import type {
  Request,
  Response,
  NextFunction,
  ErrorRequestHandler,
} from 'express';
import type { AppError } from '../types/errors.ts';
import { getRequestLogger } from '../types/request.ts';
import { createChildLogger } from '../utils/logging/logger.ts';

const moduleLogger = createChildLogger('http:error');

/** Body-parser marks its failures with an HTTP status */
function resolveStatus(err: AppError & { status?: number }): number {
  const status = err.statusCode ?? err.status;
  return status !== undefined && status >= 400 && status < 600 ? status : 500;
}

const errorHandler: ErrorRequestHandler = (
  err: AppError,
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  const logger = getRequestLogger(req, moduleLogger).child({
    middleware: 'errorHandler',
  });

  // Nothing sensible can be sent once the reply has started
  if (res.headersSent) {
    logger.error(
      { action: 'errorHandler', err },
      'Error after response headers were sent',
    );
    next(err);
    return;
  }

  const statusCode = resolveStatus(err);
  const message =
    statusCode >= 500 && !err.statusCode
      ? 'Internal Server Error'
      : err.message || 'Internal Server Error';

  const logContext = {
    action: 'errorHandler',
    err,
    statusCode,
    code: err.code,
    path: req.path,
    method: req.method,
  };
  if (statusCode >= 500) {
    logger.error(logContext, 'Error occurred');
  } else {
    logger.warn(logContext, 'Request failed');
  }

  res.status(statusCode).json({
    error: message,
    ...(err.code ? { code: err.code } : {}),
    ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
  });
};

export { errorHandler };
