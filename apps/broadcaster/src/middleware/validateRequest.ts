import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { ZodError } from 'zod';
import type {
  ValidationErrorDetail,
  ValidationSchema,
} from '../types/errors.ts';
import { getRequestLogger } from '../types/request.ts';
import { createChildLogger } from '../utils/logging/logger.ts';

const moduleLogger = createChildLogger('http:validation');

type ValidationTarget = keyof ValidationSchema;

/** Error code and log message per request part */
const TARGETS: Record<ValidationTarget, { code: string; label: string }> = {
  params: {
    code: 'INVALID_ROUTE_PARAMETERS',
    label: 'Route parameters validation failed',
  },
  query: {
    code: 'INVALID_QUERY_PARAMETERS',
    label: 'Query parameters validation failed',
  },
  body: {
    code: 'INVALID_REQUEST_BODY',
    label: 'Request body validation failed',
  },
};

const TARGET_ORDER: readonly ValidationTarget[] = ['params', 'query', 'body'];

/**
 * Validation middleware factory
 * @param schema - Zod schemas for body, query, and params
 * @returns Express middleware function
 */
export function validateRequest(schema: ValidationSchema): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const logger = getRequestLogger(req, moduleLogger).child({
      middleware: 'validateRequest',
    });

    for (const target of TARGET_ORDER) {
      const targetSchema = schema[target];
      if (!targetSchema) continue;

      const result = targetSchema.safeParse(req[target]);
      if (!result.success) {
        const errors = mapZodErrors(result.error);
        logger.warn(
          { action: 'validateRequest', target, errors },
          TARGETS[target].label,
        );

        res.status(400).json({
          error: 'Validation error',
          code: TARGETS[target].code,
          details: errors,
        });
        return;
      }

      // Replace with parsed data (Express 5 exposes query through a getter)
      Object.defineProperty(req, target, {
        value: result.data,
        writable: true,
        enumerable: true,
        configurable: true,
      });
    }

    next();
  };
}

/**
 * Map Zod errors to validation error details
 */
export function mapZodErrors(error: ZodError): ValidationErrorDetail[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
    code: issue.code,
  }));
}
