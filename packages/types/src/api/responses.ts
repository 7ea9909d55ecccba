/**
 * API Response Types
 *
 * Error envelope shared by every JSON endpoint.
 */

/** Single failed validation rule */
export type ValidationErrorDetail = {
  /** JSON path to the invalid field */
  path: string;
  message: string;
  /** Zod issue code */
  code: string;
};

/** Standard error response */
export type ApiErrorResponse = {
  error: string;
  code?: string;
  details?: Array<ValidationErrorDetail>;
};
