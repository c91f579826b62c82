/**
 * Knowledge Retrieval API - Request Validation Middleware
 *
 * Zod-based validation for request body and URL params.
 * Failures are reported through the shared ApiError contract so the
 * global error handler shapes every 400 response the same way.
 *
 * @example
 * ```typescript
 * router.post('/datasets/retrieval', validateBody(RetrievalRequestSchema), handler);
 * ```
 */

import { Request, Response, NextFunction } from 'express';
import { ZodSchema, ZodError, ZodType, ZodTypeDef } from 'zod';
import { ApiError, errors } from '../errors';
import { logWarn } from '../utils';

// =============================================================================
// Type Definitions
// =============================================================================

declare global {
  namespace Express {
    interface Request {
      /** Validated URL parameters */
      validatedParams?: unknown;
    }
  }
}

/**
 * Validation error detail for a single field
 */
export interface ValidationErrorDetail {
  /** Field path (e.g., 'metadata_condition.conditions[0].name') */
  field: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code (e.g., 'too_big', 'invalid_type') */
  code?: string;
}

export interface ValidationOptions {
  /** @default 'Request validation failed' */
  errorMessage?: string;
  /** @default false */
  includeErrorCodes?: boolean;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format Zod path array to a readable field path
 *
 * @example
 * ['metadata_condition', 'conditions', 0, 'name'] => 'metadata_condition.conditions[0].name'
 */
export function formatFieldPath(path: PropertyKey[]): string {
  if (path.length === 0) return '(root)';

  return path.reduce<string>((result, segment, index) => {
    if (typeof segment === 'number') {
      return `${result}[${segment}]`;
    }
    if (typeof segment === 'symbol') {
      return index === 0 ? String(segment) : `${result}.${String(segment)}`;
    }
    return index === 0 ? segment : `${result}.${segment}`;
  }, '');
}

export function formatZodIssues(error: ZodError<unknown>, includeErrorCodes = false): ValidationErrorDetail[] {
  return error.issues.map((issue) => {
    const detail: ValidationErrorDetail = {
      field: formatFieldPath(issue.path),
      message: issue.message,
    };
    if (includeErrorCodes) {
      detail.code = issue.code;
    }
    return detail;
  });
}

/**
 * Convert a Zod failure into a VALIDATION_ERROR ApiError.
 * The first issue becomes the message so single-field failures read naturally.
 */
export function zodToApiError(error: ZodError<unknown>, options: ValidationOptions = {}): ApiError {
  const { errorMessage = 'Request validation failed', includeErrorCodes = false } = options;
  const details = formatZodIssues(error, includeErrorCodes);
  const message = details.length === 1 ? `${details[0].field}: ${details[0].message}` : errorMessage;
  return errors.validation(message, { fields: details });
}

/**
 * Parse data against a schema, throwing a VALIDATION_ERROR on failure.
 * Standalone validation for code paths that are not express handlers.
 */
export function parseOrThrow<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, options: ValidationOptions = {}): T {
  const result = schema.safeParse(data);
  if (!result.success) throw zodToApiError(result.error, options);
  return result.data;
}

// =============================================================================
// Core Validation Middleware
// =============================================================================

/**
 * Create middleware that validates request body against a Zod schema.
 * The validated and transformed data replaces req.body.
 */
export function validateBody<T>(schema: ZodSchema<T>, options: ValidationOptions = {}) {
  const { errorMessage = 'Request body validation failed', ...opts } = options;

  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const error = zodToApiError(result.error, { errorMessage, ...opts });
      logWarn('Request body validation failed', {
        path: req.path,
        method: req.method,
        errorCount: result.error.issues.length,
        fields: result.error.issues.map((i) => formatFieldPath(i.path)),
      });
      next(error);
      return;
    }

    req.body = result.data;
    next();
  };
}

/**
 * Create middleware that validates URL params against a Zod schema.
 * Validated data is stored in req.validatedParams.
 */
export function validateParams<T>(schema: ZodSchema<T>, options: ValidationOptions = {}) {
  const { errorMessage = 'URL parameter validation failed', ...opts } = options;

  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.params);

    if (!result.success) {
      logWarn('Request params validation failed', {
        path: req.path,
        method: req.method,
        errorCount: result.error.issues.length,
      });
      next(zodToApiError(result.error, { errorMessage, ...opts }));
      return;
    }

    req.validatedParams = result.data;
    next();
  };
}

/**
 * Read params stored by validateParams, re-checking them against the schema
 */
export function getValidatedParams<T>(req: Request, schema: ZodSchema<T>): T {
  return parseOrThrow(schema, req.validatedParams ?? req.params);
}
