/**
 * Knowledge Retrieval API - Standardized Error Handling
 *
 * Provides consistent error response shapes for API consumers.
 * All errors follow the same contract for predictable client-side handling.
 */

import { Request, Response, NextFunction } from 'express';
import { getRequestContext, logError, logWarn } from './utils';

// =============================================================================
// Error Types
// =============================================================================

/**
 * Standard error codes for API responses
 */
export type ApiErrorCode =
  // Auth errors (401)
  | 'UNAUTHORIZED'
  | 'INVALID_TOKEN'
  // Forbidden errors (403)
  | 'FORBIDDEN'
  // Not found errors (404)
  | 'DATASET_NOT_FOUND'
  // Caller-facing conditions (400)
  | 'VALIDATION_ERROR'
  | 'DATASET_NOT_INITIALIZED'
  | 'PROVIDER_NOT_INITIALIZED'
  | 'PROVIDER_QUOTA_EXCEEDED'
  | 'MODEL_CURRENTLY_NOT_SUPPORTED'
  | 'COMPLETION_REQUEST_ERROR'
  // Server errors (5xx)
  | 'VECTOR_STORE_CONNECTION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Standard API error response shape
 */
export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    details?: Record<string, unknown>;
    requestId?: string;
  };
}

/**
 * Custom error class with HTTP status and code
 */
export class ApiError extends Error {
  readonly code: ApiErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ApiErrorCode,
    statusCode: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Object.setPrototypeOf(this, ApiError.prototype);
  }

  toResponse(requestId?: string): ApiErrorResponse {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        requestId,
      },
    };
  }
}

export function isApiError(err: unknown): err is ApiError {
  return err instanceof ApiError;
}

// =============================================================================
// Error Factory Functions
// =============================================================================

export const errors = {
  unauthorized: (message = 'Authentication required') =>
    new ApiError(message, 'UNAUTHORIZED', 401),

  invalidToken: (message = 'Invalid authentication token') =>
    new ApiError(message, 'INVALID_TOKEN', 401),

  forbidden: (message = 'Access denied') =>
    new ApiError(message, 'FORBIDDEN', 403),

  datasetNotFound: (datasetId: string) =>
    new ApiError('Dataset not found.', 'DATASET_NOT_FOUND', 404, { datasetId }),

  validation: (message: string, details?: Record<string, unknown>) =>
    new ApiError(message, 'VALIDATION_ERROR', 400, details),

  datasetNotInitialized: (message = 'The dataset is still being initialized or indexed. Please wait a moment.') =>
    new ApiError(message, 'DATASET_NOT_INITIALIZED', 400),

  providerNotInitialized: (message = 'No Embedding Model available. Please configure a valid provider in the Settings -> Model Provider.') =>
    new ApiError(message, 'PROVIDER_NOT_INITIALIZED', 400),

  providerQuotaExceeded: () =>
    new ApiError(
      "Your quota for the model provider has been exhausted. Please go to Settings -> Model Provider to complete your own provider credentials.",
      'PROVIDER_QUOTA_EXCEEDED',
      400
    ),

  modelNotSupported: (model?: string) =>
    new ApiError(
      'The current embedding model is not supported. Please switch to another model.',
      'MODEL_CURRENTLY_NOT_SUPPORTED',
      400,
      model ? { model } : undefined
    ),

  completionRequest: (description: string) =>
    new ApiError(description, 'COMPLETION_REQUEST_ERROR', 400),

  vectorStoreConnection: (backend: string, reason: string) =>
    new ApiError(`Vector store "${backend}" is unreachable: ${reason}`, 'VECTOR_STORE_CONNECTION_ERROR', 503, { backend }),

  configuration: (message: string, details?: Record<string, unknown>) =>
    new ApiError(message, 'CONFIGURATION_ERROR', 500, details),

  internal: (message = 'An unexpected error occurred') =>
    new ApiError(message, 'INTERNAL_ERROR', 500),
};

// =============================================================================
// Error Handler Middleware
// =============================================================================

/**
 * Global error handler middleware
 *
 * Catches all errors and converts them to standardized API responses.
 * Must be registered LAST in the middleware chain.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  const requestId = getRequestContext()?.requestId;

  if (err instanceof ApiError) {
    if (err.statusCode >= 500) {
      logError('API error', err, { code: err.code, path: req.path });
    } else {
      logWarn('Client error', { code: err.code, message: err.message, path: req.path });
    }
    res.status(err.statusCode).json(err.toResponse(requestId));
    return;
  }

  // express.json() rejects unparseable bodies with a SyntaxError carrying the raw body
  if (err instanceof SyntaxError && 'body' in err) {
    const apiError = errors.validation('Request body is not valid JSON');
    logWarn('Client error', { code: apiError.code, message: apiError.message, path: req.path });
    res.status(apiError.statusCode).json(apiError.toResponse(requestId));
    return;
  }

  logError('Unhandled error', err, { path: req.path, method: req.method });
  const body: ApiErrorResponse = {
    error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred', requestId },
  };
  res.status(500).json(body);
}

export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
