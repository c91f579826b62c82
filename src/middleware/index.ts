/**
 * Knowledge Retrieval API - Middleware Barrel Export
 *
 * 1. **Authentication** - Firebase-based caller authentication
 * 2. **Validation** - Zod-based request validation
 *
 * @example
 * ```typescript
 * import { userAuthMiddleware, validateParams } from './middleware';
 *
 * app.post('/datasets/:datasetId/retrieve',
 *   userAuthMiddleware,
 *   validateParams(DatasetIdParamSchema),
 *   handler
 * );
 * ```
 */

// =============================================================================
// Authentication Middleware
// =============================================================================

export {
  userAuthMiddleware,
  createUserAuthMiddleware,
  getPrincipal,
  extractBearerToken,
  mapFirebaseError,
  principalFromToken,
  type TokenVerifier,
  type UserAuthOptions,
} from './userAuth';

// =============================================================================
// Request Validation Middleware
// =============================================================================

export {
  validateBody,
  validateParams,
  getValidatedParams,
  parseOrThrow,
  zodToApiError,
  formatZodIssues,
  type ValidationErrorDetail,
  type ValidationOptions,
} from './validation';
