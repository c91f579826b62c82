/**
 * Knowledge Retrieval API - User Authentication Middleware
 *
 * Validates Firebase ID tokens and attaches the caller's Principal
 * (account, tenant, workspace role) to the request.
 *
 * Tenant and role come from custom claims set when the account joins a
 * workspace:
 *   tenant_id - workspace the caller acts in (required)
 *   role      - owner | admin | editor | normal | dataset_operator (default normal)
 *
 * Configuration:
 *   USER_AUTH_ENABLED - Enforce authentication (always on in production)
 *   DEV_TENANT_ID     - Tenant of the development bypass principal
 *
 * @example
 * ```typescript
 * app.post('/datasets/retrieval', userAuthMiddleware, handler);
 *
 * // In the handler
 * const principal = getPrincipal(req);
 * ```
 */

import { Request, Response, NextFunction } from 'express';
import { getAuth, DecodedIdToken } from 'firebase-admin/auth';
import { z } from 'zod';
import { DEV_TENANT_ID, IS_PRODUCTION, USER_AUTH_ENABLED } from '../config';
import { ApiError, errors } from '../errors';
import { getFirebaseApp } from '../firebase';
import type { Principal } from '../types';
import { getRequestContext, hashText, isValidTenantId, logInfo, logWarn } from '../utils';

// =============================================================================
// Configuration
// =============================================================================

// Startup validation - log loud warning if auth is disabled
if (!USER_AUTH_ENABLED) {
  logWarn('USER_AUTH_ENABLED=false - using development bypass principal. Never deploy this way.');
}

// Crash immediately if someone tries to disable auth in production
if (IS_PRODUCTION && process.env.USER_AUTH_ENABLED === 'false') {
  console.error('CRITICAL: Cannot disable USER_AUTH_ENABLED in production. Refusing to start.');
  process.exit(1);
}

/**
 * Development principal. Never used in production - see guards above.
 */
const DEV_PRINCIPAL: Principal = {
  accountId: 'dev-user-local',
  tenantId: DEV_TENANT_ID,
  role: 'owner',
};

// =============================================================================
// Types
// =============================================================================

declare global {
  namespace Express {
    interface Request {
      /** Authenticated caller (set by userAuthMiddleware) */
      principal?: Principal;
    }
  }
}

export type TokenVerifier = (token: string) => Promise<DecodedIdToken>;

export interface UserAuthOptions {
  enabled?: boolean;
  verifyToken?: TokenVerifier;
}

const PrincipalClaimsSchema = z.object({
  tenant_id: z.string().refine(isValidTenantId, 'Invalid tenant_id claim'),
  role: z.enum(['owner', 'admin', 'editor', 'normal', 'dataset_operator']).default('normal'),
});

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Extract Bearer token from Authorization header
 *
 * @example
 * // Header: "Authorization: Bearer eyJhbGc..."
 * const token = extractBearerToken(req); // "eyJhbGc..."
 */
export function extractBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader) return null;

  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  const token = parts[1].trim();
  return token.length > 0 ? token : null;
}

const verifyFirebaseToken: TokenVerifier = (token) => getAuth(getFirebaseApp()).verifyIdToken(token, true);

function firebaseErrorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Map Firebase verification failures to API errors
 */
export function mapFirebaseError(err: unknown): ApiError {
  switch (firebaseErrorCode(err)) {
    case 'auth/id-token-expired':
      return errors.invalidToken('Authentication token has expired. Please sign in again.');
    case 'auth/id-token-revoked':
      return errors.invalidToken('Authentication token has been revoked. Please sign in again.');
    case 'auth/user-disabled':
      return errors.forbidden('User account has been disabled.');
    case 'auth/argument-error':
    case 'auth/invalid-id-token':
      return errors.invalidToken('Invalid authentication token format.');
  }

  // Fallback to message matching
  const message = (err instanceof Error ? err.message : String(err)).toLowerCase();
  if (message.includes('expired')) {
    return errors.invalidToken('Authentication token has expired. Please sign in again.');
  }
  if (message.includes('revoked')) {
    return errors.invalidToken('Authentication token has been revoked. Please sign in again.');
  }
  if (message.includes('disabled')) {
    return errors.forbidden('User account has been disabled.');
  }
  return errors.invalidToken();
}

/**
 * Build the caller's Principal from a verified token
 */
export function principalFromToken(decoded: DecodedIdToken): Principal {
  const claims = PrincipalClaimsSchema.safeParse(decoded);
  if (!claims.success) {
    throw errors.forbidden('Account is not a member of any workspace.');
  }
  return { accountId: decoded.uid, tenantId: claims.data.tenant_id, role: claims.data.role };
}

function attachPrincipal(req: Request, principal: Principal): void {
  req.principal = principal;
  const ctx = getRequestContext();
  if (ctx) ctx.tenantId = principal.tenantId;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Create the authentication middleware.
 * With auth disabled every request runs as the development principal.
 */
export function createUserAuthMiddleware(options: UserAuthOptions = {}) {
  const enabled = options.enabled ?? USER_AUTH_ENABLED;
  const verifyToken = options.verifyToken ?? verifyFirebaseToken;

  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    if (!enabled) {
      attachPrincipal(req, { ...DEV_PRINCIPAL });
      return next();
    }

    const token = extractBearerToken(req);
    if (!token) {
      logWarn('User auth: missing bearer token', {
        path: req.path,
        method: req.method,
        hasAuthHeader: !!req.headers.authorization,
      });
      return next(errors.unauthorized('Authentication required. Provide a valid Firebase ID token in the Authorization header.'));
    }

    let decoded: DecodedIdToken;
    try {
      decoded = await verifyToken(token);
    } catch (err) {
      const apiError = mapFirebaseError(err);
      logWarn('User auth: token verification failed', { path: req.path, method: req.method, errorCode: apiError.code });
      return next(apiError);
    }

    try {
      const principal = principalFromToken(decoded);
      attachPrincipal(req, principal);
      logInfo('User authenticated', {
        path: req.path,
        method: req.method,
        uidHash: hashText(principal.accountId).slice(0, 8),
        role: principal.role,
      });
      return next();
    } catch (err) {
      return next(err);
    }
  };
}

export const userAuthMiddleware = createUserAuthMiddleware();

/**
 * Get the authenticated caller (type-safe helper)
 *
 * @throws ApiError UNAUTHORIZED when the auth middleware did not run
 */
export function getPrincipal(req: Request): Principal {
  if (!req.principal) {
    throw errors.unauthorized('User is not authenticated');
  }
  return req.principal;
}
