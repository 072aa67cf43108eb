/**
 * API Key Authentication Middleware
 *
 * Authentication model:
 * - LENDER: a lender's back office, scoped to that lender's applications
 * - ADMIN: program administrators
 *
 * Keys are sent as `Authorization: Bearer <api_key>` and looked up by their
 * SHA-256 hash; the key itself is never stored.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import crypto from 'crypto';
import { Clock } from '../../domain-types';
import { Actor } from '../../domain/application/application-types';
import { ApiClientType, CredentialStore } from '../../store/lifecycle-store';
import { describeError } from '../../errors';
import { ApiCredentials, ApiResponse } from '../types';

function reject(res: Response, status: number, code: string, message: string): void {
  const response: ApiResponse<null> = {
    success: false,
    error: { code, message },
  };
  res.status(status).json(response);
}

export function hashApiKey(apiKey: string): string {
  return crypto.createHash('sha256').update(apiKey).digest('hex');
}

export function createAuthMiddleware(credentials: CredentialStore, clock: Clock): RequestHandler {
  return async function authenticate(req: Request, res: Response, next: NextFunction): Promise<void> {
    const authHeader = req.headers.authorization;
    if (!authHeader) {
      reject(res, 401, 'MISSING_AUTHORIZATION', 'Authorization header is required');
      return;
    }

    // Expect: "Bearer <api_key>"
    const parts = authHeader.split(' ');
    if (parts.length !== 2 || parts[0] !== 'Bearer') {
      reject(res, 401, 'INVALID_AUTHORIZATION_FORMAT', 'Authorization header must be: Bearer <api_key>');
      return;
    }

    try {
      const record = await credentials.findApiKeyByHash(hashApiKey(parts[1]));
      if (!record) {
        reject(res, 401, 'INVALID_API_KEY', 'API key is invalid or not found');
        return;
      }
      if (record.revokedAt) {
        reject(res, 401, 'API_KEY_REVOKED', 'API key has been revoked');
        return;
      }
      if (record.expiresAt && record.expiresAt.getTime() < clock().getTime()) {
        reject(res, 401, 'API_KEY_EXPIRED', 'API key has expired');
        return;
      }
      if (record.clientType === 'LENDER' && !record.lenderId) {
        reject(res, 401, 'INVALID_API_KEY', 'Lender key is not bound to a lender');
        return;
      }

      req.credentials = {
        apiKeyId: record.apiKeyId,
        clientType: record.clientType,
        userId: record.userId,
        lenderId: record.lenderId,
      };
      next();
    } catch (error) {
      console.error('[Auth] Middleware error', { correlationId: req.correlationId, error: describeError(error) });
      reject(res, 500, 'AUTH_ERROR', 'Authentication failed');
    }
  };
}

/**
 * Client type check middleware factory
 */
export function requireClientType(...allowedTypes: ApiClientType[]): RequestHandler {
  return function checkClientType(req: Request, res: Response, next: NextFunction): void {
    if (!req.credentials) {
      reject(res, 401, 'NOT_AUTHENTICATED', 'Authentication required');
      return;
    }
    if (!allowedTypes.includes(req.credentials.clientType)) {
      reject(res, 403, 'CLIENT_TYPE_NOT_ALLOWED', `This endpoint requires client type: ${allowedTypes.join(' or ')}`);
      return;
    }
    next();
  };
}

/**
 * Lifecycle actor for an authenticated request. Throws when the request
 * reached a protected route without credentials.
 */
export function actorFromCredentials(credentials: ApiCredentials | undefined): Actor {
  if (!credentials) {
    throw new Error('NOT_AUTHENTICATED');
  }
  if (credentials.clientType === 'LENDER' && credentials.lenderId) {
    return { kind: 'LENDER', userId: credentials.userId, lenderId: credentials.lenderId };
  }
  if (credentials.clientType === 'ADMIN') {
    return { kind: 'ADMIN', userId: credentials.userId };
  }
  throw new Error('NOT_AUTHENTICATED');
}
