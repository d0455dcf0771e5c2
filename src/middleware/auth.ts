/**
 * API Key Authentication and caller identity
 *
 * `createAuthMiddleware` checks an API key (Bearer token or X-API-Key header)
 * when auth is enabled. `requireUser` resolves the acting user from the
 * `x-user-id` header; every integration route is scoped to that user.
 *
 * @module middleware/auth
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash, timingSafeEqual } from 'crypto';
import { AppError, ErrorCode } from './error-handler';
import { logger } from '../utils/logger';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      userId?: string;
      authenticated?: boolean;
    }
  }
}

export interface AuthConfig {
  enabled: boolean;
  apiKeys: string[];
}

const USER_ID_PATTERN = /^[A-Za-z0-9_.:@-]{1,128}$/;

/**
 * Hash an API key before comparing. Never store or log raw keys.
 */
export function hashApiKey(apiKey: string): Buffer {
  return createHash('sha256').update(apiKey).digest();
}

/**
 * Extract API key from request headers.
 * Checks Authorization: Bearer <key> first, then x-api-key header.
 */
function extractKey(req: Request): string | undefined {
  const authHeader = req.get('authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    return authHeader.slice(7).trim();
  }

  return req.get('x-api-key') || undefined;
}

export function createAuthMiddleware(authConfig: AuthConfig): RequestHandler {
  const accepted = authConfig.apiKeys.map(hashApiKey);

  if (authConfig.enabled && accepted.length === 0) {
    logger.warn('API authentication enabled without any configured keys; every request will be rejected');
  }

  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!authConfig.enabled) {
      req.authenticated = false;
      next();
      return;
    }

    const key = extractKey(req);
    if (!key) {
      next(new AppError(
        ErrorCode.UNAUTHORIZED,
        'Missing API key. Provide via Authorization: Bearer <key> or x-api-key header.',
        401
      ));
      return;
    }

    const keyHash = hashApiKey(key);
    if (!accepted.some((candidate) => timingSafeEqual(candidate, keyHash))) {
      logger.warn('Invalid API key attempt', { keyHashPrefix: keyHash.toString('hex').slice(0, 8) });
      next(new AppError(ErrorCode.UNAUTHORIZED, 'Invalid API key.', 401));
      return;
    }

    req.authenticated = true;
    next();
  };
}

/**
 * Require an `x-user-id` header and expose it as `req.userId`.
 */
export function requireUser(req: Request, _res: Response, next: NextFunction): void {
  const userId = req.header('x-user-id')?.trim();
  if (!userId) {
    next(new AppError(ErrorCode.UNAUTHORIZED, 'Missing x-user-id header.', 401));
    return;
  }
  if (!USER_ID_PATTERN.test(userId)) {
    next(new AppError(ErrorCode.INVALID_REQUEST, 'Malformed x-user-id header.', 400));
    return;
  }

  req.userId = userId;
  next();
}

/**
 * The user resolved by `requireUser`. Throws if the route is mounted without it.
 */
export function currentUser(req: Request): string {
  if (!req.userId) {
    throw new AppError(ErrorCode.UNAUTHORIZED, 'Missing x-user-id header.', 401);
  }
  return req.userId;
}
