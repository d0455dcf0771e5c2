/**
 * Security Middleware
 *
 * Security headers and CORS for the integration API.
 *
 * @module middleware/security
 */

import helmet from 'helmet';
import cors from 'cors';
import type { RequestHandler } from 'express';
import { AppError, ErrorCode } from './error-handler';
import type { AppConfig } from '../config/env';

export type CorsConfig = Pick<AppConfig['security'], 'allowedOrigins' | 'corsCredentials'>;

/**
 * The API serves JSON only, so the CSP locks everything down.
 */
export function createSecurityHeadersMiddleware(): RequestHandler {
  return helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
    frameguard: { action: 'deny' },
    noSniff: true,
    referrerPolicy: { policy: 'no-referrer' },
  });
}

export function isOriginAllowed(origin: string | undefined, allowedOrigins: string[]): boolean {
  // Server-to-server callers send no Origin
  if (!origin) {
    return true;
  }
  return allowedOrigins.includes('*') || allowedOrigins.includes(origin);
}

/**
 * @example
 * ```typescript
 * app.use(createCorsMiddleware({ allowedOrigins: ['https://seller.example.com'], corsCredentials: true }));
 * ```
 */
export function createCorsMiddleware(config: CorsConfig): RequestHandler {
  const { allowedOrigins, corsCredentials } = config;

  return cors({
    origin: (origin, callback) => {
      if (isOriginAllowed(origin, allowedOrigins)) {
        callback(null, true);
      } else {
        callback(new AppError(ErrorCode.FORBIDDEN, `Origin ${origin} not allowed by CORS`, 403));
      }
    },
    credentials: corsCredentials,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key', 'X-Request-ID', 'X-User-ID'],
    exposedHeaders: ['X-Request-ID'],
    maxAge: 86400,
  });
}
