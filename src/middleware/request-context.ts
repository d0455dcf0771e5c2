/**
 * Request Context Middleware
 *
 * Adds request ID (and the caller's user id, when sent) to all requests for
 * correlation and tracing.
 *
 * @module middleware/request-context
 */

import { Request, Response, NextFunction } from 'express';
import { generateRequestId, runWithContext } from '../utils/logger';

/**
 * Middleware to add request ID and context to all requests
 */
export const requestContextMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  // Get request ID from header or generate new one
  const requestId = req.header('x-request-id') || generateRequestId();

  // Set response header
  res.setHeader('x-request-id', requestId);

  // Everything downstream of next() logs with this context
  runWithContext(
    {
      requestId,
      userId: req.header('x-user-id'),
      method: req.method,
      path: req.path
    },
    () => next()
  );
};
