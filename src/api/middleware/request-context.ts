// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST CONTEXT — Request Ids, Caller Identity and Access Logging
// ═══════════════════════════════════════════════════════════════════════════════
//
// Identity verification happens upstream: the gateway in front of this service
// authenticates the caller and forwards the user id in `X-User-Id`.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

import {
  logRequest,
  runWithLoggingContext,
  setContextUserId,
} from '../../observability/logging/index.js';
import { UnauthorizedError } from './error-handler.js';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      userId?: string;
    }
  }
}

export const REQUEST_ID_HEADER = 'x-request-id';
export const USER_ID_HEADER = 'x-user-id';

const MAX_USER_ID_LENGTH = 128;
const USER_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Assign a request id, log the response when it finishes, and run the rest
 * of the chain inside a logging context carrying the id.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const requestId = headerValue(req, REQUEST_ID_HEADER) ?? uuidv4();
  const start = Date.now();

  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    logRequest({
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      duration: Date.now() - start,
      userId: req.userId,
    });
  });

  runWithLoggingContext({ requestId }, () => next());
}

/**
 * Require the caller's user id. Ids are used as store path segments, so
 * anything beyond a plain token is rejected.
 */
export function requireUser(req: Request, _res: Response, next: NextFunction): void {
  const userId = headerValue(req, USER_ID_HEADER);
  if (!userId || userId.length > MAX_USER_ID_LENGTH || !USER_ID_PATTERN.test(userId)) {
    next(new UnauthorizedError());
    return;
  }

  req.userId = userId;
  setContextUserId(userId);
  next();
}

/**
 * The id `requireUser` attached. Throws if the middleware did not run.
 */
export function currentUserId(req: Request): string {
  if (!req.userId) {
    throw new UnauthorizedError();
  }
  return req.userId;
}
