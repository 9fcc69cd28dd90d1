/**
 * Request Correlation ID Middleware
 *
 * Reuses a safe incoming X-Request-ID or generates a UUID, exposes it on the
 * request and echoes it in the response headers.
 */

import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

export const REQUEST_ID_HEADER = 'X-Request-ID';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER);
    // Alphanumeric and hyphens only, at most 64 chars
    const requestId = incoming && /^[\w-]{1,64}$/.test(incoming) ? incoming : randomUUID();

    req.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);
    next();
  };
}
