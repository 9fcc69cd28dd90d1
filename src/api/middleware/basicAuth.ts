/**
 * HTTP Basic Authentication (RFC 7617).
 *
 * When authentication is enabled every guarded route requires
 * `Authorization: Basic base64(user:pass)` matching the configured pair;
 * anything else is passed on as UnauthorizedError (401 with a Basic challenge).
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import * as crypto from 'crypto';
import type { AuthConfig } from '../../config/index.js';
import { UnauthorizedError } from '../../errors/index.js';

export const AUTH_REALM = 'GitConfigServer';

export interface BasicCredentials {
  username: string;
  password: string;
}

/**
 * Credentials from an Authorization header, or null when it is absent or not Basic.
 */
export function parseBasicAuthorization(header: string | undefined): BasicCredentials | null {
  if (!header) return null;

  const value = header.trim();
  const spaceIndex = value.indexOf(' ');
  if (spaceIndex <= 0 || value.substring(0, spaceIndex).toLowerCase() !== 'basic') {
    return null;
  }

  const decoded = Buffer.from(value.substring(spaceIndex).trim(), 'base64').toString('utf-8');
  const colonIndex = decoded.indexOf(':');
  if (colonIndex < 0) {
    return { username: decoded, password: '' };
  }
  return {
    username: decoded.substring(0, colonIndex),
    password: decoded.substring(colonIndex + 1),
  };
}

/**
 * Constant-time string comparison (digests first so lengths always match).
 */
function safeEqual(a: string, b: string): boolean {
  const digestA = crypto.createHash('sha256').update(a).digest();
  const digestB = crypto.createHash('sha256').update(b).digest();
  return crypto.timingSafeEqual(digestA, digestB);
}

export function isAuthorized(auth: AuthConfig, header: string | undefined): boolean {
  if (!auth.required) return true;
  const credentials = parseBasicAuthorization(header);
  if (!credentials) return false;

  const userOk = safeEqual(credentials.username, auth.username);
  const passOk = safeEqual(credentials.password, auth.password);
  return userOk && passOk;
}

export function basicAuthMiddleware(auth: AuthConfig): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (isAuthorized(auth, req.get('Authorization'))) {
      next();
      return;
    }
    next(new UnauthorizedError());
  };
}
