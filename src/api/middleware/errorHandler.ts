/**
 * Error and fallback handlers.
 *
 * Maps engine errors onto HTTP: not_found -> Spring-style 404 JSON,
 * bad_request -> 400 with the message, unauthorized -> 401. Express's own
 * client errors (an undecodable percent-escape in a route parameter) keep
 * their 400. Anything else is a 500 with no detail (the detail goes to the log
 * only).
 */

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { isConfigServerError } from '../../errors/index.js';
import { getLogger, registerComponent } from '../../logging/index.js';
import { notFoundBody } from '../../response/index.js';
import { AUTH_REALM } from './basicAuth.js';

registerComponent('api', 'HTTP API');
const logger = getLogger('api');

export function requestPath(req: Request): string {
  const url = req.originalUrl || req.url;
  const query = url.indexOf('?');
  return query >= 0 ? url.substring(0, query) : url;
}

export function sendNotFound(req: Request, res: Response): void {
  res.status(404).json(notFoundBody(requestPath(req)));
}

/**
 * Forward rejected promises from async handlers to the error middleware.
 */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function notFoundHandler(): RequestHandler {
  return (req: Request, res: Response): void => {
    sendNotFound(req, res);
  };
}

function isExpressBadRequest(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'status' in err && err.status === 400;
}

export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (isConfigServerError(err)) {
      switch (err.kind) {
        case 'not_found':
          logger.debug(`${req.method} ${requestPath(req)}: ${err.message}`);
          sendNotFound(req, res);
          return;
        case 'bad_request':
          logger.debug(`${req.method} ${requestPath(req)}: ${err.message}`);
          res.status(400).type('text/plain').send(err.message);
          return;
        case 'unauthorized':
          res.setHeader('WWW-Authenticate', `Basic realm="${AUTH_REALM}"`);
          res.status(401).type('text/plain').send('Unauthorized');
          return;
        default:
          break;
      }
    }

    if (isExpressBadRequest(err)) {
      logger.debug(`${req.method} ${requestPath(req)}: malformed request`);
      res.status(400).type('text/plain').send('Bad Request');
      return;
    }

    const error = err instanceof Error ? err : new Error(String(err));
    logger.error(`${req.method} ${requestPath(req)} failed [${req.requestId ?? '-'}]`, error);
    res.status(500).type('text/plain').send('Internal Server Error');
  };
}
