import { Request } from 'express';

/**
 * A named route parameter; Express only calls a handler once every
 * parameter of its path matched, so a missing one reads as empty.
 */
export function routeParam(req: Request, name: string): string {
  return req.params[name] ?? '';
}
