/**
 * Config Servlet
 *
 * Spring Cloud Config compatible lookups.
 *
 * Endpoints:
 * - GET /:env/:application/:profiles/:label - Merged properties at a label
 * - GET /:env/:application/:profiles - Merged properties at the tracked branch
 */

import { Router, Request, Response, RequestHandler } from 'express';
import type { ConfigService } from '../../server/ConfigService.js';
import { asyncHandler } from '../middleware/index.js';
import { routeParam } from './params.js';

export function createConfigRouter(service: ConfigService, guard: RequestHandler): Router {
  const router = Router();

  router.get(
    '/:env/:application/:profiles/:label',
    guard,
    asyncHandler(async (req: Request, res: Response) => {
      const response = await service.lookup(
        routeParam(req, 'env'),
        routeParam(req, 'application'),
        routeParam(req, 'profiles'),
        routeParam(req, 'label')
      );
      res.json(response);
    })
  );

  router.get(
    '/:env/:application/:profiles',
    guard,
    asyncHandler(async (req: Request, res: Response) => {
      const response = await service.lookup(
        routeParam(req, 'env'),
        routeParam(req, 'application'),
        routeParam(req, 'profiles')
      );
      res.json(response);
    })
  );

  return router;
}
