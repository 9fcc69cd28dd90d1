/**
 * Env Servlet
 *
 * Per-environment variable dumps and file listings.
 *
 * Endpoints:
 * - GET /:env/env - Variables as a JSON object
 * - GET /:env/env/export - Variables as shell export lines
 * - GET /:env/files - Files under the subpath at the tracked branch
 */

import { Router, Request, Response, RequestHandler } from 'express';
import { renderShellExport } from '../../response/index.js';
import type { ConfigService } from '../../server/ConfigService.js';
import { asyncHandler } from '../middleware/index.js';
import { routeParam } from './params.js';

export function createEnvRouter(service: ConfigService, guard: RequestHandler): Router {
  const router = Router();

  router.get('/:env/env', guard, (req: Request, res: Response) => {
    res.json(service.envVars(routeParam(req, 'env')));
  });

  router.get('/:env/env/export', guard, (req: Request, res: Response) => {
    const body = renderShellExport(service.envVars(routeParam(req, 'env')));
    res.type('text/plain').send(body);
  });

  router.get(
    '/:env/files',
    guard,
    asyncHandler(async (req: Request, res: Response) => {
      const files = await service.listFiles(routeParam(req, 'env'));
      res.json({ files });
    })
  );

  return router;
}
