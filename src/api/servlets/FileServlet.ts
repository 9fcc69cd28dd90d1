/**
 * File Servlet
 *
 * Endpoints:
 * - GET /:env/file/:label/<path> - Raw file at a label; text is templated
 */

import { Router, Request, Response, RequestHandler } from 'express';
import type { ConfigService } from '../../server/ConfigService.js';
import { asyncHandler } from '../middleware/index.js';
import { routeParam } from './params.js';

export function createFileRouter(service: ConfigService, guard: RequestHandler): Router {
  const router = Router();

  router.get(
    '/:env/file/:label/:path(*)',
    guard,
    asyncHandler(async (req: Request, res: Response) => {
      const file = await service.readFile(routeParam(req, 'env'), routeParam(req, 'label'), routeParam(req, 'path'));
      res.setHeader('Content-Type', file.contentType);
      res.send(file.body);
    })
  );

  return router;
}
