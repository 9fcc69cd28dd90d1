/**
 * UI Servlet
 *
 * Endpoints:
 * - GET /ui - Dashboard page with an embedded metadata snapshot
 * - GET /ui/meta - The same snapshot as JSON
 */

import { Router, Request, Response, RequestHandler } from 'express';
import { readFile } from 'fs/promises';
import * as path from 'path';
import { renderUiPage } from '../../response/index.js';
import type { UiMeta } from '../../response/index.js';
import type { ConfigService } from '../../server/ConfigService.js';
import { asyncHandler } from '../middleware/index.js';

// <root>/src/api/servlets (or <root>/dist/api/servlets) -> <root>/templates
export const DEFAULT_UI_TEMPLATE = path.resolve(__dirname, '..', '..', '..', 'templates', 'ui.html');

export interface UiOptions {
  basePath: string;
  authEnabled: boolean;
  templatePath?: string;
}

export function createUiRouter(service: ConfigService, guard: RequestHandler, options: UiOptions): Router {
  const router = Router();
  const templatePath = options.templatePath ?? DEFAULT_UI_TEMPLATE;
  let template: Promise<string> | null = null;

  const loadTemplate = (): Promise<string> => {
    if (template) return template;
    const loading = readFile(templatePath, 'utf-8');
    template = loading;
    // Retry on the next request if the read failed; the caller still sees the rejection
    void loading.catch(() => {
      template = null;
    });
    return loading;
  };

  const snapshot = async (): Promise<UiMeta> => ({
    base_path: options.basePath,
    environments: await service.environmentMeta(),
    auth_enabled: options.authEnabled,
  });

  router.get(
    '/ui',
    guard,
    asyncHandler(async (_req: Request, res: Response) => {
      const [page, meta] = await Promise.all([loadTemplate(), snapshot()]);
      res.type('html').send(renderUiPage(page, meta));
    })
  );

  router.get(
    '/ui/meta',
    guard,
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await snapshot());
    })
  );

  return router;
}
