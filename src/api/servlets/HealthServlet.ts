import { Router, Request, Response } from 'express';

/**
 * GET /health - liveness probe, never authenticated.
 */
export function createHealthRouter(): Router {
  const router = Router();
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });
  return router;
}
