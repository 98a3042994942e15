import { Request, Response, Router } from 'express';
import { requireAdmin } from '../middleware/auth';
import { paginate } from '../services/pagination';
import { refreshAllProviders } from '../workers/providerIngest';
import { parsePageParams, readQueryString, sendError } from './http';
import type { AppDeps } from './types';

export function createNewsRoutes(deps: AppDeps): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response): Promise<void> => {
    try {
      const { limit, offset } = parsePageParams(req.query);
      const topic = readQueryString(req.query.topic) ?? null;
      const items = await deps.store.listNews({ topic });
      res.json(paginate(items, limit, offset));
    } catch (error) {
      sendError(res, error, 'Failed to list news');
    }
  });

  router.post('/refresh', requireAdmin, async (_req: Request, res: Response): Promise<void> => {
    try {
      const results = await refreshAllProviders(deps, 'news');
      res.json({ results });
    } catch (error) {
      sendError(res, error, 'Failed to refresh news providers');
    }
  });

  return router;
}
