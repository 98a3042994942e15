import { Request, Response, Router } from 'express';
import { currentPrincipal, requireAdmin } from '../middleware/auth';
import { listEventRegistrations, register, rejectionToError, unregister } from '../services/registrationGuard';
import { parseEventId, sendError } from './http';
import type { AppDeps } from './types';

export function createRegistrationRoutes({ store }: AppDeps): Router {
  const router = Router();

  router.get('/event/:eventId', requireAdmin, async (req: Request, res: Response): Promise<void> => {
    try {
      const eventId = parseEventId(req.params.eventId);
      const items = await listEventRegistrations(store, eventId);
      res.json({ eventId, total: items.length, items });
    } catch (error) {
      sendError(res, error, 'Failed to list registrations');
    }
  });

  router.post('/:eventId', async (req: Request, res: Response): Promise<void> => {
    try {
      const eventId = parseEventId(req.params.eventId);
      const { userId } = currentPrincipal(req);
      const outcome = await register(store, userId, eventId);
      if (outcome.status === 'rejected') {
        throw rejectionToError(outcome.reason);
      }
      res.status(201).json(outcome.registration);
    } catch (error) {
      sendError(res, error, 'Failed to register');
    }
  });

  router.delete('/:eventId', async (req: Request, res: Response): Promise<void> => {
    try {
      const eventId = parseEventId(req.params.eventId);
      const { userId } = currentPrincipal(req);
      const outcome = await unregister(store, userId, eventId);
      if (outcome.status === 'rejected') {
        throw rejectionToError(outcome.reason);
      }
      res.status(204).send();
    } catch (error) {
      sendError(res, error, 'Failed to unregister');
    }
  });

  return router;
}
