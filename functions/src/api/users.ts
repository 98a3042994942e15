import { Request, Response, Router } from 'express';
import { ValidationError } from '../errors';
import { currentPrincipal } from '../middleware/auth';
import { EMPTY_LOCATION, type LocationProfile } from '../models/user';
import { optionalCoordinate, optionalString, requireBodyObject, sendError } from './http';
import type { AppDeps } from './types';

export function parseLocation(body: unknown): LocationProfile {
  const record = requireBodyObject(body);
  const latitude = optionalCoordinate(record, 'latitude');
  const longitude = optionalCoordinate(record, 'longitude');
  if ((latitude === null) !== (longitude === null)) {
    throw new ValidationError('latitude and longitude must be provided together');
  }
  return {
    latitude,
    longitude,
    city: optionalString(record, 'city'),
    country: optionalString(record, 'country'),
  };
}

export function createUserRoutes({ store }: AppDeps): Router {
  const router = Router();

  router.get('/me', async (req: Request, res: Response): Promise<void> => {
    try {
      const { userId, isAdmin } = currentPrincipal(req);
      const profile = await store.getUser(userId);
      res.json(profile
        ? { ...profile, isAdmin }
        : { id: userId, ...EMPTY_LOCATION, updatedAt: null, isAdmin });
    } catch (error) {
      sendError(res, error, 'Failed to load user profile');
    }
  });

  router.put('/me/location', async (req: Request, res: Response): Promise<void> => {
    try {
      const { userId } = currentPrincipal(req);
      const location = parseLocation(req.body);
      const profile = await store.updateUserLocation(userId, location);
      res.json(profile);
    } catch (error) {
      sendError(res, error, 'Failed to update user location');
    }
  });

  return router;
}
