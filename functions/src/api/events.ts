import { Request, Response, Router } from 'express';
import { NotFoundError, ValidationError } from '../errors';
import { currentPrincipal, requireAdmin } from '../middleware/auth';
import type { EventFields } from '../models/event';
import { isRankingStrategyName, rankEvents, type RankingStrategyName } from '../services/eventRanking';
import { paginate } from '../services/pagination';
import { refreshAllProviders, runIngestion } from '../workers/providerIngest';
import { parseIsoUtc } from '../utils/time';
import {
  optionalCoordinate,
  optionalString,
  parseEventId,
  parsePageParams,
  parsePositiveNumber,
  readQueryString,
  requireBodyObject,
  sendError,
} from './http';
import type { AppDeps } from './types';

function parseStrategy(value: unknown, fallback: RankingStrategyName): RankingStrategyName {
  const raw = readQueryString(value);
  if (raw === undefined) {
    return fallback;
  }
  if (!isRankingStrategyName(raw)) {
    throw new ValidationError('strategy must be "provider-priority" or "location-tiered"');
  }
  return raw;
}

function parseCapacity(value: unknown): number | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ValidationError('capacity must be a non-negative integer');
  }
  return value;
}

function parseTimestamp(value: unknown, field: string): Date | null {
  if (value === undefined || value === null) {
    return null;
  }
  const parsed = parseIsoUtc(value);
  if (!parsed) {
    throw new ValidationError(`${field} must be an ISO-8601 timestamp`);
  }
  return parsed;
}

export function parseEventFields(body: unknown): EventFields {
  const record = requireBodyObject(body);

  const title = optionalString(record, 'title');
  if (!title) {
    throw new ValidationError('title is required');
  }
  const startTime = parseTimestamp(record.startTime, 'startTime');
  if (!startTime) {
    throw new ValidationError('startTime is required');
  }
  const endTime = parseTimestamp(record.endTime, 'endTime');
  if (endTime && endTime.getTime() < startTime.getTime()) {
    throw new ValidationError('endTime must not be before startTime');
  }

  return {
    title,
    description: optionalString(record, 'description') ?? '',
    address: optionalString(record, 'address'),
    city: optionalString(record, 'city'),
    country: optionalString(record, 'country'),
    capacity: parseCapacity(record.capacity),
    latitude: optionalCoordinate(record, 'latitude'),
    longitude: optionalCoordinate(record, 'longitude'),
    source: optionalString(record, 'source'),
    url: optionalString(record, 'url'),
    type: optionalString(record, 'type'),
    image: optionalString(record, 'image'),
    mapImage: optionalString(record, 'mapImage'),
    startTime,
    endTime,
  };
}

export function createEventRoutes(deps: AppDeps): Router {
  const router = Router();
  const { store, config } = deps;

  router.get('/', async (req: Request, res: Response): Promise<void> => {
    try {
      const { limit, offset } = parsePageParams(req.query);
      const radiusKm = parsePositiveNumber(req.query.radius, 'radius') ?? config.defaultRadiusKm;
      const strategy = parseStrategy(req.query.strategy, config.defaultRankingStrategy);
      const principal = currentPrincipal(req);

      const [events, viewer] = await Promise.all([
        store.listEvents(),
        store.getUser(principal.userId),
      ]);
      const ranked = rankEvents(events, {
        query: readQueryString(req.query.q) ?? null,
        viewer,
        radiusKm,
        strategy,
      });

      res.json({ strategy, ...paginate(ranked, limit, offset) });
    } catch (error) {
      sendError(res, error, 'Failed to list events');
    }
  });

  router.post('/refresh', requireAdmin, async (req: Request, res: Response): Promise<void> => {
    try {
      const provider = readQueryString(req.query.provider);
      const results = provider
        ? [await runIngestion(provider, deps, 'event')]
        : await refreshAllProviders(deps, 'event');
      res.json({ results });
    } catch (error) {
      sendError(res, error, 'Failed to refresh event providers');
    }
  });

  router.get('/:eventId', async (req: Request, res: Response): Promise<void> => {
    try {
      const eventId = parseEventId(req.params.eventId);
      const event = await store.getEvent(eventId);
      if (!event) {
        throw new NotFoundError('Event not found');
      }
      const registrationCount = await store.countRegistrations(eventId);
      res.json({ ...event, registrationCount });
    } catch (error) {
      sendError(res, error, 'Failed to load event');
    }
  });

  router.post('/', requireAdmin, async (req: Request, res: Response): Promise<void> => {
    try {
      const fields = parseEventFields(req.body);
      const event = await store.createEvent(fields);
      res.status(201).json(event);
    } catch (error) {
      sendError(res, error, 'Failed to create event');
    }
  });

  router.put('/:eventId', requireAdmin, async (req: Request, res: Response): Promise<void> => {
    try {
      const eventId = parseEventId(req.params.eventId);
      const fields = parseEventFields(req.body);
      const event = await store.replaceEvent(eventId, fields);
      if (!event) {
        throw new NotFoundError('Event not found');
      }
      res.json(event);
    } catch (error) {
      sendError(res, error, 'Failed to update event');
    }
  });

  router.delete('/:eventId', requireAdmin, async (req: Request, res: Response): Promise<void> => {
    try {
      const eventId = parseEventId(req.params.eventId);
      const deleted = await store.deleteEvent(eventId);
      if (!deleted) {
        throw new NotFoundError('Event not found');
      }
      res.status(204).send();
    } catch (error) {
      sendError(res, error, 'Failed to delete event');
    }
  });

  return router;
}
