import type { EventRecord } from '../models/event';
import { SEARCH_API_SOURCE } from '../models/event';
import type { LocationProfile } from '../models/user';
import { distanceKm, hasCoordinates } from '../utils/geo';
import { containsIgnoreCase, equalsIgnoreCase } from '../utils/text';

export const DEFAULT_RADIUS_KM = 50;

export type RankingStrategyName = 'provider-priority' | 'location-tiered';

export const RANKING_STRATEGIES: readonly RankingStrategyName[] = ['provider-priority', 'location-tiered'];

export interface RankingContext {
  viewer: LocationProfile | null;
  radiusKm: number;
}

export interface RankingStrategy {
  readonly name: RankingStrategyName;
  rank(events: EventRecord[], context: RankingContext): EventRecord[];
}

export interface RankEventsOptions {
  query?: string | null;
  viewer?: LocationProfile | null;
  radiusKm?: number;
  strategy?: RankingStrategyName;
}

/**
 * Orders by start time, latest first. Events without a start time sort after everything else.
 */
export function compareByStartTimeDesc(a: EventRecord, b: EventRecord): number {
  const left = a.startTime?.getTime() ?? Number.NEGATIVE_INFINITY;
  const right = b.startTime?.getTime() ?? Number.NEGATIVE_INFINITY;
  if (left === right) {
    return 0;
  }
  return left > right ? -1 : 1;
}

function sortLatestFirst(events: EventRecord[]): EventRecord[] {
  return [...events].sort(compareByStartTimeDesc);
}

export function matchesQuery(event: EventRecord, query: string): boolean {
  return containsIgnoreCase(event.title, query)
    || containsIgnoreCase(event.description, query)
    || containsIgnoreCase(event.city, query)
    || containsIgnoreCase(event.type, query);
}

/**
 * Search-provider events first, then everything else; each group latest first.
 */
export const providerPriorityStrategy: RankingStrategy = {
  name: 'provider-priority',
  rank(events) {
    const preferred: EventRecord[] = [];
    const rest: EventRecord[] = [];
    for (const event of events) {
      if (equalsIgnoreCase(event.source, SEARCH_API_SOURCE)) {
        preferred.push(event);
      } else {
        rest.push(event);
      }
    }
    return [...sortLatestFirst(preferred), ...sortLatestFirst(rest)];
  },
};

/**
 * Picks the first non-empty tier: nearby (by distance) → same city → same country → everything.
 */
export const locationTieredStrategy: RankingStrategy = {
  name: 'location-tiered',
  rank(events, context) {
    const { viewer, radiusKm } = context;

    if (viewer && hasCoordinates(viewer)) {
      const nearby = events
        .filter(hasCoordinates)
        .map(event => ({
          event,
          distance: distanceKm(viewer.latitude, viewer.longitude, event.latitude, event.longitude),
        }))
        .filter(entry => entry.distance <= radiusKm)
        .sort((a, b) => a.distance - b.distance || compareByStartTimeDesc(a.event, b.event));
      if (nearby.length > 0) {
        return nearby.map(entry => entry.event);
      }
    }

    if (viewer?.city) {
      const sameCity = events.filter(event => equalsIgnoreCase(event.city, viewer.city));
      if (sameCity.length > 0) {
        return sortLatestFirst(sameCity);
      }
    }

    if (viewer?.country) {
      const sameCountry = events.filter(event => equalsIgnoreCase(event.country, viewer.country));
      if (sameCountry.length > 0) {
        return sortLatestFirst(sameCountry);
      }
    }

    return sortLatestFirst(events);
  },
};

const STRATEGIES: Record<RankingStrategyName, RankingStrategy> = {
  'provider-priority': providerPriorityStrategy,
  'location-tiered': locationTieredStrategy,
};

export function resolveStrategy(name: RankingStrategyName): RankingStrategy {
  return STRATEGIES[name];
}

export function isRankingStrategyName(value: string): value is RankingStrategyName {
  return RANKING_STRATEGIES.some(name => name === value);
}

export function rankEvents(events: EventRecord[], options: RankEventsOptions = {}): EventRecord[] {
  const query = options.query;
  const filtered = query ? events.filter(event => matchesQuery(event, query)) : events;
  const strategy = resolveStrategy(options.strategy ?? 'provider-priority');

  return strategy.rank(filtered, {
    viewer: options.viewer ?? null,
    radiusKm: options.radiusKm ?? DEFAULT_RADIUS_KM,
  });
}
