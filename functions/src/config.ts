import { ConfigError } from './errors';
import type { RankingStrategyName } from './services/eventRanking';

type Env = Record<string, string | undefined>;

export interface TicketmasterConfig {
  apiKey: string;
  city: string;
  pageSize: number;
}

export interface SearchApiConfig {
  apiKey: string;
  query: string;
  city: string;
  country: string;
}

export interface EventFeedConfig {
  name: string;
  url: string;
  limit: number;
  city: string | null;
  country: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface NewsFeedConfig {
  name: string;
  url: string;
  limit: number;
}

export interface ProviderConfig {
  ticketmaster: TicketmasterConfig | null;
  searchApi: SearchApiConfig | null;
  eventFeeds: EventFeedConfig[];
  newsFeeds: NewsFeedConfig[];
  timeoutMs: number;
  maxAttempts: number;
}

export interface AppConfig {
  apiKey: string | null;
  jwtSecret: string | null;
  dataStore: 'firestore' | 'memory';
  defaultRadiusKm: number;
  defaultRankingStrategy: RankingStrategyName;
  providers: ProviderConfig;
}

export const DEFAULT_TIME_ZONE = 'Europe/London';

const DEFAULT_EVENT_FEEDS: EventFeedConfig[] = [
  {
    name: 'Cambridge CS',
    url: 'https://www.cl.cam.ac.uk/seminars/rss.xml',
    limit: 10,
    city: 'Cambridge',
    country: 'United Kingdom',
    latitude: 52.2053,
    longitude: 0.1218,
  },
];

const DEFAULT_NEWS_FEEDS: NewsFeedConfig[] = [
  {
    name: 'TechCrunch',
    url: 'https://techcrunch.com/feed/',
    limit: 50,
  },
];

export function loadConfig(env: Env = process.env): AppConfig {
  const ticketmasterKey = readString(env, 'TICKETMASTER_API_KEY');
  const searchApiKey = readString(env, 'SEARCHAPI_API_KEY');

  return {
    apiKey: readString(env, 'API_KEY'),
    jwtSecret: readString(env, 'JWT_SECRET'),
    dataStore: readDataStore(env),
    defaultRadiusKm: readPositiveNumber(env, 'DEFAULT_RADIUS_KM', 50),
    defaultRankingStrategy: readStrategy(env),
    providers: {
      ticketmaster: ticketmasterKey
        ? {
            apiKey: ticketmasterKey,
            city: readString(env, 'TICKETMASTER_CITY') ?? 'London',
            pageSize: readPositiveInteger(env, 'TICKETMASTER_PAGE_SIZE', 10),
          }
        : null,
      searchApi: searchApiKey
        ? {
            apiKey: searchApiKey,
            query: readString(env, 'SEARCHAPI_QUERY') ?? 'tech events in London',
            city: readString(env, 'SEARCHAPI_CITY') ?? 'London',
            country: readString(env, 'SEARCHAPI_COUNTRY') ?? 'United Kingdom',
          }
        : null,
      eventFeeds: readEventFeeds(env),
      newsFeeds: readNewsFeeds(env),
      timeoutMs: readPositiveInteger(env, 'PROVIDER_TIMEOUT_MS', 10_000),
      maxAttempts: readPositiveInteger(env, 'PROVIDER_MAX_ATTEMPTS', 2),
    },
  };
}

function readString(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readPositiveInteger(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === null) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== raw) {
    throw new ConfigError(`${name} must be a positive integer`);
  }
  return parsed;
}

function readPositiveNumber(env: Env, name: string, fallback: number): number {
  const raw = readString(env, name);
  if (raw === null) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive number`);
  }
  return parsed;
}

function readDataStore(env: Env): AppConfig['dataStore'] {
  const raw = readString(env, 'DATA_STORE') ?? 'firestore';
  if (raw === 'firestore' || raw === 'memory') {
    return raw;
  }
  throw new ConfigError('DATA_STORE must be "firestore" or "memory"');
}

function readStrategy(env: Env): RankingStrategyName {
  const raw = readString(env, 'DEFAULT_RANKING_STRATEGY') ?? 'provider-priority';
  if (raw === 'provider-priority' || raw === 'location-tiered') {
    return raw;
  }
  throw new ConfigError('DEFAULT_RANKING_STRATEGY must be "provider-priority" or "location-tiered"');
}

function readJsonArray(env: Env, name: string): unknown[] | null {
  const raw = readString(env, name);
  if (raw === null) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError(`${name} must be valid JSON`);
  }
  if (!Array.isArray(parsed)) {
    throw new ConfigError(`${name} must be a JSON array`);
  }
  return parsed;
}

function readEventFeeds(env: Env): EventFeedConfig[] {
  const items = readJsonArray(env, 'EVENT_FEEDS');
  if (!items) {
    return DEFAULT_EVENT_FEEDS;
  }
  return items.map((item, index) => {
    const record = requireRecord(item, `EVENT_FEEDS[${index}]`);
    return {
      name: requireText(record.name, `EVENT_FEEDS[${index}].name`),
      url: requireText(record.url, `EVENT_FEEDS[${index}].url`),
      limit: typeof record.limit === 'number' && record.limit > 0 ? Math.floor(record.limit) : 10,
      city: typeof record.city === 'string' ? record.city : null,
      country: typeof record.country === 'string' ? record.country : null,
      latitude: typeof record.latitude === 'number' ? record.latitude : null,
      longitude: typeof record.longitude === 'number' ? record.longitude : null,
    };
  });
}

function readNewsFeeds(env: Env): NewsFeedConfig[] {
  const items = readJsonArray(env, 'NEWS_FEEDS');
  if (!items) {
    return DEFAULT_NEWS_FEEDS;
  }
  return items.map((item, index) => {
    const record = requireRecord(item, `NEWS_FEEDS[${index}]`);
    return {
      name: requireText(record.name, `NEWS_FEEDS[${index}].name`),
      url: requireText(record.url, `NEWS_FEEDS[${index}].url`),
      limit: typeof record.limit === 'number' && record.limit > 0 ? Math.floor(record.limit) : 50,
    };
  });
}

function requireRecord(value: unknown, label: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigError(`${label} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function requireText(value: unknown, label: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(`${label} must be a non-empty string`);
  }
  return value.trim();
}
