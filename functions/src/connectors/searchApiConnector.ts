import type { SearchApiConfig } from '../config';
import type { RawProviderItem } from '../models/provider';
import { fetchJson, type FetchPolicy } from './http';

const SEARCH_URL = 'https://www.searchapi.io/api/v1/search';

export interface SearchApiEvent {
  title?: string;
  description?: string;
  link?: string;
  date?: {
    day?: string | number;
    month?: string | number;
    when?: string;
  };
  address?: string[] | string;
  venue?: { name?: string; link?: string };
  thumbnail?: string;
  image?: string;
  event_location_map?: { image?: string; link?: string };
}

interface SearchApiResponse {
  events?: SearchApiEvent[];
}

export class SearchApiConnector {
  constructor(
    private readonly config: SearchApiConfig,
    private readonly policy: FetchPolicy,
  ) {}

  async fetchRawEvents(): Promise<Array<RawProviderItem<SearchApiEvent>>> {
    const search = new URLSearchParams({
      engine: 'google_events',
      q: this.config.query,
      api_key: this.config.apiKey,
    });
    const body = await fetchJson(`${SEARCH_URL}?${search.toString()}`, this.policy);
    const fetchedAt = new Date().toISOString();
    return readEvents(body).map(raw => ({ provider: 'searchapi', fetchedAt, raw }));
  }
}

function readEvents(body: unknown): SearchApiEvent[] {
  if (typeof body !== 'object' || body === null) {
    return [];
  }
  const response = body as SearchApiResponse;
  return Array.isArray(response.events) ? response.events : [];
}
