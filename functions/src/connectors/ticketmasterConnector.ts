import type { TicketmasterConfig } from '../config';
import type { RawProviderItem } from '../models/provider';
import { fetchJson, type FetchPolicy } from './http';

const DISCOVERY_URL = 'https://app.ticketmaster.com/discovery/v2/events.json';

export interface TicketmasterImage {
  url?: string;
  ratio?: string;
  width?: number;
  height?: number;
  fallback?: boolean;
}

export interface TicketmasterVenue {
  name?: string;
  address?: { line1?: string; line2?: string };
  city?: { name?: string };
  country?: { name?: string; countryCode?: string };
  location?: { latitude?: string | number; longitude?: string | number };
}

export interface TicketmasterClassification {
  primary?: boolean;
  segment?: { name?: string };
  genre?: { name?: string };
}

export interface TicketmasterEvent {
  id?: string;
  name?: string;
  url?: string;
  info?: string;
  pleaseNote?: string;
  images?: TicketmasterImage[];
  dates?: {
    start?: { dateTime?: string; localDate?: string };
    end?: { dateTime?: string };
  };
  classifications?: TicketmasterClassification[];
  seatmap?: { staticUrl?: string };
  _embedded?: { venues?: TicketmasterVenue[] };
}

interface TicketmasterSearchResponse {
  _embedded?: { events?: TicketmasterEvent[] };
}

/** Tried in order; the first query that returns events wins. */
const PRIORITIZED_QUERIES: Array<Record<string, string>> = [
  { classificationName: 'Science & Tech' },
  { keyword: 'technology' },
  { keyword: 'conference' },
  {},
];

export class TicketmasterConnector {
  constructor(
    private readonly config: TicketmasterConfig,
    private readonly policy: FetchPolicy,
  ) {}

  async fetchRawEvents(): Promise<Array<RawProviderItem<TicketmasterEvent>>> {
    for (const query of PRIORITIZED_QUERIES) {
      const search = new URLSearchParams({
        apikey: this.config.apiKey,
        city: this.config.city,
        size: String(this.config.pageSize),
        ...query,
      });
      const body = await fetchJson(`${DISCOVERY_URL}?${search.toString()}`, this.policy);
      const events = readEvents(body);
      if (events.length > 0) {
        const fetchedAt = new Date().toISOString();
        return events.map(raw => ({ provider: 'ticketmaster', fetchedAt, raw }));
      }
    }
    return [];
  }
}

function readEvents(body: unknown): TicketmasterEvent[] {
  if (typeof body !== 'object' || body === null) {
    return [];
  }
  const response = body as TicketmasterSearchResponse;
  const events = response._embedded?.events;
  return Array.isArray(events) ? events : [];
}
