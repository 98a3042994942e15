import type { EventFeedConfig, NewsFeedConfig, ProviderConfig, SearchApiConfig, TicketmasterConfig } from '../config';
import type { EventDraft } from '../models/event';
import type { NewsDraft } from '../models/news';
import type { RawProviderItem } from '../models/provider';
import { normalizeFeedEvent, normalizeFeedNews } from '../normalizers/rssNormalizer';
import { normalizeSearchApiEvent } from '../normalizers/searchApiNormalizer';
import { normalizeTicketmasterEvent } from '../normalizers/ticketmasterNormalizer';
import { createSlug } from '../utils/slug';
import type { FetchPolicy } from './http';
import { RssFeedConnector, type FeedEntry } from './rssFeedConnector';
import { SearchApiConnector, type SearchApiEvent } from './searchApiConnector';
import { TicketmasterConnector, type TicketmasterEvent } from './ticketmasterConnector';

interface AdapterBase<TRaw> {
  readonly id: string;
  readonly label: string;
  fetchRawItems(): Promise<Array<RawProviderItem<TRaw>>>;
}

export interface EventProviderAdapter<TRaw = unknown> extends AdapterBase<TRaw> {
  readonly kind: 'event';
  normalize(payload: RawProviderItem<TRaw>): EventDraft;
}

export interface NewsProviderAdapter<TRaw = unknown> extends AdapterBase<TRaw> {
  readonly kind: 'news';
  normalize(payload: RawProviderItem<TRaw>): NewsDraft;
}

export type ProviderAdapter = EventProviderAdapter | NewsProviderAdapter;

export class TicketmasterAdapter implements EventProviderAdapter<TicketmasterEvent> {
  readonly id = 'ticketmaster';
  readonly label = 'Ticketmaster';
  readonly kind = 'event';
  private readonly connector: TicketmasterConnector;

  constructor(config: TicketmasterConfig, policy: FetchPolicy) {
    this.connector = new TicketmasterConnector(config, policy);
  }

  fetchRawItems(): Promise<Array<RawProviderItem<TicketmasterEvent>>> {
    return this.connector.fetchRawEvents();
  }

  normalize(payload: RawProviderItem<TicketmasterEvent>): EventDraft {
    return normalizeTicketmasterEvent(payload);
  }
}

export class SearchApiAdapter implements EventProviderAdapter<SearchApiEvent> {
  readonly id = 'searchapi';
  readonly label = 'SearchApi.io';
  readonly kind = 'event';
  private readonly connector: SearchApiConnector;

  constructor(private readonly config: SearchApiConfig, policy: FetchPolicy) {
    this.connector = new SearchApiConnector(config, policy);
  }

  fetchRawItems(): Promise<Array<RawProviderItem<SearchApiEvent>>> {
    return this.connector.fetchRawEvents();
  }

  normalize(payload: RawProviderItem<SearchApiEvent>): EventDraft {
    return normalizeSearchApiEvent(payload, { city: this.config.city, country: this.config.country });
  }
}

export class FeedEventAdapter implements EventProviderAdapter<FeedEntry> {
  readonly id: string;
  readonly label: string;
  readonly kind = 'event';
  private readonly connector: RssFeedConnector;

  constructor(private readonly feed: EventFeedConfig, policy: FetchPolicy) {
    this.id = `feed:${createSlug(feed.name)}`;
    this.label = feed.name;
    this.connector = new RssFeedConnector(this.id, feed, policy);
  }

  fetchRawItems(): Promise<Array<RawProviderItem<FeedEntry>>> {
    return this.connector.fetchEntries();
  }

  normalize(payload: RawProviderItem<FeedEntry>): EventDraft {
    return normalizeFeedEvent(payload, this.feed);
  }
}

export class FeedNewsAdapter implements NewsProviderAdapter<FeedEntry> {
  readonly id: string;
  readonly label: string;
  readonly kind = 'news';
  private readonly connector: RssFeedConnector;

  constructor(feed: NewsFeedConfig, policy: FetchPolicy) {
    this.id = `news:${createSlug(feed.name)}`;
    this.label = feed.name;
    this.connector = new RssFeedConnector(this.id, feed, policy);
  }

  fetchRawItems(): Promise<Array<RawProviderItem<FeedEntry>>> {
    return this.connector.fetchEntries();
  }

  normalize(payload: RawProviderItem<FeedEntry>): NewsDraft {
    return normalizeFeedNews(payload, this.label);
  }
}

/** Every enabled provider, in refresh order. Providers without credentials are left out. */
export function buildProviderAdapters(config: ProviderConfig): ProviderAdapter[] {
  const policy: FetchPolicy = { timeoutMs: config.timeoutMs, maxAttempts: config.maxAttempts };
  const adapters: ProviderAdapter[] = [];

  if (config.ticketmaster) {
    adapters.push(new TicketmasterAdapter(config.ticketmaster, policy));
  }
  if (config.searchApi) {
    adapters.push(new SearchApiAdapter(config.searchApi, policy));
  }
  for (const feed of config.eventFeeds) {
    adapters.push(new FeedEventAdapter(feed, policy));
  }
  for (const feed of config.newsFeeds) {
    adapters.push(new FeedNewsAdapter(feed, policy));
  }
  return adapters;
}
