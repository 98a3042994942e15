import { classifyTopic } from '../classification/topicClassifier';
import type { EventFeedConfig } from '../config';
import type { FeedEntry } from '../connectors/rssFeedConnector';
import type { EventDraft } from '../models/event';
import type { NewsDraft } from '../models/news';
import type { RawProviderItem } from '../models/provider';
import { cleanText } from '../utils/text';
import { parseDate } from '../utils/time';

function requireTitle(entry: FeedEntry, feedName: string): string {
  const title = cleanText(entry.title);
  if (!title) {
    throw new Error(`Feed entry from ${feedName} has no title`);
  }
  return title;
}

function requireLink(entry: FeedEntry, feedName: string): string {
  const link = entry.link?.trim();
  if (!link) {
    throw new Error(`Feed entry from ${feedName} has no link`);
  }
  return link;
}

/** Publish date of the entry, or the fetch time when the feed omits one. */
function resolvePublished(entry: FeedEntry, fetchedAt: string): Date {
  return parseDate(entry.publishedAt) ?? new Date(fetchedAt);
}

export function normalizeFeedEvent(payload: RawProviderItem<FeedEntry>, feed: EventFeedConfig): EventDraft {
  const entry = payload.raw;
  return {
    title: requireTitle(entry, feed.name),
    description: cleanText(entry.description) ?? '',
    address: null,
    city: feed.city,
    country: feed.country,
    capacity: null,
    latitude: feed.latitude,
    longitude: feed.longitude,
    source: feed.name,
    url: requireLink(entry, feed.name),
    type: entry.categories[0] ?? null,
    image: entry.imageUrl,
    mapImage: null,
    startTime: resolvePublished(entry, payload.fetchedAt),
    endTime: null,
  };
}

export function normalizeFeedNews(payload: RawProviderItem<FeedEntry>, feedName: string): NewsDraft {
  const entry = payload.raw;
  const title = requireTitle(entry, feedName);
  return {
    title,
    summary: cleanText(entry.description),
    url: requireLink(entry, feedName),
    imageUrl: entry.imageUrl,
    source: feedName,
    topic: classifyTopic(title),
    publishedAt: resolvePublished(entry, payload.fetchedAt),
  };
}
