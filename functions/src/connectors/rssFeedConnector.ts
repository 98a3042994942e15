import { XMLParser } from 'fast-xml-parser';
import type { RawProviderItem } from '../models/provider';
import { fetchText, type FetchPolicy } from './http';

export interface FeedEntry {
  title: string | null;
  link: string | null;
  description: string | null;
  publishedAt: string | null;
  imageUrl: string | null;
  categories: string[];
}

export interface FeedSource {
  name: string;
  url: string;
  limit: number;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  parseTagValue: false,
  trimValues: true,
});

export class RssFeedConnector {
  constructor(
    private readonly providerId: string,
    private readonly feed: FeedSource,
    private readonly policy: FetchPolicy,
  ) {}

  async fetchEntries(): Promise<Array<RawProviderItem<FeedEntry>>> {
    const xml = await fetchText(this.feed.url, 'application/rss+xml, application/atom+xml, application/xml;q=0.9, */*;q=0.8', this.policy);
    const fetchedAt = new Date().toISOString();
    return parseFeed(xml)
      .slice(0, this.feed.limit)
      .map(raw => ({ provider: this.providerId, fetchedAt, raw }));
  }
}

/**
 * Reads RSS 2.0 items or Atom entries. Unknown documents yield no entries.
 */
export function parseFeed(xml: string): FeedEntry[] {
  const document: unknown = parser.parse(xml);
  if (!isRecord(document)) {
    return [];
  }

  const rss = isRecord(document.rss) ? document.rss : null;
  const channel = rss && isRecord(rss.channel) ? rss.channel : isRecord(document['rdf:RDF']) ? document['rdf:RDF'] : null;
  if (channel) {
    return toArray(channel.item).filter(isRecord).map(readRssItem);
  }

  if (isRecord(document.feed)) {
    return toArray(document.feed.entry).filter(isRecord).map(readAtomEntry);
  }

  return [];
}

function readRssItem(item: Record<string, unknown>): FeedEntry {
  return {
    title: textOf(item.title),
    link: textOf(item.link) ?? textOf(item.guid),
    description: textOf(item.description) ?? textOf(item['content:encoded']),
    publishedAt: textOf(item.pubDate) ?? textOf(item['dc:date']),
    imageUrl: firstAttribute(item['media:content'], '@_url')
      ?? firstAttribute(item['media:thumbnail'], '@_url')
      ?? firstAttribute(item.enclosure, '@_url'),
    categories: toArray(item.category).map(textOf).filter((value): value is string => value !== null),
  };
}

function readAtomEntry(entry: Record<string, unknown>): FeedEntry {
  const links = toArray(entry.link).filter(isRecord);
  const alternate = links.find(link => link['@_rel'] === undefined || link['@_rel'] === 'alternate') ?? links[0];
  const enclosure = links.find(link => link['@_rel'] === 'enclosure');

  return {
    title: textOf(entry.title),
    link: alternate ? textOf(alternate['@_href']) : textOf(entry.link),
    description: textOf(entry.summary) ?? textOf(entry.content),
    publishedAt: textOf(entry.published) ?? textOf(entry.updated),
    imageUrl: firstAttribute(entry['media:thumbnail'], '@_url') ?? (enclosure ? textOf(enclosure['@_href']) : null),
    categories: toArray(entry.category).filter(isRecord).map(category => textOf(category['@_term'])).filter((value): value is string => value !== null),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string | null {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  if (isRecord(value)) {
    return textOf(value['#text']);
  }
  return null;
}

function firstAttribute(value: unknown, attribute: string): string | null {
  for (const item of toArray(value)) {
    if (isRecord(item)) {
      const found = textOf(item[attribute]);
      if (found) {
        return found;
      }
    }
  }
  return null;
}
