import type { EventDraft } from '../models/event';
import { SEARCH_API_SOURCE } from '../models/event';
import type { RawProviderItem } from '../models/provider';
import type { SearchApiEvent } from '../connectors/searchApiConnector';
import { cleanText } from '../utils/text';
import { parseMonth } from '../utils/time';

export interface SearchLocation {
  city: string | null;
  country: string | null;
}

/**
 * The provider only reports a day and a month, so the year is always taken
 * from the fetch time. Events in a month that has already passed land in the
 * current year rather than the next one.
 */
export function reconstructStartDate(date: SearchApiEvent['date'], fetchedAt: Date): Date {
  const month = parseMonth(date?.month);
  const day = typeof date?.day === 'number' ? date.day : Number.parseInt(String(date?.day ?? ''), 10);
  if (month === null || !Number.isInteger(day) || day < 1 || day > 31) {
    return fetchedAt;
  }
  const year = fetchedAt.getUTCFullYear();
  const result = new Date(Date.UTC(year, month, day));
  // Date.UTC rolls 31 Feb over into March; treat that as unparseable.
  return result.getUTCMonth() === month ? result : fetchedAt;
}

export function normalizeSearchApiEvent(
  payload: RawProviderItem<SearchApiEvent>,
  location: SearchLocation,
): EventDraft {
  const { raw } = payload;
  const title = raw.title?.trim();
  if (!title) {
    throw new Error('SearchApi event has no title');
  }

  const fetchedAt = new Date(payload.fetchedAt);
  const address = Array.isArray(raw.address)
    ? raw.address.map(line => line.trim()).filter(Boolean).join(', ')
    : raw.address?.trim() ?? '';

  return {
    title,
    description: cleanText(raw.description) ?? cleanText(raw.date?.when) ?? '',
    address: address || null,
    city: location.city,
    country: location.country,
    capacity: null,
    latitude: null,
    longitude: null,
    source: SEARCH_API_SOURCE,
    url: raw.link?.trim() || null,
    type: null,
    image: raw.image?.trim() || raw.thumbnail?.trim() || null,
    mapImage: raw.event_location_map?.image?.trim() || null,
    startTime: reconstructStartDate(raw.date, fetchedAt),
    endTime: null,
  };
}
