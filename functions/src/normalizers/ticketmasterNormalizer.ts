import type { EventDraft } from '../models/event';
import { TICKETMASTER_SOURCE } from '../models/event';
import type { RawProviderItem } from '../models/provider';
import type {
  TicketmasterEvent,
  TicketmasterImage,
  TicketmasterVenue,
} from '../connectors/ticketmasterConnector';
import { cleanText } from '../utils/text';
import { addHours, parseIsoUtc } from '../utils/time';

export const DEFAULT_EVENT_DURATION_HOURS = 2;
const MIN_IMAGE_WIDTH = 640;

export function normalizeTicketmasterEvent(payload: RawProviderItem<TicketmasterEvent>): EventDraft {
  const { raw } = payload;

  const title = raw.name?.trim();
  if (!title) {
    throw new Error(`Ticketmaster event ${raw.id ?? '(no id)'} has no name`);
  }

  const startTime = parseIsoUtc(raw.dates?.start?.dateTime);
  if (!startTime) {
    throw new Error(`Ticketmaster event ${raw.id ?? title} has no valid start dateTime`);
  }
  const endTime = parseIsoUtc(raw.dates?.end?.dateTime) ?? addHours(startTime, DEFAULT_EVENT_DURATION_HOURS);
  const venue = raw._embedded?.venues?.[0];

  return {
    title,
    description: cleanText(raw.info) ?? cleanText(raw.pleaseNote) ?? 'No description',
    ...buildLocation(venue),
    capacity: null,
    source: TICKETMASTER_SOURCE,
    url: raw.url?.trim() || null,
    type: buildClassification(raw),
    image: selectImage(raw.images),
    mapImage: raw.seatmap?.staticUrl?.trim() || null,
    startTime,
    endTime,
  };
}

function buildLocation(venue: TicketmasterVenue | undefined): Pick<EventDraft, 'address' | 'city' | 'country' | 'latitude' | 'longitude'> {
  if (!venue) {
    return { address: null, city: null, country: null, latitude: null, longitude: null };
  }

  const address = [venue.name, venue.address?.line1, venue.address?.line2]
    .map(part => part?.trim())
    .filter((part): part is string => Boolean(part))
    .join(', ');

  return {
    address: address || null,
    city: venue.city?.name?.trim() || null,
    country: venue.country?.name?.trim() || null,
    latitude: toCoordinate(venue.location?.latitude),
    longitude: toCoordinate(venue.location?.longitude),
  };
}

function toCoordinate(value: string | number | undefined): number | null {
  if (value === undefined || value === '') {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function buildClassification(raw: TicketmasterEvent): string | null {
  const classification = raw.classifications?.find(item => item.primary) ?? raw.classifications?.[0];
  if (!classification) {
    return null;
  }
  const labels = [classification.segment?.name, classification.genre?.name]
    .map(label => label?.trim())
    .filter((label): label is string => Boolean(label));
  return labels.length > 0 ? labels.join(' - ') : null;
}

/**
 * Prefers a 16:9 image at least 640px wide, then the first image that has a url.
 */
export function selectImage(images: TicketmasterImage[] | undefined): string | null {
  if (!images || images.length === 0) {
    return null;
  }
  const wide = images.find(image => image.ratio === '16_9' && (image.width ?? 0) >= MIN_IMAGE_WIDTH && image.url);
  return wide?.url ?? images.find(image => image.url)?.url ?? null;
}
