export interface EventFields {
  title: string;
  description: string;
  address: string | null;
  city: string | null;
  country: string | null;
  capacity: number | null;
  latitude: number | null;
  longitude: number | null;
  /** Provider tag, e.g. "Ticketmaster", "SearchApi.io" or a feed name. Null for manually created events. */
  source: string | null;
  url: string | null;
  type: string | null;
  image: string | null;
  mapImage: string | null;
  /** Always set on write; documents written without one read back as null. */
  startTime: Date | null;
  endTime: Date | null;
}

export type EventDraft = EventFields;

export interface EventRecord extends EventFields {
  id: number;
  createdAt: Date;
}

export const TICKETMASTER_SOURCE = 'Ticketmaster';
export const SEARCH_API_SOURCE = 'SearchApi.io';
