import type { EventDraft } from '../models/event';
import type { NewsDraft } from '../models/news';

export function buildEventDraft(overrides: Partial<EventDraft> = {}): EventDraft {
  return {
    title: 'Community Hack Night',
    description: 'Bring a laptop',
    address: null,
    city: 'Cambridge',
    country: 'United Kingdom',
    capacity: null,
    latitude: null,
    longitude: null,
    source: null,
    url: 'https://events.example.com/hack-night',
    type: null,
    image: null,
    mapImage: null,
    startTime: new Date('2025-05-01T18:00:00Z'),
    endTime: null,
    ...overrides,
  };
}

export function buildNewsDraft(overrides: Partial<NewsDraft> = {}): NewsDraft {
  return {
    title: 'Startup raises seed round',
    summary: null,
    url: 'https://news.example.com/seed-round',
    imageUrl: null,
    source: 'Example News',
    topic: 'Startups',
    publishedAt: new Date('2025-05-01T09:00:00Z'),
    ...overrides,
  };
}

export const FIXED_NOW = new Date('2025-05-01T12:00:00Z');

export const fixedClock = (): Date => new Date(FIXED_NOW);
