import assert from 'node:assert/strict';
import test from 'node:test';
import type { EventFeedConfig } from '../config';
import type { FeedEntry } from '../connectors/rssFeedConnector';
import type { RawProviderItem } from '../models/provider';
import { normalizeFeedEvent, normalizeFeedNews } from './rssNormalizer';

const FETCHED_AT = '2025-06-12T07:00:00.000Z';

const FEED: EventFeedConfig = {
  name: 'Example Seminars',
  url: 'https://seminars.example.com/rss.xml',
  limit: 10,
  city: 'Cambridge',
  country: 'United Kingdom',
  latitude: 52.2053,
  longitude: 0.1218,
};

function entry(overrides: Partial<FeedEntry> = {}): RawProviderItem<FeedEntry> {
  return {
    provider: 'feed:example-seminars',
    fetchedAt: FETCHED_AT,
    raw: {
      title: 'Compilers for Everyone',
      link: 'https://seminars.example.com/compilers',
      description: '<p>A talk about <b>parsing</b>.</p>',
      publishedAt: 'Tue, 10 Jun 2025 14:00:00 +0000',
      imageUrl: null,
      categories: ['Lecture'],
      ...overrides,
    },
  };
}

test('normalizeFeedEvent', async t => {
  await t.test('places the event at the feed location', () => {
    assert.deepEqual(normalizeFeedEvent(entry(), FEED), {
      title: 'Compilers for Everyone',
      description: 'A talk about parsing .',
      address: null,
      city: 'Cambridge',
      country: 'United Kingdom',
      capacity: null,
      latitude: 52.2053,
      longitude: 0.1218,
      source: 'Example Seminars',
      url: 'https://seminars.example.com/compilers',
      type: 'Lecture',
      image: null,
      mapImage: null,
      startTime: new Date('2025-06-10T14:00:00Z'),
      endTime: null,
    });
  });

  await t.test('uses the fetch time when the entry has no date', () => {
    const event = normalizeFeedEvent(entry({ publishedAt: null, categories: [] }), FEED);
    assert.deepEqual(event.startTime, new Date(FETCHED_AT));
    assert.equal(event.type, null);
  });

  await t.test('rejects entries without a title or link', () => {
    assert.throws(() => normalizeFeedEvent(entry({ title: null }), FEED));
    assert.throws(() => normalizeFeedEvent(entry({ link: '  ' }), FEED));
  });
});

test('normalizeFeedNews', async t => {
  await t.test('classifies the headline', () => {
    const news = normalizeFeedNews(entry({
      title: 'Chipmaker unveils new GPU',
      description: 'Faster &amp; cooler',
      imageUrl: 'https://img.example.com/gpu.jpg',
    }), 'Example News');

    assert.deepEqual(news, {
      title: 'Chipmaker unveils new GPU',
      summary: 'Faster & cooler',
      url: 'https://seminars.example.com/compilers',
      imageUrl: 'https://img.example.com/gpu.jpg',
      source: 'Example News',
      topic: 'Hardware',
      publishedAt: new Date('2025-06-10T14:00:00Z'),
    });
  });

  await t.test('leaves the summary empty when the entry has none', () => {
    assert.equal(normalizeFeedNews(entry({ description: null }), 'Example News').summary, null);
  });
});
