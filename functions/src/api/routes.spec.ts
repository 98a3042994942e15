import assert from 'node:assert/strict';
import test from 'node:test';
import jwt from 'jsonwebtoken';
import request from 'supertest';
import type { EventProviderAdapter, ProviderAdapter } from '../connectors/providerAdapters';
import { JwtCredentialService } from '../middleware/auth';
import { MemoryDataStore } from '../store/memoryStore';
import { buildEventDraft, buildNewsDraft, fixedClock } from '../testing/fixtures';
import { createApp } from './routes';

const API_KEY = 'test-api-key';
const JWT_SECRET = 'test-secret';

function tokenFor(userId: string, admin = false): string {
  return jwt.sign({ sub: userId, admin }, JWT_SECRET, { algorithm: 'HS256' });
}

const USER_TOKEN = tokenFor('user-1');
const OTHER_TOKEN = tokenFor('user-2');
const ADMIN_TOKEN = tokenFor('admin-1', true);

function buildApp(store = new MemoryDataStore(fixedClock), extraAdapters: ProviderAdapter[] = []) {
  const fakeFeed: EventProviderAdapter<{ title: string }> = {
    id: 'feed:fake',
    label: 'Fake Feed',
    kind: 'event',
    fetchRawItems: async () => [{ provider: 'feed:fake', fetchedAt: '2025-05-01T00:00:00.000Z', raw: { title: 'Fed Event' } }],
    normalize: payload => buildEventDraft({ title: payload.raw.title, url: 'https://events.example.com/fed', source: 'Fake Feed' }),
  };

  const app = createApp({
    store,
    config: { apiKey: API_KEY, defaultRadiusKm: 50, defaultRankingStrategy: 'provider-priority' },
    credentials: new JwtCredentialService(JWT_SECRET),
    adapters: [fakeFeed, ...extraAdapters],
  });
  return { app, store };
}

function asUser(token: string) {
  return { 'x-api-key': API_KEY, Authorization: `Bearer ${token}` };
}

test('api', async t => {
  await t.test('requires the API key', async () => {
    const { app } = buildApp();
    const response = await request(app).get('/status');
    assert.equal(response.status, 403);
    assert.equal(response.body.message, 'Invalid or missing API key');
  });

  await t.test('reports status with only the API key', async () => {
    const { app } = buildApp();
    const response = await request(app).get('/status').query({ apiKey: API_KEY });
    assert.equal(response.status, 200);
    assert.equal(response.body.status, 'healthy');
    assert.deepEqual(response.body.services.providers, ['feed:fake']);
  });

  await t.test('returns 401 without a bearer token', async () => {
    const { app } = buildApp();
    const response = await request(app).get('/events').set('x-api-key', API_KEY);
    assert.equal(response.status, 401);
    assert.equal(response.body.code, 'UNAUTHORIZED');
  });

  await t.test('returns 401 for a token signed with another secret', async () => {
    const { app } = buildApp();
    const forged = jwt.sign({ sub: 'user-1', admin: true }, 'other-secret');
    const response = await request(app).get('/events').set(asUser(forged));
    assert.equal(response.status, 401);
  });

  await t.test('lists events as a page', async () => {
    const { app, store } = buildApp();
    await store.createEvent(buildEventDraft({ url: 'https://events.example.com/1', title: 'Older', startTime: new Date('2025-01-01T00:00:00Z') }));
    await store.createEvent(buildEventDraft({ url: 'https://events.example.com/2', title: 'Newer', startTime: new Date('2025-02-01T00:00:00Z') }));

    const response = await request(app).get('/events').set(asUser(USER_TOKEN)).query({ limit: 1 });
    assert.equal(response.status, 200);
    assert.equal(response.body.total, 2);
    assert.equal(response.body.limit, 1);
    assert.equal(response.body.offset, 0);
    assert.equal(response.body.strategy, 'provider-priority');
    assert.deepEqual(response.body.items.map((item: { title: string }) => item.title), ['Newer']);
  });

  await t.test('ranks by the caller location when asked', async () => {
    const { app, store } = buildApp();
    await store.createEvent(buildEventDraft({ url: 'https://events.example.com/ny', city: 'New York', country: 'United States' }));
    await store.createEvent(buildEventDraft({ url: 'https://events.example.com/cam', city: 'Cambridge', country: 'United Kingdom' }));
    await request(app).put('/users/me/location').set(asUser(USER_TOKEN)).send({ city: 'Cambridge' }).expect(200);

    const response = await request(app)
      .get('/events')
      .set(asUser(USER_TOKEN))
      .query({ strategy: 'location-tiered' });
    assert.equal(response.status, 200);
    assert.deepEqual(response.body.items.map((item: { url: string }) => item.url), ['https://events.example.com/cam']);
  });

  await t.test('rejects invalid paging and strategy values', async () => {
    const { app } = buildApp();
    const negative = await request(app).get('/events').set(asUser(USER_TOKEN)).query({ limit: -1 });
    assert.equal(negative.status, 400);
    assert.equal(negative.body.code, 'VALIDATION_FAILED');

    const strategy = await request(app).get('/events').set(asUser(USER_TOKEN)).query({ strategy: 'random' });
    assert.equal(strategy.status, 400);
  });

  await t.test('limits event mutations to admins', async () => {
    const { app } = buildApp();
    const body = { title: 'Admin Event', startTime: '2025-06-01T10:00:00Z', capacity: 1 };

    const forbidden = await request(app).post('/events').set(asUser(USER_TOKEN)).send(body);
    assert.equal(forbidden.status, 403);

    const created = await request(app).post('/events').set(asUser(ADMIN_TOKEN)).send(body);
    assert.equal(created.status, 201);
    assert.equal(created.body.id, 1);
    assert.equal(created.body.startTime, '2025-06-01T10:00:00.000Z');

    const updated = await request(app)
      .put('/events/1')
      .set(asUser(ADMIN_TOKEN))
      .send({ ...body, title: 'Renamed Event' });
    assert.equal(updated.status, 200);
    assert.equal(updated.body.title, 'Renamed Event');

    const fetched = await request(app).get('/events/1').set(asUser(USER_TOKEN));
    assert.equal(fetched.body.title, 'Renamed Event');
    assert.equal(fetched.body.registrationCount, 0);

    await request(app).delete('/events/1').set(asUser(ADMIN_TOKEN)).expect(204);
    await request(app).get('/events/1').set(asUser(USER_TOKEN)).expect(404);
  });

  await t.test('validates event bodies', async () => {
    const { app } = buildApp();
    const missingStart = await request(app).post('/events').set(asUser(ADMIN_TOKEN)).send({ title: 'No start' });
    assert.equal(missingStart.status, 400);
    assert.equal(missingStart.body.message, 'startTime is required');

    const badId = await request(app).get('/events/abc').set(asUser(USER_TOKEN));
    assert.equal(badId.status, 400);
  });

  await t.test('handles registrations', async () => {
    const { app, store } = buildApp();
    const event = await store.createEvent(buildEventDraft({ capacity: 1 }));

    const first = await request(app).post(`/registrations/${event.id}`).set(asUser(USER_TOKEN));
    assert.equal(first.status, 201);
    assert.equal(first.body.userId, 'user-1');

    const duplicate = await request(app).post(`/registrations/${event.id}`).set(asUser(USER_TOKEN));
    assert.equal(duplicate.status, 409);
    assert.equal(duplicate.body.code, 'ALREADY_REGISTERED');

    const full = await request(app).post(`/registrations/${event.id}`).set(asUser(OTHER_TOKEN));
    assert.equal(full.status, 409);
    assert.equal(full.body.code, 'EVENT_FULL');

    const missing = await request(app).post('/registrations/999').set(asUser(USER_TOKEN));
    assert.equal(missing.status, 404);

    await request(app).get(`/registrations/event/${event.id}`).set(asUser(USER_TOKEN)).expect(403);
    const listed = await request(app).get(`/registrations/event/${event.id}`).set(asUser(ADMIN_TOKEN));
    assert.equal(listed.status, 200);
    assert.equal(listed.body.total, 1);

    await request(app).delete(`/registrations/${event.id}`).set(asUser(USER_TOKEN)).expect(204);
    await request(app).delete(`/registrations/${event.id}`).set(asUser(USER_TOKEN)).expect(404);
    await request(app).post(`/registrations/${event.id}`).set(asUser(OTHER_TOKEN)).expect(201);
  });

  await t.test('lists news with a topic filter', async () => {
    const { app, store } = buildApp();
    await store.transact(async tx => {
      await tx.insertNews(buildNewsDraft({ url: 'https://news.example.com/1', topic: 'AI', publishedAt: new Date('2025-01-02T00:00:00Z') }));
      await tx.insertNews(buildNewsDraft({ url: 'https://news.example.com/2', topic: 'Security', publishedAt: new Date('2025-01-03T00:00:00Z') }));
    });

    const all = await request(app).get('/news').set(asUser(USER_TOKEN));
    assert.deepEqual(all.body.items.map((item: { url: string }) => item.url), [
      'https://news.example.com/2',
      'https://news.example.com/1',
    ]);

    const ai = await request(app).get('/news').set(asUser(USER_TOKEN)).query({ topic: 'AI' });
    assert.equal(ai.body.total, 1);
    assert.equal(ai.body.items[0].topic, 'AI');
  });

  await t.test('limits refreshes to admins', async () => {
    const { app, store } = buildApp();
    await request(app).post('/events/refresh').set(asUser(USER_TOKEN)).expect(403);

    const refreshed = await request(app).post('/events/refresh').set(asUser(ADMIN_TOKEN));
    assert.equal(refreshed.status, 200);
    assert.deepEqual(refreshed.body.results, [
      { provider: 'feed:fake', fetched: 1, added: 1, skipped: 0, failed: 0 },
    ]);
    assert.deepEqual((await store.listEvents()).map(event => event.title), ['Fed Event']);

    const unknown = await request(app).post('/events/refresh').set(asUser(ADMIN_TOKEN)).query({ provider: 'nope' });
    assert.equal(unknown.status, 404);

    const news = await request(app).post('/news/refresh').set(asUser(ADMIN_TOKEN));
    assert.equal(news.status, 200);
    assert.deepEqual(news.body.results, []);
  });

  await t.test('does not run a news provider through the event refresh', async () => {
    const fakeNews: ProviderAdapter = {
      id: 'news:fake',
      label: 'Fake News',
      kind: 'news',
      fetchRawItems: async () => [{ provider: 'news:fake', fetchedAt: '2025-05-01T00:00:00.000Z', raw: {} }],
      normalize: () => buildNewsDraft({ url: 'https://news.example.com/fake' }),
    };
    const { app, store } = buildApp(new MemoryDataStore(fixedClock), [fakeNews]);

    const response = await request(app)
      .post('/events/refresh')
      .set(asUser(ADMIN_TOKEN))
      .query({ provider: 'news:fake' });
    assert.equal(response.status, 404);
    assert.deepEqual(await store.listNews(), []);
  });

  await t.test('reads and updates the caller profile', async () => {
    const { app } = buildApp();
    const empty = await request(app).get('/users/me').set(asUser(USER_TOKEN));
    assert.deepEqual(empty.body, {
      id: 'user-1',
      latitude: null,
      longitude: null,
      city: null,
      country: null,
      updatedAt: null,
      isAdmin: false,
    });

    const invalid = await request(app).put('/users/me/location').set(asUser(USER_TOKEN)).send({ latitude: 52.2 });
    assert.equal(invalid.status, 400);

    const updated = await request(app)
      .put('/users/me/location')
      .set(asUser(USER_TOKEN))
      .send({ latitude: 52.2, longitude: 0.12, city: 'Cambridge', country: 'United Kingdom' });
    assert.equal(updated.status, 200);
    assert.equal(updated.body.city, 'Cambridge');
    assert.equal(updated.body.updatedAt, '2025-05-01T12:00:00.000Z');
  });

  await t.test('rejects malformed JSON bodies', async () => {
    const { app } = buildApp();
    const response = await request(app)
      .put('/users/me/location')
      .set(asUser(USER_TOKEN))
      .set('Content-Type', 'application/json')
      .send('{"city":');
    assert.equal(response.status, 400);
    assert.equal(response.body.code, 'VALIDATION_FAILED');
  });
});
