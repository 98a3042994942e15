import { ConflictError } from '../errors';
import type { EventDraft, EventFields, EventRecord } from '../models/event';
import type { NewsDraft, NewsRecord } from '../models/news';
import type { RegistrationRecord } from '../models/registration';
import type { LocationProfile, UserProfile } from '../models/user';
import { registrationKey, urlKey } from './keys';
import type { DataStore, NewsQuery, StoreTransaction } from './types';

interface MemoryState {
  events: Map<number, EventRecord>;
  news: Map<string, NewsRecord>;
  registrations: Map<string, RegistrationRecord>;
  users: Map<string, UserProfile>;
}

/**
 * Process-local store for local runs and tests. Transactions run one at a
 * time; their writes are staged and applied only when the work resolves.
 */
export class MemoryDataStore implements DataStore {
  private readonly state: MemoryState = {
    events: new Map(),
    news: new Map(),
    registrations: new Map(),
    users: new Map(),
  };
  private nextEventId = 1;
  private nextRegistrationId = 1;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  transact<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const tx = new MemoryTransaction(this.state, this.clock, () => this.nextEventId++, () => this.nextRegistrationId++);
      const result = await work(tx);
      tx.commit();
      return result;
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  async listEvents(): Promise<EventRecord[]> {
    return Array.from(this.state.events.values(), event => structuredClone(event));
  }

  async getEvent(eventId: number): Promise<EventRecord | null> {
    const event = this.state.events.get(eventId);
    return event ? structuredClone(event) : null;
  }

  async createEvent(fields: EventFields): Promise<EventRecord> {
    return this.transact(tx => tx.insertEvent(fields));
  }

  async replaceEvent(eventId: number, fields: EventFields): Promise<EventRecord | null> {
    return this.transact(async () => {
      const existing = this.state.events.get(eventId);
      if (!existing) {
        return null;
      }
      if (fields.url && fields.url !== existing.url) {
        assertUrlAvailable(this.state, fields.url, eventId);
      }
      const next: EventRecord = { ...structuredClone(fields), id: eventId, createdAt: existing.createdAt };
      this.state.events.set(eventId, next);
      return structuredClone(next);
    });
  }

  async deleteEvent(eventId: number): Promise<boolean> {
    return this.transact(async () => {
      if (!this.state.events.delete(eventId)) {
        return false;
      }
      for (const [key, registration] of this.state.registrations) {
        if (registration.eventId === eventId) {
          this.state.registrations.delete(key);
        }
      }
      return true;
    });
  }

  async listRegistrations(eventId: number): Promise<RegistrationRecord[]> {
    return Array.from(this.state.registrations.values())
      .filter(registration => registration.eventId === eventId)
      .map(registration => structuredClone(registration));
  }

  async countRegistrations(eventId: number): Promise<number> {
    return countFor(this.state, eventId);
  }

  async listNews(query: NewsQuery = {}): Promise<NewsRecord[]> {
    const topic = query.topic?.trim();
    return Array.from(this.state.news.values())
      .filter(item => !topic || item.topic === topic)
      .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime())
      .map(item => structuredClone(item));
  }

  async getUser(userId: string): Promise<UserProfile | null> {
    const user = this.state.users.get(userId);
    return user ? structuredClone(user) : null;
  }

  async updateUserLocation(userId: string, location: LocationProfile): Promise<UserProfile> {
    const profile: UserProfile = { id: userId, ...location, updatedAt: this.clock() };
    this.state.users.set(userId, profile);
    return structuredClone(profile);
  }
}

class MemoryTransaction implements StoreTransaction {
  private readonly staged: Array<() => void> = [];
  private readonly stagedEventUrls = new Set<string>();
  private readonly stagedNewsKeys = new Set<string>();
  private readonly stagedRegistrationKeys = new Set<string>();

  constructor(
    private readonly state: MemoryState,
    private readonly clock: () => Date,
    private readonly allocateEventId: () => number,
    private readonly allocateRegistrationId: () => number,
  ) {}

  async getEvent(eventId: number): Promise<EventRecord | null> {
    const event = this.state.events.get(eventId);
    return event ? structuredClone(event) : null;
  }

  async findEventByUrl(url: string): Promise<EventRecord | null> {
    return this.findEvent(event => event.url === url);
  }

  async findEventByTitle(title: string): Promise<EventRecord | null> {
    return this.findEvent(event => event.title === title);
  }

  async findNewsByUrl(url: string): Promise<NewsRecord | null> {
    const item = this.state.news.get(urlKey(url));
    return item ? structuredClone(item) : null;
  }

  async findRegistration(userId: string, eventId: number): Promise<RegistrationRecord | null> {
    const registration = this.state.registrations.get(registrationKey(userId, eventId));
    return registration ? structuredClone(registration) : null;
  }

  async countRegistrations(eventId: number): Promise<number> {
    return countFor(this.state, eventId);
  }

  async insertEvent(draft: EventDraft): Promise<EventRecord> {
    if (draft.url) {
      if (this.stagedEventUrls.has(draft.url)) {
        throw new ConflictError(`An event with url ${draft.url} already exists`, 'DUPLICATE_EVENT');
      }
      assertUrlAvailable(this.state, draft.url, null);
      this.stagedEventUrls.add(draft.url);
    }
    const record: EventRecord = { ...structuredClone(draft), id: this.allocateEventId(), createdAt: this.clock() };
    this.staged.push(() => this.state.events.set(record.id, record));
    return structuredClone(record);
  }

  async insertNews(draft: NewsDraft): Promise<NewsRecord> {
    const key = urlKey(draft.url);
    if (this.state.news.has(key) || this.stagedNewsKeys.has(key)) {
      throw new ConflictError(`A news item with url ${draft.url} already exists`, 'DUPLICATE_NEWS');
    }
    this.stagedNewsKeys.add(key);
    const record: NewsRecord = { ...structuredClone(draft), id: key };
    this.staged.push(() => this.state.news.set(key, record));
    return structuredClone(record);
  }

  async insertRegistration(userId: string, eventId: number): Promise<RegistrationRecord> {
    const key = registrationKey(userId, eventId);
    if (this.state.registrations.has(key) || this.stagedRegistrationKeys.has(key)) {
      throw new ConflictError('User already registered for this event', 'ALREADY_REGISTERED');
    }
    this.stagedRegistrationKeys.add(key);
    const record: RegistrationRecord = {
      id: String(this.allocateRegistrationId()),
      userId,
      eventId,
      createdAt: this.clock(),
    };
    this.staged.push(() => this.state.registrations.set(key, record));
    return structuredClone(record);
  }

  async deleteRegistration(registration: RegistrationRecord): Promise<void> {
    const key = registrationKey(registration.userId, registration.eventId);
    this.staged.push(() => this.state.registrations.delete(key));
  }

  commit(): void {
    for (const apply of this.staged) {
      apply();
    }
    this.staged.length = 0;
  }

  private findEvent(predicate: (event: EventRecord) => boolean): EventRecord | null {
    for (const event of this.state.events.values()) {
      if (predicate(event)) {
        return structuredClone(event);
      }
    }
    return null;
  }
}

function countFor(state: MemoryState, eventId: number): number {
  let count = 0;
  for (const registration of state.registrations.values()) {
    if (registration.eventId === eventId) {
      count += 1;
    }
  }
  return count;
}

function assertUrlAvailable(state: MemoryState, url: string, ownerId: number | null): void {
  for (const event of state.events.values()) {
    if (event.url === url && event.id !== ownerId) {
      throw new ConflictError(`An event with url ${url} already exists`, 'DUPLICATE_EVENT');
    }
  }
}
