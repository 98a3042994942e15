import {
  FieldValue,
  Timestamp,
  type DocumentData,
  type DocumentReference,
  type DocumentSnapshot,
  type Firestore,
  type Query,
  type Transaction,
} from 'firebase-admin/firestore';
import { ConflictError } from '../errors';
import type { EventDraft, EventFields, EventRecord } from '../models/event';
import type { NewsDraft, NewsRecord } from '../models/news';
import type { RegistrationRecord } from '../models/registration';
import type { LocationProfile, UserProfile } from '../models/user';
import { registrationKey, urlKey } from './keys';
import type { DataStore, NewsQuery, StoreTransaction } from './types';

const EVENTS = 'events';
const EVENT_URLS = 'eventUrls';
const NEWS = 'news';
const REGISTRATIONS = 'registrations';
const USERS = 'users';
const COUNTERS = 'counters';
const BATCH_LIMIT = 450;

// gRPC status for a create() on a document that already exists.
const ALREADY_EXISTS = 6;

export class FirestoreDataStore implements DataStore {
  constructor(private readonly db: Firestore) {}

  async transact<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return this.runTransaction(tx => work(new FirestoreTransaction(this.db, tx)));
  }

  async listEvents(): Promise<EventRecord[]> {
    const snapshot = await this.db.collection(EVENTS).get();
    return snapshot.docs.map(doc => toEventRecord(doc.data()));
  }

  async getEvent(eventId: number): Promise<EventRecord | null> {
    const snapshot = await this.eventRef(eventId).get();
    return readEvent(snapshot);
  }

  async createEvent(fields: EventFields): Promise<EventRecord> {
    return this.transact(tx => tx.insertEvent(fields));
  }

  async replaceEvent(eventId: number, fields: EventFields): Promise<EventRecord | null> {
    return this.runTransaction(async tx => {
      const ref = this.eventRef(eventId);
      const snapshot = await tx.get(ref);
      const existing = readEvent(snapshot);
      if (!existing) {
        return null;
      }

      if (fields.url !== existing.url) {
        if (fields.url) {
          const nextIndex = this.db.collection(EVENT_URLS).doc(urlKey(fields.url));
          const taken = await tx.get(nextIndex);
          if (taken.exists) {
            throw new ConflictError(`An event with url ${fields.url} already exists`, 'DUPLICATE_EVENT');
          }
          tx.create(nextIndex, { eventId, url: fields.url });
        }
        if (existing.url) {
          tx.delete(this.db.collection(EVENT_URLS).doc(urlKey(existing.url)));
        }
      }

      const next: EventRecord = { ...fields, id: eventId, createdAt: existing.createdAt };
      tx.set(ref, { ...fromEventRecord(next), registrationCount: readCount(snapshot) });
      return next;
    });
  }

  /**
   * Removes the event document first so a concurrent register sees it missing,
   * then sweeps the registrations that committed before the delete.
   */
  async deleteEvent(eventId: number): Promise<boolean> {
    const deleted = await this.runTransaction(async tx => {
      const ref = this.eventRef(eventId);
      const existing = readEvent(await tx.get(ref));
      if (!existing) {
        return false;
      }
      if (existing.url) {
        tx.delete(this.db.collection(EVENT_URLS).doc(urlKey(existing.url)));
      }
      tx.delete(ref);
      return true;
    });
    if (!deleted) {
      return false;
    }

    const registrations = await this.db.collection(REGISTRATIONS).where('eventId', '==', eventId).get();
    const refs: DocumentReference[] = registrations.docs.map(doc => doc.ref);
    for (let index = 0; index < refs.length; index += BATCH_LIMIT) {
      const batch = this.db.batch();
      for (const docRef of refs.slice(index, index + BATCH_LIMIT)) {
        batch.delete(docRef);
      }
      await batch.commit();
    }
    return true;
  }

  async listRegistrations(eventId: number): Promise<RegistrationRecord[]> {
    const snapshot = await this.db.collection(REGISTRATIONS).where('eventId', '==', eventId).get();
    return snapshot.docs.map(doc => toRegistrationRecord(doc.id, doc.data()));
  }

  async countRegistrations(eventId: number): Promise<number> {
    const snapshot = await this.db.collection(REGISTRATIONS).where('eventId', '==', eventId).count().get();
    return snapshot.data().count;
  }

  async listNews(query: NewsQuery = {}): Promise<NewsRecord[]> {
    let newsQuery: Query = this.db.collection(NEWS);
    const topic = query.topic?.trim();
    if (topic) {
      newsQuery = newsQuery.where('topic', '==', topic);
    }
    const snapshot = await newsQuery.orderBy('publishedAt', 'desc').get();
    return snapshot.docs.map(doc => toNewsRecord(doc.id, doc.data()));
  }

  async getUser(userId: string): Promise<UserProfile | null> {
    const snapshot = await this.db.collection(USERS).doc(userId).get();
    const data = snapshot.data();
    return data ? toUserProfile(userId, data) : null;
  }

  async updateUserLocation(userId: string, location: LocationProfile): Promise<UserProfile> {
    const updatedAt = new Date();
    await this.db.collection(USERS).doc(userId).set({
      latitude: location.latitude,
      longitude: location.longitude,
      city: location.city,
      country: location.country,
      updatedAt: Timestamp.fromDate(updatedAt),
    }, { merge: true });
    return { id: userId, ...location, updatedAt };
  }

  private async runTransaction<T>(work: (tx: Transaction) => Promise<T>): Promise<T> {
    try {
      return await this.db.runTransaction(work);
    } catch (error) {
      if (isAlreadyExists(error)) {
        throw new ConflictError('A concurrent write already created this record');
      }
      throw error;
    }
  }

  private eventRef(eventId: number): DocumentReference {
    return this.db.collection(EVENTS).doc(String(eventId));
  }
}

/**
 * Wraps a Firestore transaction. Firestore requires every read to happen
 * before the first write, so callers check first and insert last.
 */
class FirestoreTransaction implements StoreTransaction {
  constructor(
    private readonly db: Firestore,
    private readonly tx: Transaction,
  ) {}

  async getEvent(eventId: number): Promise<EventRecord | null> {
    return readEvent(await this.tx.get(this.eventRef(eventId)));
  }

  async findEventByUrl(url: string): Promise<EventRecord | null> {
    const index = await this.tx.get(this.db.collection(EVENT_URLS).doc(urlKey(url)));
    const eventId: unknown = index.get('eventId');
    if (!index.exists || typeof eventId !== 'number') {
      return null;
    }
    return this.getEvent(eventId);
  }

  async findEventByTitle(title: string): Promise<EventRecord | null> {
    const snapshot = await this.tx.get(this.db.collection(EVENTS).where('title', '==', title).limit(1));
    const doc = snapshot.docs[0];
    return doc ? toEventRecord(doc.data()) : null;
  }

  async findNewsByUrl(url: string): Promise<NewsRecord | null> {
    const snapshot = await this.tx.get(this.db.collection(NEWS).doc(urlKey(url)));
    const data = snapshot.data();
    return data ? toNewsRecord(snapshot.id, data) : null;
  }

  async findRegistration(userId: string, eventId: number): Promise<RegistrationRecord | null> {
    const snapshot = await this.tx.get(this.db.collection(REGISTRATIONS).doc(registrationKey(userId, eventId)));
    const data = snapshot.data();
    return data ? toRegistrationRecord(snapshot.id, data) : null;
  }

  /** Reads the denormalized counter kept on the event document. */
  async countRegistrations(eventId: number): Promise<number> {
    return readCount(await this.tx.get(this.eventRef(eventId)));
  }

  async insertEvent(draft: EventDraft): Promise<EventRecord> {
    const counterRef = this.db.collection(COUNTERS).doc(EVENTS);
    const counter = await this.tx.get(counterRef);
    const current: unknown = counter.get('value');
    const id = (typeof current === 'number' ? current : 0) + 1;

    const record: EventRecord = { ...draft, id, createdAt: new Date() };
    this.tx.set(counterRef, { value: id });
    this.tx.create(this.eventRef(id), { ...fromEventRecord(record), registrationCount: 0 });
    if (draft.url) {
      this.tx.create(this.db.collection(EVENT_URLS).doc(urlKey(draft.url)), { eventId: id, url: draft.url });
    }
    return record;
  }

  async insertNews(draft: NewsDraft): Promise<NewsRecord> {
    const id = urlKey(draft.url);
    this.tx.create(this.db.collection(NEWS).doc(id), {
      title: draft.title,
      summary: draft.summary,
      url: draft.url,
      imageUrl: draft.imageUrl,
      source: draft.source,
      topic: draft.topic,
      publishedAt: Timestamp.fromDate(draft.publishedAt),
    });
    return { ...draft, id };
  }

  async insertRegistration(userId: string, eventId: number): Promise<RegistrationRecord> {
    const id = registrationKey(userId, eventId);
    const createdAt = new Date();
    this.tx.create(this.db.collection(REGISTRATIONS).doc(id), {
      userId,
      eventId,
      createdAt: Timestamp.fromDate(createdAt),
    });
    this.tx.update(this.eventRef(eventId), { registrationCount: FieldValue.increment(1) });
    return { id, userId, eventId, createdAt };
  }

  async deleteRegistration(registration: RegistrationRecord): Promise<void> {
    const eventRef = this.eventRef(registration.eventId);
    const event = await this.tx.get(eventRef);
    this.tx.delete(this.db.collection(REGISTRATIONS).doc(registration.id));
    if (event.exists) {
      this.tx.update(eventRef, { registrationCount: FieldValue.increment(-1) });
    }
  }

  private eventRef(eventId: number): DocumentReference {
    return this.db.collection(EVENTS).doc(String(eventId));
  }
}

function isAlreadyExists(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return false;
  }
  return error.code === ALREADY_EXISTS || error.code === 'already-exists';
}

function readEvent(snapshot: DocumentSnapshot): EventRecord | null {
  const data = snapshot.data();
  return data ? toEventRecord(data) : null;
}

function readCount(snapshot: DocumentSnapshot): number {
  const value: unknown = snapshot.get('registrationCount');
  return typeof value === 'number' ? value : 0;
}

function fromEventRecord(event: EventRecord): DocumentData {
  return {
    id: event.id,
    title: event.title,
    description: event.description,
    address: event.address,
    city: event.city,
    country: event.country,
    capacity: event.capacity,
    latitude: event.latitude,
    longitude: event.longitude,
    source: event.source,
    url: event.url,
    type: event.type,
    image: event.image,
    mapImage: event.mapImage,
    startTime: event.startTime ? Timestamp.fromDate(event.startTime) : null,
    endTime: event.endTime ? Timestamp.fromDate(event.endTime) : null,
    createdAt: Timestamp.fromDate(event.createdAt),
  };
}

function toEventRecord(data: DocumentData): EventRecord {
  return {
    id: readNumber(data.id) ?? 0,
    title: readString(data.title) ?? '',
    description: readString(data.description) ?? '',
    address: readString(data.address),
    city: readString(data.city),
    country: readString(data.country),
    capacity: readNumber(data.capacity),
    latitude: readNumber(data.latitude),
    longitude: readNumber(data.longitude),
    source: readString(data.source),
    url: readString(data.url),
    type: readString(data.type),
    image: readString(data.image),
    mapImage: readString(data.mapImage),
    startTime: readDate(data.startTime),
    endTime: readDate(data.endTime),
    createdAt: readDate(data.createdAt) ?? new Date(0),
  };
}

function toNewsRecord(id: string, data: DocumentData): NewsRecord {
  return {
    id,
    title: readString(data.title) ?? '',
    summary: readString(data.summary),
    url: readString(data.url) ?? '',
    imageUrl: readString(data.imageUrl),
    source: readString(data.source) ?? '',
    topic: readString(data.topic) ?? 'General',
    publishedAt: readDate(data.publishedAt) ?? new Date(0),
  };
}

function toRegistrationRecord(id: string, data: DocumentData): RegistrationRecord {
  return {
    id,
    userId: readString(data.userId) ?? '',
    eventId: readNumber(data.eventId) ?? 0,
    createdAt: readDate(data.createdAt) ?? new Date(0),
  };
}

function toUserProfile(id: string, data: DocumentData): UserProfile {
  return {
    id,
    latitude: readNumber(data.latitude),
    longitude: readNumber(data.longitude),
    city: readString(data.city),
    country: readString(data.country),
    updatedAt: readDate(data.updatedAt),
  };
}

function readString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function readNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function readDate(value: unknown): Date | null {
  if (value instanceof Timestamp) {
    return value.toDate();
  }
  if (value instanceof Date) {
    return value;
  }
  return null;
}
