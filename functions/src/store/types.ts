import type { EventDraft, EventFields, EventRecord } from '../models/event';
import type { NewsDraft, NewsRecord } from '../models/news';
import type { RegistrationRecord } from '../models/registration';
import type { LocationProfile, UserProfile } from '../models/user';

/**
 * Reads and writes that run inside one atomic unit. Implementations must
 * reject an insert that breaks a uniqueness rule with a ConflictError, even
 * when the earlier existence check passed.
 */
export interface StoreTransaction {
  getEvent(eventId: number): Promise<EventRecord | null>;
  findEventByUrl(url: string): Promise<EventRecord | null>;
  findEventByTitle(title: string): Promise<EventRecord | null>;
  findNewsByUrl(url: string): Promise<NewsRecord | null>;
  findRegistration(userId: string, eventId: number): Promise<RegistrationRecord | null>;
  countRegistrations(eventId: number): Promise<number>;

  insertEvent(draft: EventDraft): Promise<EventRecord>;
  insertNews(draft: NewsDraft): Promise<NewsRecord>;
  insertRegistration(userId: string, eventId: number): Promise<RegistrationRecord>;
  deleteRegistration(registration: RegistrationRecord): Promise<void>;
}

export interface NewsQuery {
  topic?: string | null;
}

export interface DataStore {
  transact<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;

  listEvents(): Promise<EventRecord[]>;
  getEvent(eventId: number): Promise<EventRecord | null>;
  createEvent(fields: EventFields): Promise<EventRecord>;
  replaceEvent(eventId: number, fields: EventFields): Promise<EventRecord | null>;
  /** Deletes the event and its registrations. Returns false when the event did not exist. */
  deleteEvent(eventId: number): Promise<boolean>;

  listRegistrations(eventId: number): Promise<RegistrationRecord[]>;
  countRegistrations(eventId: number): Promise<number>;

  /** Latest first. */
  listNews(query?: NewsQuery): Promise<NewsRecord[]>;

  getUser(userId: string): Promise<UserProfile | null>;
  updateUserLocation(userId: string, location: LocationProfile): Promise<UserProfile>;
}
