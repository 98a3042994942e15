import { ConflictError } from '../errors';
import type { EventDraft, EventRecord } from '../models/event';
import type { NewsDraft, NewsRecord } from '../models/news';
import type { DataStore, StoreTransaction } from '../store/types';

export type DuplicateLookup<T> =
  | { status: 'found'; record: T }
  | { status: 'not-found' };

export type IngestOutcome = 'added' | 'skipped';

/**
 * A stored event with the same url is a duplicate. Events without a url fall
 * back to an exact title match.
 */
export async function findDuplicateEvent(
  tx: StoreTransaction,
  draft: EventDraft,
): Promise<DuplicateLookup<EventRecord>> {
  const existing = draft.url
    ? await tx.findEventByUrl(draft.url)
    : await tx.findEventByTitle(draft.title);
  return existing ? { status: 'found', record: existing } : { status: 'not-found' };
}

export async function findDuplicateNews(
  tx: StoreTransaction,
  draft: NewsDraft,
): Promise<DuplicateLookup<NewsRecord>> {
  const existing = await tx.findNewsByUrl(draft.url);
  return existing ? { status: 'found', record: existing } : { status: 'not-found' };
}

/**
 * Inserts the event unless it is already stored. Existing records are never
 * updated. A conflict raised by the store's own uniqueness guard means a
 * concurrent run won the race, which also counts as skipped.
 */
export async function ingestEvent(store: DataStore, draft: EventDraft): Promise<IngestOutcome> {
  return skipOnConflict(() => store.transact(async tx => {
    const lookup = await findDuplicateEvent(tx, draft);
    if (lookup.status === 'found') {
      return 'skipped';
    }
    await tx.insertEvent(draft);
    return 'added';
  }));
}

export async function ingestNews(store: DataStore, draft: NewsDraft): Promise<IngestOutcome> {
  return skipOnConflict(() => store.transact(async tx => {
    const lookup = await findDuplicateNews(tx, draft);
    if (lookup.status === 'found') {
      return 'skipped';
    }
    await tx.insertNews(draft);
    return 'added';
  }));
}

async function skipOnConflict(run: () => Promise<IngestOutcome>): Promise<IngestOutcome> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof ConflictError) {
      return 'skipped';
    }
    throw error;
  }
}
