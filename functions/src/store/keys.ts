import { createHash } from 'crypto';

/** Stable document key for a url; Firestore ids may not contain "/". */
export function urlKey(url: string): string {
  return createHash('sha256').update(url).digest('hex').substring(0, 40);
}

export function registrationKey(userId: string, eventId: number): string {
  return `${eventId}__${encodeURIComponent(userId)}`;
}
