import * as admin from 'firebase-admin';
import { getFirestore, type Firestore } from 'firebase-admin/firestore';

let db: Firestore | null = null;

/** Initializes the default app on first use so that importing this module has no side effects. */
export function getDb(): Firestore {
  if (!admin.apps.length) {
    admin.initializeApp();
  }
  if (!db) {
    db = getFirestore();
    db.settings({ ignoreUndefinedProperties: true });
  }
  return db;
}
