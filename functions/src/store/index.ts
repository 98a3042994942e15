import type { AppConfig } from '../config';
import { getDb } from '../firebase/admin';
import { FirestoreDataStore } from './firestoreStore';
import { MemoryDataStore } from './memoryStore';
import type { DataStore } from './types';

export function createDataStore(config: Pick<AppConfig, 'dataStore'>): DataStore {
  return config.dataStore === 'memory'
    ? new MemoryDataStore()
    : new FirestoreDataStore(getDb());
}

export type { DataStore, StoreTransaction, NewsQuery } from './types';
export { MemoryDataStore } from './memoryStore';
export { FirestoreDataStore } from './firestoreStore';
