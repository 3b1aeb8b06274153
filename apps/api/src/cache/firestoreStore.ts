import admin from 'firebase-admin';
import { getFirestore } from '../firebase.js';
import { parseResultSet } from './schema.js';
import type { CacheStore, StoredEntry } from './store.js';

const SEARCH_CACHE_COLLECTION = 'searchCache';

/**
 * Remote tier backed by one Firestore document per fingerprint. `expireAt`
 * lets a Firestore TTL policy remove stale documents on its own; reads never
 * rely on it.
 */
export class FirestoreCacheStore implements CacheStore {
  readonly name = 'firestore';

  constructor(private readonly collection: string = SEARCH_CACHE_COLLECTION) {}

  private doc(key: string) {
    return getFirestore().collection(this.collection).doc(key);
  }

  async get(key: string): Promise<StoredEntry | undefined> {
    const snap = await this.doc(key).get();
    if (!snap.exists) return undefined;

    const payload: unknown = snap.get('payload');
    const createdAt: unknown = snap.get('createdAt');
    const ttlMs: unknown = snap.get('ttlMs');
    if (typeof payload !== 'string' || typeof createdAt !== 'number' || typeof ttlMs !== 'number') {
      return undefined;
    }

    const value = parseResultSet(payload);
    if (!value) return undefined;
    return { key, value, createdAt, ttlMs };
  }

  async set(entry: StoredEntry): Promise<void> {
    await this.doc(entry.key).set({
      payload: JSON.stringify(entry.value),
      provenance: entry.value.provenance,
      resultCount: entry.value.records.length,
      createdAt: entry.createdAt,
      ttlMs: entry.ttlMs,
      expireAt: admin.firestore.Timestamp.fromMillis(entry.createdAt + entry.ttlMs)
    });
  }

  async delete(key: string): Promise<void> {
    await this.doc(key).delete();
  }

  async ping(): Promise<boolean> {
    // Read-only check: attempt to read a non-existent doc.
    await getFirestore().doc('_health/ping').get();
    return true;
  }

  async close(): Promise<void> {
    // The Firebase app is shared with persistence; it is closed at shutdown.
  }
}
