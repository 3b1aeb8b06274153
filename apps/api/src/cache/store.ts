import type { ResultSet } from '../types.js';

export interface StoredEntry {
  key: string;
  value: ResultSet;
  createdAt: number; // epoch ms
  ttlMs: number;
}

/**
 * One tier of the search cache. Implementations throw when the backing
 * store is unreachable; TieredCache decides what a failure means.
 */
export interface CacheStore {
  readonly name: string;
  get(key: string): Promise<StoredEntry | undefined>;
  set(entry: StoredEntry): Promise<void>;
  delete(key: string): Promise<void>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export function isExpired(entry: Pick<StoredEntry, 'createdAt' | 'ttlMs'>, now: number): boolean {
  return now >= entry.createdAt + entry.ttlMs;
}
