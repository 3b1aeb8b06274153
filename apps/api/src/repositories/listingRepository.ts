import { createHash, randomUUID } from 'node:crypto';
import admin from 'firebase-admin';
import { getFirestore } from '../firebase.js';
import { createLogger } from '../logger.js';
import type { ListingRecord, ResultSet, SearchFilters } from '../types.js';

const logger = createLogger('persistence');

const SEARCHES_COLLECTION = 'searches';
const LISTINGS_SUBCOLLECTION = 'listings';

// Firestore caps a batch at 500 operations; one is taken by the search document.
const MAX_BATCH_WRITES = 450;

/** Firestore document ids cannot contain '/'. */
export function listingDocId(record: ListingRecord): string {
  if (record.sourceId) return record.sourceId.replace(/\//g, '_');
  const digest = createHash('sha256')
    .update(`${record.source}|${record.url ?? ''}|${record.title}|${record.price ?? ''}`)
    .digest('hex');
  return `${record.source}:${digest.slice(0, 20)}`;
}

export interface SavedSearch {
  searchId: string;
  listings: number;
}

/**
 * Store one assembled search: a `searches/{id}` document plus its live
 * listings in the `listings` subcollection, committed as one batch.
 */
export async function saveSearchResults(resultSet: ResultSet, filters: SearchFilters): Promise<SavedSearch> {
  const db = getFirestore();

  const searchId = randomUUID();
  const now = admin.firestore.Timestamp.now();
  const searchRef = db.collection(SEARCHES_COLLECTION).doc(searchId);
  const batch = db.batch();

  const live = resultSet.records.filter((record) => record.provenance === 'live');
  const listings = live.slice(0, MAX_BATCH_WRITES - 1);
  if (listings.length < live.length) {
    logger.warn('search has more listings than one batch holds; extra listings not stored', {
      searchId,
      fingerprint: resultSet.fingerprint,
      stored: listings.length,
      dropped: live.length - listings.length
    });
  }

  batch.set(searchRef, {
    fingerprint: resultSet.fingerprint,
    city: filters.city,
    state: filters.state,
    filters,
    provenance: resultSet.provenance,
    resultCount: listings.length,
    stats: resultSet.stats,
    sources: resultSet.sources,
    assembledAt: resultSet.assembledAt,
    createdAt: now
  });

  const listingsCol = searchRef.collection(LISTINGS_SUBCOLLECTION);
  for (const record of listings) {
    batch.set(listingsCol.doc(listingDocId(record)), { ...record, searchId, retrievedAt: now });
  }

  await batch.commit();
  return { searchId, listings: listings.length };
}

export class FirestoreListingRepository {
  async persist(resultSet: ResultSet, filters: SearchFilters): Promise<void> {
    const saved = await saveSearchResults(resultSet, filters);
    logger.debug('search persisted', { searchId: saved.searchId, listings: saved.listings });
  }
}
