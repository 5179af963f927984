import * as admin from 'firebase-admin';
import { EnrichConfig } from '../../api/config';
import { fromAsyncSearch, SearchRunner } from '../search';
import { buildFirestoreQuery, docToHit } from '../utils/firestore-utils';

export interface FirestoreSearchRunnerOptions {
  /**
   * Firestore database instance.
   * If omitted, uses EnrichConfig.db at the time of each search.
   */
  db?: admin.firestore.Firestore;
}

/**
 * Search runner backed by Firestore: each reference index is a collection
 * named after the index.
 */
export function createFirestoreSearchRunner(options: FirestoreSearchRunnerOptions = {}): SearchRunner {
  return fromAsyncSearch(async request => {
    const db = options.db ?? EnrichConfig.db;
    const snapshot = await buildFirestoreQuery(db, request).get();
    return {
      hits: {
        total: snapshot.size,
        hits: snapshot.docs.map(doc => docToHit(request.index, doc)),
      },
    };
  });
}
