import * as admin from 'firebase-admin';
import { SearchHit, SearchRequest } from '../search';
import { termQueryOf } from '../query-builder';

/**
 * Translates a search request into a Firestore query over the collection named
 * after the index. Firestore has no scoring and no replica routing, so
 * `trackScores` and `preference` need no translation.
 */
export function buildFirestoreQuery(
  db: admin.firestore.Firestore,
  request: SearchRequest
): admin.firestore.Query {
  const term = termQueryOf(request);
  let query: admin.firestore.Query = db
    .collection(request.index)
    .where(term.field, '==', term.value);

  if (!request.source.fetchSource) {
    query = query.select();
  }

  if (request.source.from > 0) {
    query = query.offset(request.source.from);
  }

  return query.limit(request.source.size);
}

export function docToHit(index: string, doc: admin.firestore.QueryDocumentSnapshot): SearchHit {
  return {
    index,
    id: doc.id,
    source: doc.data(),
  };
}
