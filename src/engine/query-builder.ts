import { getEnrichIndexBaseName } from '../api/policy';
import { QueryType, SearchRequest, TermQuery } from './search';

/**
 * Builds the exact-match lookup for a match processor: a constant-score term
 * query on `matchField`, first page only, `maxMatches` hits, no score tracking,
 * full sources.
 */
export function buildMatchQuery(
  value: string,
  matchField: string,
  maxMatches: number,
  policyName: string
): SearchRequest {
  return {
    index: getEnrichIndexBaseName(policyName),
    preference: '_local',
    source: {
      query: {
        type: QueryType.CONSTANT_SCORE,
        filter: { type: QueryType.TERM, field: matchField, value },
      },
      from: 0,
      size: maxMatches,
      trackScores: false,
      fetchSource: true,
    },
  };
}

/**
 * Returns the term query a request filters on, unwrapping a constant-score wrapper.
 */
export function termQueryOf(request: SearchRequest): TermQuery {
  const query = request.source.query;
  switch (query.type) {
    case QueryType.TERM:
      return query;
    case QueryType.CONSTANT_SCORE:
      return query.filter;
    default:
      query satisfies never;
      throw new Error('Unexpected query type');
  }
}
