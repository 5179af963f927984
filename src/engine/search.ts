import { callbackify } from 'node:util';
import { toError } from './errors';

export enum QueryType {
  TERM = 'TERM',
  CONSTANT_SCORE = 'CONSTANT_SCORE',
}

export interface TermQuery {
  type: QueryType.TERM;
  field: string;
  value: string;
}

export interface ConstantScoreQuery {
  type: QueryType.CONSTANT_SCORE;
  filter: TermQuery;
}

export type Query = TermQuery | ConstantScoreQuery;

/**
 * Routing preference for a search. `_local` asks the runner to prefer a
 * co-located copy of the index; runners without replicas ignore it.
 */
export type Preference = '_local';

export interface SearchSource {
  query: Query;
  from: number;
  size: number;
  trackScores: boolean;
  fetchSource: boolean;
}

export interface SearchRequest {
  index: string;
  preference?: Preference;
  source: SearchSource;
}

export interface SearchHit {
  index: string;
  id: string;
  source: Record<string, unknown>;
}

export interface SearchResponse {
  hits: {
    total: number;
    hits: SearchHit[];
  };
}

export type SearchHandler = (response: SearchResponse | null, error: Error | null) => void;

/**
 * Executes a search and reports the outcome exactly once, asynchronously,
 * through `handler`: `(response, null)` on success or `(null, error)` on failure.
 */
export type SearchRunner = (request: SearchRequest, handler: SearchHandler) => void;

/**
 * Adapts a promise-returning search into a {@link SearchRunner}.
 * The handler runs on a later tick; if it throws, the error surfaces as an
 * uncaught exception rather than being fed back into the handler.
 */
export function fromAsyncSearch(search: (request: SearchRequest) => Promise<SearchResponse>): SearchRunner {
  const run = callbackify(search);
  return (request, handler) => {
    run(request, (err, response) => {
      if (err) {
        handler(null, toError(err));
        return;
      }
      handler(response, null);
    });
  };
}
