import { IndexNotFoundError } from '../errors';
import { termQueryOf } from '../query-builder';
import { fromAsyncSearch, SearchHit, SearchRunner } from '../search';

export type MemoryIndices = Record<string, Record<string, unknown>[]>;

/**
 * In-process reference store. Records keep insertion order and get their
 * position as id. Hits carry copies, so the store is never written through.
 * A term query matches when the value at the field path equals the query
 * value, or, for list values, when any element does.
 */
export function createMemorySearchRunner(indices: MemoryIndices): SearchRunner {
  return fromAsyncSearch(async request => {
    const records = indices[request.index];
    if (!records) {
      throw new IndexNotFoundError(request.index);
    }

    const term = termQueryOf(request);
    const path = term.field.split('.');
    const matches: SearchHit[] = [];
    records.forEach((record, position) => {
      if (valuesAt(record, path).some(value => value === term.value)) {
        matches.push({
          index: request.index,
          id: String(position),
          source: request.source.fetchSource ? structuredClone(record) : {},
        });
      }
    });

    const { from, size } = request.source;
    return {
      hits: {
        total: matches.length,
        hits: matches.slice(from, from + size),
      },
    };
  });
}

function valuesAt(value: unknown, path: string[]): unknown[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) {
    return value.flatMap(item => valuesAt(item, path));
  }
  if (path.length === 0) return [value];
  if (typeof value !== 'object') return [];

  const [head, ...rest] = path;
  return valuesAt(Reflect.get(value, head), rest);
}
