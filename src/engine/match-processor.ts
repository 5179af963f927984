import { EnrichableDocument } from '../document/ingest-document';
import { CompletionHandler, CompletionSink } from './completion';
import { toError, UnsupportedOperationError } from './errors';
import { AbstractEnrichProcessor } from './processor';
import { buildMatchQuery } from './query-builder';
import { SearchRequest, SearchResponse, SearchRunner } from './search';

export interface MatchProcessorOptions {
  tag?: string;
  description?: string;
  policyName: string;
  field: string;
  targetField: string;
  matchField: string;
  ignoreMissing: boolean;
  overrideEnabled: boolean;
  maxMatches: number;
}

/**
 * Enriches a document with the records of the policy's reference index whose
 * `matchField` equals the value at `field`. Matches are written as a list at
 * `targetField`, even when there is only one.
 */
export class MatchProcessor extends AbstractEnrichProcessor {
  readonly field: string;
  readonly targetField: string;
  readonly matchField: string;
  readonly ignoreMissing: boolean;
  readonly overrideEnabled: boolean;
  readonly maxMatches: number;

  constructor(
    private searchRunner: SearchRunner,
    options: MatchProcessorOptions
  ) {
    super(options.policyName, options.tag, options.description);
    this.field = options.field;
    this.targetField = options.targetField;
    this.matchField = options.matchField;
    this.ignoreMissing = options.ignoreMissing;
    this.overrideEnabled = options.overrideEnabled;
    this.maxMatches = options.maxMatches;
  }

  process<D extends EnrichableDocument>(document: D, handler: CompletionHandler<D>): void {
    const sink = new CompletionSink(handler);

    let request: SearchRequest;
    try {
      const value = document.getFieldValue(this.field, 'string', this.ignoreMissing);
      if (value === null) {
        sink.succeed(document);
        return;
      }
      request = buildMatchQuery(value, this.matchField, this.maxMatches, this.policyName);
    } catch (err) {
      if (sink.completed) throw err;
      sink.fail(toError(err));
      return;
    }

    try {
      this.searchRunner(request, (response, error) => {
        if (error) {
          sink.fail(error);
          return;
        }
        this.merge(document, response, sink);
      });
    } catch (err) {
      // A runner that throws after completing has broken its own contract.
      if (sink.completed) throw err;
      sink.fail(toError(err));
    }
  }

  execute<D extends EnrichableDocument>(_document: D): D {
    throw new UnsupportedOperationError('this method should not get executed');
  }

  private merge<D extends EnrichableDocument>(
    document: D,
    response: SearchResponse | null,
    sink: CompletionSink<D>
  ): void {
    const hits = response?.hits.hits ?? [];
    if (hits.length === 0) {
      sink.succeed(document);
      return;
    }

    try {
      if (this.overrideEnabled || !document.hasField(this.targetField)) {
        const records = hits.slice(0, this.maxMatches).map(hit => ({ ...hit.source }));
        document.setFieldValue(this.targetField, records);
      }
    } catch (err) {
      sink.fail(toError(err));
      return;
    }
    sink.succeed(document);
  }
}
