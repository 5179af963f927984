import { EnrichableDocument } from '../document/ingest-document';
import { CompletionHandler } from './completion';

export interface Processor {
  readonly type: string;
  readonly tag?: string;
  readonly description?: string;

  /**
   * Processes `document` and reports the outcome through `handler`:
   * `(document, null)` on success, `(null, error)` on failure.
   */
  process<D extends EnrichableDocument>(document: D, handler: CompletionHandler<D>): void;

  /**
   * Synchronous variant for processors that never suspend.
   */
  execute<D extends EnrichableDocument>(document: D): D;
}

export const ENRICH_PROCESSOR_TYPE = 'enrich';

export abstract class AbstractEnrichProcessor implements Processor {
  readonly type = ENRICH_PROCESSOR_TYPE;

  protected constructor(
    readonly policyName: string,
    readonly tag?: string,
    readonly description?: string
  ) { }

  abstract process<D extends EnrichableDocument>(document: D, handler: CompletionHandler<D>): void;

  abstract execute<D extends EnrichableDocument>(document: D): D;

  /**
   * Promise form of {@link process}; resolves with the document or rejects with the error.
   */
  processAsync<D extends EnrichableDocument>(document: D): Promise<D> {
    return new Promise((resolve, reject) => {
      this.process(document, (result, error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(result ?? document);
      });
    });
  }
}
