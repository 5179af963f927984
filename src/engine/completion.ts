import { CompletionError } from './errors';

export type CompletionHandler<T> = (result: T | null, error: Error | null) => void;

/**
 * One-shot wrapper around a completion handler. A second `complete` call throws
 * {@link CompletionError} and never reaches the handler.
 */
export class CompletionSink<T> {
  private done = false;

  constructor(private handler: CompletionHandler<T>) { }

  get completed(): boolean {
    return this.done;
  }

  succeed(result: T): void {
    this.complete(result, null);
  }

  fail(error: Error): void {
    this.complete(null, error);
  }

  private complete(result: T | null, error: Error | null): void {
    if (this.done) {
      throw new CompletionError('completion handler invoked more than once');
    }
    this.done = true;
    this.handler(result, error);
  }
}
