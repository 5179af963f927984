export class FieldNotFoundError extends Error {
  readonly name = 'FieldNotFoundError';

  constructor(readonly path: string, leaf: string) {
    super(`field [${leaf}] not present as part of path [${path}]`);
  }
}

export class FieldTypeMismatchError extends Error {
  readonly name = 'FieldTypeMismatchError';

  constructor(readonly path: string, actualType: string, expectedType: string) {
    super(`field [${path}] of type [${actualType}] cannot be cast to [${expectedType}]`);
  }
}

export class FieldPathError extends Error {
  readonly name = 'FieldPathError';
}

export class IndexNotFoundError extends Error {
  readonly name = 'IndexNotFoundError';

  constructor(readonly index: string) {
    super(`no such index [${index}]`);
  }
}

export class UnsupportedOperationError extends Error {
  readonly name = 'UnsupportedOperationError';
}

/**
 * Raised when a completion handler is invoked more than once.
 * This is a bug in the caller or in a search runner, never a per-document outcome.
 */
export class CompletionError extends Error {
  readonly name = 'CompletionError';
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
