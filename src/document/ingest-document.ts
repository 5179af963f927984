import { FieldNotFoundError, FieldPathError, FieldTypeMismatchError } from '../engine/errors';

export type FieldValueType = 'string' | 'number' | 'boolean' | 'object';

type FieldValueOf<T extends FieldValueType> =
  T extends 'string' ? string :
  T extends 'number' ? number :
  T extends 'boolean' ? boolean :
  Record<string, unknown>;

/**
 * The document operations the enrich processors depend on.
 * Paths are dotted (`user.address.city`); numeric segments address list elements.
 */
export interface EnrichableDocument {
  getFieldValue<T extends FieldValueType>(path: string, type: T, ignoreMissing: boolean): FieldValueOf<T> | null;
  hasField(path: string): boolean;
  setFieldValue(path: string, value: unknown): void;
}

export class IngestDocument implements EnrichableDocument {
  constructor(readonly source: Record<string, unknown> = {}) { }

  getFieldValue<T extends FieldValueType>(path: string, type: T, ignoreMissing: boolean): FieldValueOf<T> | null {
    const segments = splitPath(path);
    let current: unknown = this.source;
    for (const segment of segments) {
      const next = resolveChild(current, segment);
      if (next === undefined) {
        if (ignoreMissing) return null;
        throw new FieldNotFoundError(path, segment);
      }
      current = next.value;
    }

    // A present null reads as no value, whatever ignoreMissing says.
    if (current === null) return null;

    if (!isOfType(current, type)) {
      throw new FieldTypeMismatchError(path, describeType(current), type);
    }
    return current;
  }

  hasField(path: string): boolean {
    let current: unknown = this.source;
    for (const segment of splitPath(path)) {
      const next = resolveChild(current, segment);
      if (next === undefined) return false;
      current = next.value;
    }
    return true;
  }

  setFieldValue(path: string, value: unknown): void {
    const segments = splitPath(path);
    const leaf = segments[segments.length - 1];
    let current: unknown = this.source;

    for (const segment of segments.slice(0, -1)) {
      if (Array.isArray(current)) {
        const child = resolveChild(current, segment);
        if (child === undefined) {
          throw new FieldPathError(`[${segment}] is not a valid index for array with length [${current.length}] as part of path [${path}]`);
        }
        current = child.value;
        continue;
      }
      if (!isRecord(current)) {
        throw new FieldPathError(`cannot resolve [${segment}] from object of type [${describeType(current)}] as part of path [${path}]`);
      }
      if (current[segment] === undefined || current[segment] === null) {
        current[segment] = {};
      }
      current = current[segment];
    }

    if (isRecord(current)) {
      current[leaf] = value;
      return;
    }
    if (Array.isArray(current)) {
      const index = parseIndex(leaf, current.length);
      if (index === null) {
        throw new FieldPathError(`[${leaf}] is out of bounds for array with length [${current.length}] as part of path [${path}]`);
      }
      current[index] = value;
      return;
    }
    throw new FieldPathError(`cannot set [${leaf}] with parent object of type [${describeType(current)}] as part of path [${path}]`);
  }

  toJSON(): Record<string, unknown> {
    return this.source;
  }
}

function splitPath(path: string): string[] {
  if (!path) {
    throw new FieldPathError('path cannot be null nor empty');
  }
  const segments = path.split('.');
  if (segments.some(s => s.length === 0)) {
    throw new FieldPathError(`path [${path}] is not valid`);
  }
  return segments;
}

function resolveChild(container: unknown, segment: string): { value: unknown } | undefined {
  if (Array.isArray(container)) {
    const index = parseIndex(segment, container.length - 1);
    return index === null ? undefined : { value: container[index] };
  }
  if (isRecord(container) && Object.prototype.hasOwnProperty.call(container, segment)) {
    return { value: container[segment] };
  }
  return undefined;
}

// Returns null when the segment is not an integer in [0, max].
function parseIndex(segment: string, max: number): number | null {
  if (!/^\d+$/.test(segment)) return null;
  const index = Number(segment);
  return index <= max ? index : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOfType<T extends FieldValueType>(value: unknown, type: T): value is FieldValueOf<T> {
  if (type === 'object') return isRecord(value);
  return typeof value === type;
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (isRecord(value)) return 'map';
  return typeof value;
}
