import { ErrorCodes, GatewayError } from './errors.js';

/**
 * Field readers for loosely structured upstream JSON. Each reader returns the
 * typed value or a TYPE_ASSERTION_ERROR naming the field; nothing is trusted
 * without a check.
 */

export type FieldResult<T> = { ok: true; value: T } | { ok: false; error: GatewayError };

export type JsonRecord = Record<string, unknown>;

function mismatch<T>(field: string, expected: string, value: unknown): FieldResult<T> {
  const actual = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value;
  const message =
    value === undefined ? `field "${field}" is missing` : `field "${field}" is ${actual}, expected ${expected}`;
  return {
    ok: false,
    error: new GatewayError(ErrorCodes.TYPE_ASSERTION, message, { details: { field, expected, actual } }),
  };
}

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readRecord(source: JsonRecord, field: string): FieldResult<JsonRecord> {
  const value = source[field];
  return isRecord(value) ? { ok: true, value } : mismatch(field, 'object', value);
}

export function readArray(source: JsonRecord, field: string): FieldResult<unknown[]> {
  const value = source[field];
  return Array.isArray(value) ? { ok: true, value } : mismatch(field, 'array', value);
}

export function readString(source: JsonRecord, field: string): FieldResult<string> {
  const value = source[field];
  return typeof value === 'string' ? { ok: true, value } : mismatch(field, 'string', value);
}

export function readNumber(source: JsonRecord, field: string): FieldResult<number> {
  const value = source[field];
  return typeof value === 'number' && Number.isFinite(value) ? { ok: true, value } : mismatch(field, 'number', value);
}

/**
 * Follow a path of nested objects, e.g. `content_urls.desktop.page`.
 */
export function readPathString(source: JsonRecord, path: readonly string[]): FieldResult<string> {
  let current: JsonRecord = source;
  for (let i = 0; i < path.length - 1; i++) {
    const next = readRecord(current, path[i]);
    if (!next.ok) {
      return next;
    }
    current = next.value;
  }
  return readString(current, path[path.length - 1]);
}

export function optionalString(source: JsonRecord, field: string): string | undefined {
  const result = readString(source, field);
  return result.ok && result.value.length > 0 ? result.value : undefined;
}

export function optionalNumber(source: JsonRecord, field: string): number | undefined {
  const result = readNumber(source, field);
  return result.ok ? result.value : undefined;
}

/**
 * Keep the string members of an optional array field, dropping anything else.
 */
export function stringList(source: JsonRecord, field: string): string[] {
  const result = readArray(source, field);
  if (!result.ok) {
    return [];
  }
  return result.value.filter((item): item is string => typeof item === 'string');
}

export function requireField<T>(result: FieldResult<T>, context: string): T {
  if (!result.ok) {
    throw GatewayError.wrap(result.error, context);
  }
  return result.value;
}
