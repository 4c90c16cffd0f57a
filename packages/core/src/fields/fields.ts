/**
 * Field map utilities shared by the synchronizers and backends.
 *
 * @module fields
 */

import { MaterializationError, toError } from '../errors/index.js';
import type { IdentifiedFields, Materializer, RawFields } from '../types/index.js';

/**
 * Narrow an unknown value to a plain field map.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Deep structural equality over raw field values.
 *
 * Supports primitives, arrays (order matters), `Date` and nested field
 * maps. Used to skip publishing a snapshot whose fields did not change.
 *
 * @example
 * ```typescript
 * fieldsEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] }); // true
 * fieldsEqual({ a: 1 }, { a: 1, b: undefined });           // false
 * ```
 */
export function fieldsEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, index) => fieldsEqual(item, b[index]));
  }

  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((key) => Object.hasOwn(b, key) && fieldsEqual(a[key], b[key]));
  }

  return false;
}

/**
 * Read a possibly nested field using dot notation (`'address.city'`).
 */
export function getField(fields: RawFields, path: string): unknown {
  let current: unknown = fields;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Total order over field values for query sorting.
 *
 * Missing values sort first, then booleans, numbers, dates and strings;
 * anything else compares equal.
 */
export function compareFieldValues(a: unknown, b: unknown): number {
  const rank = (value: unknown): number => {
    if (value === undefined || value === null) return 0;
    if (typeof value === 'boolean') return 1;
    if (typeof value === 'number') return 2;
    if (value instanceof Date) return 3;
    if (typeof value === 'string') return 4;
    return 5;
  };

  const rankA = rank(a);
  const rankB = rank(b);
  if (rankA !== rankB) return rankA - rankB;

  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  return 0;
}

/**
 * Build a domain object from a raw field map.
 *
 * The id always comes from the document's location, never from an `id`
 * key stored inside the fields.
 *
 * @throws {MaterializationError} when `fromJson` throws
 */
export function materialize<T>(id: string, fields: RawFields, fromJson: Materializer<T>): T {
  const identified: IdentifiedFields = { ...fields, id };
  try {
    return fromJson(identified);
  } catch (error) {
    throw new MaterializationError(id, toError(error));
  }
}
