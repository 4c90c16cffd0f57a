/**
 * Filtering and ordering for in-memory queries.
 *
 * Semantics follow common document-store rules: inequality and ordering
 * only compare values of the same kind, `!=` and `not-in` skip documents
 * that lack the field, ordering by a field drops documents that lack it,
 * and ties (or no ordering) fall back to the document id.
 */

import {
  compareFieldValues,
  fieldsEqual,
  getField,
  type OrderDirection,
  type RawFields,
  type WhereOperator,
} from '@tidewatch/core';

export interface WhereClause {
  readonly field: string;
  readonly op: WhereOperator;
  readonly value: unknown;
}

export interface OrderClause {
  readonly field: string;
  readonly direction: OrderDirection;
}

/**
 * Immutable description of a query over one collection.
 */
export interface QuerySpec {
  readonly collection: string;
  readonly where: readonly WhereClause[];
  readonly orderBy: readonly OrderClause[];
  readonly limit: number | null;
}

/** A stored document as seen by the query engine */
export interface StoredDocument {
  readonly id: string;
  readonly path: string;
  readonly fields: RawFields;
}

function kindOf(value: unknown): string {
  if (value instanceof Date) return 'date';
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return typeof value;
}

/**
 * Test one field value against one where clause.
 */
export function matchesWhere(value: unknown, op: WhereOperator, target: unknown): boolean {
  switch (op) {
    case '==':
      return value !== undefined && fieldsEqual(value, target);
    case '!=':
      return value !== undefined && !fieldsEqual(value, target);
    case '<':
    case '<=':
    case '>':
    case '>=': {
      if (value === undefined || kindOf(value) !== kindOf(target)) return false;
      const order = compareFieldValues(value, target);
      if (op === '<') return order < 0;
      if (op === '<=') return order <= 0;
      if (op === '>') return order > 0;
      return order >= 0;
    }
    case 'in':
      return (
        value !== undefined &&
        Array.isArray(target) &&
        target.some((candidate) => fieldsEqual(value, candidate))
      );
    case 'not-in':
      return (
        value !== undefined &&
        Array.isArray(target) &&
        !target.some((candidate) => fieldsEqual(value, candidate))
      );
    case 'array-contains':
      return Array.isArray(value) && value.some((element) => fieldsEqual(element, target));
  }
}

/**
 * Run a query against the documents of its collection.
 */
export function runQuery(documents: Iterable<StoredDocument>, spec: QuerySpec): StoredDocument[] {
  const matched = Array.from(documents).filter(
    (doc) =>
      spec.where.every((clause) => matchesWhere(getField(doc.fields, clause.field), clause.op, clause.value)) &&
      spec.orderBy.every((order) => getField(doc.fields, order.field) !== undefined)
  );

  matched.sort((a, b) => {
    for (const order of spec.orderBy) {
      const result = compareFieldValues(getField(a.fields, order.field), getField(b.fields, order.field));
      if (result !== 0) return order.direction === 'desc' ? -result : result;
    }
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });

  return spec.limit === null ? matched : matched.slice(0, spec.limit);
}
