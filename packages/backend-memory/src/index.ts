/**
 * @tidewatch/backend-memory - In-process document store for Tidewatch
 *
 * Behaves like a remote listener-based backend (pending writes, cache tier,
 * asynchronous snapshots) without leaving the process. Used in tests and
 * examples.
 *
 * @packageDocumentation
 */

export type { MemoryDocumentStoreOptions } from './memory-engine.js';
export { MemoryDocumentStore } from './memory-store.js';
export { matchesWhere, runQuery } from './query-engine.js';
export type { OrderClause, QuerySpec, StoredDocument, WhereClause } from './query-engine.js';
