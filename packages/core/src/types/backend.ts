import type { Observable } from 'rxjs';
import type { RawFields } from './model.js';

/**
 * Where a read is served from.
 *
 * - `default`: server when reachable, otherwise cache
 * - `server`: server only
 * - `cache`: local cache only; rejects when the document was never cached
 */
export type ReadSource = 'default' | 'server' | 'cache';

export interface GetOptions {
  source?: ReadSource;
}

export interface SnapshotListenOptions {
  /** Also emit when only the metadata (pending writes, cache origin) changed */
  includeMetadataChanges?: boolean;
}

export interface SetOptions {
  /** Merge into existing fields instead of replacing the document */
  merge?: boolean;
}

/**
 * Per-snapshot metadata.
 */
export interface SnapshotMetadata {
  /** A local write to this data has not been acknowledged by the server yet */
  readonly hasPendingWrites: boolean;
  /** The data came from the local cache rather than the server */
  readonly fromCache: boolean;
}

/**
 * One immutable observation of a single document.
 */
export interface DocumentSnapshot {
  readonly id: string;
  readonly path: string;
  readonly exists: boolean;
  readonly metadata: SnapshotMetadata;
  /** Field map, or undefined when the document does not exist */
  data(): RawFields | undefined;
}

/**
 * A document inside a query result; it always exists.
 */
export interface QueryDocumentSnapshot {
  readonly id: string;
  readonly path: string;
  data(): RawFields;
}

/**
 * One immutable observation of a query's ordered result set.
 */
export interface QuerySnapshot {
  readonly docs: readonly QueryDocumentSnapshot[];
  readonly size: number;
  readonly metadata: SnapshotMetadata;
}

export type WhereOperator =
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | 'in'
  | 'not-in'
  | 'array-contains';

export type OrderDirection = 'asc' | 'desc';

/**
 * A composable, immutable query. Every builder call returns a new query.
 */
export interface Query {
  where(field: string, op: WhereOperator, value: unknown): Query;
  orderBy(field: string, direction?: OrderDirection): Query;
  limit(count: number): Query;
  get(options?: GetOptions): Promise<QuerySnapshot>;
  /** Live results; unsubscribing cancels the listener */
  snapshots(): Observable<QuerySnapshot>;
}

/**
 * A single document location.
 */
export interface DocumentRef {
  readonly id: string;
  readonly path: string;
  get(options?: GetOptions): Promise<DocumentSnapshot>;
  /** Live snapshots; unsubscribing cancels the listener */
  snapshots(options?: SnapshotListenOptions): Observable<DocumentSnapshot>;
  set(fields: RawFields, options?: SetOptions): Promise<void>;
  /** Update fields of an existing document; rejects when it does not exist */
  update(fields: RawFields): Promise<void>;
  delete(): Promise<void>;
}

/**
 * A collection location, which is also the unfiltered query over it.
 */
export interface CollectionRef extends Query {
  readonly id: string;
  readonly path: string;
  /** Reference a document in this collection; omit `id` to allocate one */
  doc(id?: string): DocumentRef;
  /** Create a document with a backend-assigned id */
  add(fields: RawFields): Promise<DocumentRef>;
}

/**
 * Entry point of a document-store backend.
 */
export interface DocumentStore {
  doc(path: string): DocumentRef;
  collection(path: string): CollectionRef;
}
