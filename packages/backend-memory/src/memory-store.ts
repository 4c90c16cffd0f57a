import {
  TidewatchError,
  type CollectionRef,
  type DocumentRef,
  type DocumentSnapshot,
  type DocumentStore,
  type GetOptions,
  type OrderDirection,
  type Query,
  type QuerySnapshot,
  type RawFields,
  type SetOptions,
  type SnapshotListenOptions,
  type WhereOperator,
} from '@tidewatch/core';
import type { Observable } from 'rxjs';
import { MemoryEngine, type MemoryDocumentStoreOptions } from './memory-engine.js';
import { collectionPath, documentPath, lastSegment, segmentsOf } from './paths.js';
import type { QuerySpec } from './query-engine.js';

class MemoryDocumentRef implements DocumentRef {
  readonly id: string;

  constructor(
    private readonly engine: MemoryEngine,
    readonly path: string
  ) {
    this.id = lastSegment(path);
  }

  get(options?: GetOptions): Promise<DocumentSnapshot> {
    return this.engine.getDoc(this.path, options);
  }

  snapshots(options?: SnapshotListenOptions): Observable<DocumentSnapshot> {
    return this.engine.listenDoc(this.path, options?.includeMetadataChanges ?? false);
  }

  set(fields: RawFields, options?: SetOptions): Promise<void> {
    return this.engine.set(this.path, fields, options?.merge ?? false);
  }

  update(fields: RawFields): Promise<void> {
    return this.engine.update(this.path, fields);
  }

  delete(): Promise<void> {
    return this.engine.delete(this.path);
  }
}

class MemoryQuery implements Query {
  constructor(
    protected readonly engine: MemoryEngine,
    protected readonly spec: QuerySpec
  ) {}

  where(field: string, op: WhereOperator, value: unknown): Query {
    return new MemoryQuery(this.engine, {
      ...this.spec,
      where: [...this.spec.where, { field, op, value }],
    });
  }

  orderBy(field: string, direction: OrderDirection = 'asc'): Query {
    return new MemoryQuery(this.engine, {
      ...this.spec,
      orderBy: [...this.spec.orderBy, { field, direction }],
    });
  }

  limit(count: number): Query {
    if (!Number.isSafeInteger(count) || count < 1) {
      throw new TidewatchError({
        code: 'TIDEWATCH_C400',
        message: `Query limit must be a positive integer, got ${String(count)}`,
        context: { collection: this.spec.collection, limit: count },
      });
    }
    return new MemoryQuery(this.engine, { ...this.spec, limit: count });
  }

  get(options?: GetOptions): Promise<QuerySnapshot> {
    return this.engine.getQuery(this.spec, options);
  }

  snapshots(): Observable<QuerySnapshot> {
    return this.engine.listenQuery(this.spec);
  }
}

class MemoryCollectionRef extends MemoryQuery implements CollectionRef {
  readonly id: string;

  constructor(
    engine: MemoryEngine,
    readonly path: string
  ) {
    super(engine, { collection: path, where: [], orderBy: [], limit: null });
    this.id = lastSegment(path);
  }

  doc(id?: string): DocumentRef {
    const docId = id ?? this.engine.nextId();
    if (docId.length === 0 || docId.includes('/')) {
      throw new TidewatchError({
        code: 'TIDEWATCH_C400',
        message: `"${docId}" is not a valid document id`,
        context: { collection: this.path, id: docId },
      });
    }
    return new MemoryDocumentRef(this.engine, `${this.path}/${docId}`);
  }

  async add(fields: RawFields): Promise<DocumentRef> {
    const ref = this.doc();
    await ref.set(fields);
    return ref;
  }
}

/**
 * In-process document store with the behavior of a remote, listener-based
 * backend: a server tier, a per-client cache, pending local writes that are
 * acknowledged asynchronously, and asynchronous first snapshots.
 *
 * Besides the {@link DocumentStore} surface it exposes hooks for simulating
 * other clients and injecting failures, plus counters for assertions.
 *
 * @example
 * ```typescript
 * const store = new MemoryDocumentStore();
 * store.applyRemote('users/u1', { theme: 'dark' });
 *
 * const settings = new DocSynchronizer({
 *   store,
 *   fromJson: UserSettings.fromJson,
 *   resolve: (s, uid) => s.doc(`users/${uid}`),
 *   identity: auth.uid,
 * });
 * ```
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly engine: MemoryEngine;

  constructor(options: MemoryDocumentStoreOptions = {}) {
    this.engine = new MemoryEngine(options);
  }

  doc(path: string): DocumentRef {
    return new MemoryDocumentRef(this.engine, documentPath(path));
  }

  collection(path: string): CollectionRef {
    return new MemoryCollectionRef(this.engine, collectionPath(path));
  }

  /**
   * Write a document as another client would: no pending writes, listeners
   * notified synchronously. Pass null to delete.
   */
  applyRemote(path: string, fields: RawFields | null): void {
    this.engine.applyRemote(documentPath(path), fields);
  }

  /** Reject the next local write with `TIDEWATCH_B204` */
  failNextWrite(error: Error): void {
    this.engine.failNextWrite(error);
  }

  /** Reject the next server read of a document or collection path with `TIDEWATCH_B202` */
  failNextRead(path: string, error: Error): void {
    this.engine.failNextRead(segmentsOf(path).join('/'), error);
  }

  /**
   * Error every listener on a document or collection path with `TIDEWATCH_B201`.
   *
   * @returns the number of listeners that were failed
   */
  failListeners(path: string, error: Error): number {
    return this.engine.failListeners(segmentsOf(path).join('/'), error);
  }

  /**
   * Acknowledge queued writes when `autoAcknowledge` is off.
   *
   * @returns the number of writes acknowledged
   */
  acknowledgeWrites(): number {
    return this.engine.acknowledgeWrites();
  }

  activeListenerCount(): number {
    return this.engine.activeListenerCount;
  }

  /** Document and query reads served so far, cache probes included */
  readCount(): number {
    return this.engine.readCount;
  }

  pendingWriteCount(): number {
    return this.engine.pendingWriteCount;
  }
}
