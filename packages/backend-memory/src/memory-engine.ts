import { randomUUID } from 'node:crypto';
import {
  TidewatchError,
  fieldsEqual,
  scopedLogger,
  type DocumentSnapshot,
  type GetOptions,
  type Logger,
  type QuerySnapshot,
  type RawFields,
} from '@tidewatch/core';
import { Observable, type Subscriber } from 'rxjs';
import { lastSegment, parentOf } from './paths.js';
import { runQuery, type QuerySpec, type StoredDocument } from './query-engine.js';
import { MemoryDocumentSnapshot, MemoryQuerySnapshot } from './snapshots.js';
import { applyUpdate, mergeFields } from './write-fields.js';

/**
 * Options for {@link MemoryDocumentStore}
 */
export interface MemoryDocumentStoreOptions {
  /** Id allocator for `collection.doc()` and `collection.add()` */
  idGenerator?: () => string;
  /**
   * Acknowledge local writes on the next microtask. When false, writes stay
   * pending until {@link MemoryDocumentStore.acknowledgeWrites} is called.
   * @default true
   */
  autoAcknowledge?: boolean;
  logger?: Logger;
}

interface DocListener {
  readonly path: string;
  readonly includeMetadataChanges: boolean;
  readonly subscriber: Subscriber<DocumentSnapshot>;
  last: { fields: RawFields | null; pending: boolean } | null;
}

interface QueryListener {
  readonly spec: QuerySpec;
  readonly subscriber: Subscriber<QuerySnapshot>;
  last: readonly StoredDocument[] | null;
}

function defaultIdGenerator(): string {
  return randomUUID().replace(/-/g, '').slice(0, 20);
}

function sameFields(a: RawFields | null, b: RawFields | null): boolean {
  if (a === null || b === null) return a === b;
  return fieldsEqual(a, b);
}

function sameResults(a: readonly StoredDocument[], b: readonly StoredDocument[]): boolean {
  return (
    a.length === b.length &&
    a.every((doc, index) => {
      const other = b[index];
      return other !== undefined && doc.id === other.id && fieldsEqual(doc.fields, other.fields);
    })
  );
}

/**
 * State and behavior behind a {@link MemoryDocumentStore} and its references.
 *
 * Two tiers are kept: the server tier holds the authoritative documents and
 * the cache tier holds what this client has observed or written. Local
 * writes land in both tiers at once and stay pending until acknowledged.
 *
 * @internal
 */
export class MemoryEngine {
  private readonly server = new Map<string, RawFields>();
  // null marks a document known to be missing
  private readonly cache = new Map<string, RawFields | null>();
  private readonly pending = new Map<string, number>();
  private readonly docListeners = new Set<DocListener>();
  private readonly queryListeners = new Set<QueryListener>();
  private readonly readFailures = new Map<string, Error>();
  private readonly queuedAcks: (() => void)[] = [];
  private writeFailure: Error | null = null;
  private reads = 0;

  private readonly generateId: () => string;
  private readonly autoAcknowledge: boolean;
  private readonly logger: Logger;

  constructor(options: MemoryDocumentStoreOptions = {}) {
    this.generateId = options.idGenerator ?? defaultIdGenerator;
    this.autoAcknowledge = options.autoAcknowledge ?? true;
    this.logger = scopedLogger(options.logger, 'memory');
  }

  nextId(): string {
    return this.generateId();
  }

  // ── reads ────────────────────────────────────────────────────────────

  async getDoc(path: string, options: GetOptions = {}): Promise<DocumentSnapshot> {
    this.reads += 1;

    if (options.source === 'cache') {
      const cached = this.cache.get(path);
      if (cached === undefined) {
        throw new TidewatchError({ code: 'TIDEWATCH_B200', context: { path } });
      }
      return new MemoryDocumentSnapshot(path, cached, {
        hasPendingWrites: this.pending.has(path),
        fromCache: true,
      });
    }

    this.takeReadFailure(path);
    const fields = this.server.get(path) ?? null;
    this.cache.set(path, fields);
    return new MemoryDocumentSnapshot(path, fields, {
      hasPendingWrites: this.pending.has(path),
      fromCache: false,
    });
  }

  async getQuery(spec: QuerySpec, options: GetOptions = {}): Promise<QuerySnapshot> {
    this.reads += 1;
    const fromCache = options.source === 'cache';
    if (!fromCache) this.takeReadFailure(spec.collection);

    const docs = runQuery(fromCache ? this.cachedDocumentsIn(spec.collection) : this.documentsIn(spec.collection), spec);
    if (!fromCache) {
      for (const doc of docs) this.cache.set(doc.path, doc.fields);
    }
    return new MemoryQuerySnapshot(docs, {
      hasPendingWrites: docs.some((doc) => this.pending.has(doc.path)),
      fromCache,
    });
  }

  // ── listeners ────────────────────────────────────────────────────────

  listenDoc(path: string, includeMetadataChanges: boolean): Observable<DocumentSnapshot> {
    return new Observable<DocumentSnapshot>((subscriber) => {
      const listener: DocListener = { path, includeMetadataChanges, subscriber, last: null };
      this.docListeners.add(listener);
      this.logger.debug('Document listener attached', { path });

      // First snapshot arrives asynchronously, as from a real backend
      queueMicrotask(() => {
        if (this.docListeners.has(listener)) this.deliverDoc(listener);
      });

      return () => {
        if (this.docListeners.delete(listener)) {
          this.logger.debug('Document listener detached', { path });
        }
      };
    });
  }

  listenQuery(spec: QuerySpec): Observable<QuerySnapshot> {
    return new Observable<QuerySnapshot>((subscriber) => {
      const listener: QueryListener = { spec, subscriber, last: null };
      this.queryListeners.add(listener);
      this.logger.debug('Query listener attached', { collection: spec.collection, limit: spec.limit });

      queueMicrotask(() => {
        if (this.queryListeners.has(listener)) this.deliverQuery(listener);
      });

      return () => {
        if (this.queryListeners.delete(listener)) {
          this.logger.debug('Query listener detached', { collection: spec.collection });
        }
      };
    });
  }

  // ── local writes ─────────────────────────────────────────────────────

  async set(path: string, fields: RawFields, merge: boolean): Promise<void> {
    this.takeWriteFailure(path);
    const existing = this.server.get(path);
    const next = merge && existing ? mergeFields(existing, fields) : structuredClone(fields);
    await this.commit(path, next);
  }

  async update(path: string, fields: RawFields): Promise<void> {
    this.takeWriteFailure(path);
    const existing = this.server.get(path);
    if (existing === undefined) {
      throw new TidewatchError({ code: 'TIDEWATCH_B203', context: { path } });
    }
    await this.commit(path, applyUpdate(existing, fields));
  }

  async delete(path: string): Promise<void> {
    this.takeWriteFailure(path);
    await this.commit(path, null);
  }

  acknowledgeWrites(): number {
    const acks = this.queuedAcks.splice(0);
    for (const ack of acks) ack();
    return acks.length;
  }

  // ── remote changes and fault injection ───────────────────────────────

  applyRemote(path: string, fields: RawFields | null): void {
    if (fields === null) {
      this.server.delete(path);
    } else {
      this.server.set(path, structuredClone(fields));
    }
    this.logger.debug('Remote change applied', { path, exists: fields !== null });
    this.notify(path);
  }

  failNextWrite(error: Error): void {
    this.writeFailure = error;
  }

  failNextRead(path: string, error: Error): void {
    this.readFailures.set(path, error);
  }

  failListeners(path: string, error: Error): number {
    let failed = 0;
    for (const listener of [...this.docListeners]) {
      if (listener.path !== path) continue;
      this.docListeners.delete(listener);
      listener.subscriber.error(TidewatchError.wrap(error, 'TIDEWATCH_B201', { path }));
      failed += 1;
    }
    for (const listener of [...this.queryListeners]) {
      if (listener.spec.collection !== path) continue;
      this.queryListeners.delete(listener);
      listener.subscriber.error(TidewatchError.wrap(error, 'TIDEWATCH_B201', { path }));
      failed += 1;
    }
    return failed;
  }

  // ── stats ────────────────────────────────────────────────────────────

  get activeListenerCount(): number {
    return this.docListeners.size + this.queryListeners.size;
  }

  get readCount(): number {
    return this.reads;
  }

  get pendingWriteCount(): number {
    let total = 0;
    for (const count of this.pending.values()) total += count;
    return total;
  }

  // ── internals ────────────────────────────────────────────────────────

  private async commit(path: string, next: RawFields | null): Promise<void> {
    if (next === null) {
      this.server.delete(path);
    } else {
      this.server.set(path, next);
    }
    this.cache.set(path, next);
    this.pending.set(path, (this.pending.get(path) ?? 0) + 1);
    this.logger.debug('Local write', { path, exists: next !== null });
    this.notify(path);

    await this.acknowledgement();

    const remaining = (this.pending.get(path) ?? 1) - 1;
    if (remaining > 0) {
      this.pending.set(path, remaining);
    } else {
      this.pending.delete(path);
    }
    this.notify(path);
  }

  private acknowledgement(): Promise<void> {
    if (this.autoAcknowledge) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.queuedAcks.push(resolve);
    });
  }

  private takeWriteFailure(path: string): void {
    const failure = this.writeFailure;
    if (failure === null) return;
    this.writeFailure = null;
    throw TidewatchError.wrap(failure, 'TIDEWATCH_B204', { path });
  }

  private takeReadFailure(path: string): void {
    const failure = this.readFailures.get(path);
    if (failure === undefined) return;
    this.readFailures.delete(path);
    throw TidewatchError.wrap(failure, 'TIDEWATCH_B202', { path });
  }

  private documentsIn(collection: string): StoredDocument[] {
    const docs: StoredDocument[] = [];
    for (const [path, fields] of this.server) {
      if (parentOf(path) === collection) docs.push({ id: lastSegment(path), path, fields });
    }
    return docs;
  }

  private cachedDocumentsIn(collection: string): StoredDocument[] {
    const docs: StoredDocument[] = [];
    for (const [path, fields] of this.cache) {
      if (fields !== null && parentOf(path) === collection) {
        docs.push({ id: lastSegment(path), path, fields });
      }
    }
    return docs;
  }

  private notify(path: string): void {
    for (const listener of [...this.docListeners]) {
      if (listener.path === path && this.docListeners.has(listener)) this.deliverDoc(listener);
    }
    const collection = parentOf(path);
    for (const listener of [...this.queryListeners]) {
      if (listener.spec.collection === collection && this.queryListeners.has(listener)) {
        this.deliverQuery(listener);
      }
    }
  }

  private deliverDoc(listener: DocListener): void {
    const fields = this.server.get(listener.path) ?? null;
    const pending = this.pending.has(listener.path);
    const last = listener.last;

    if (last !== null) {
      const dataChanged = !sameFields(last.fields, fields);
      const metadataChanged = last.pending !== pending;
      if (!dataChanged && !(metadataChanged && listener.includeMetadataChanges)) return;
    }

    listener.last = { fields, pending };
    this.cache.set(listener.path, fields);
    listener.subscriber.next(
      new MemoryDocumentSnapshot(listener.path, fields, { hasPendingWrites: pending, fromCache: false })
    );
  }

  private deliverQuery(listener: QueryListener): void {
    const docs = runQuery(this.documentsIn(listener.spec.collection), listener.spec);
    if (listener.last !== null && sameResults(listener.last, docs)) return;

    listener.last = docs;
    for (const doc of docs) this.cache.set(doc.path, doc.fields);
    listener.subscriber.next(
      new MemoryQuerySnapshot(docs, {
        hasPendingWrites: docs.some((doc) => this.pending.has(doc.path)),
        fromCache: false,
      })
    );
  }
}
