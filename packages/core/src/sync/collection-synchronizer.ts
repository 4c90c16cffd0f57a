import { Subscription, distinctUntilChanged, skip } from 'rxjs';
import { Command } from '../command/index.js';
import { UnauthenticatedError, ensureTidewatchError, type ErrorCode } from '../errors/index.js';
import { materialize } from '../fields/index.js';
import { scopedLogger, type Logger } from '../observability/index.js';
import {
  ObservableValue,
  SubscriptionSlot,
  changesOf,
  coalesceTriggers,
  type ValueSource,
} from '../observable/index.js';
import type {
  CollectionRef,
  DocumentStore,
  JsonModel,
  Materializer,
  Query,
  QueryDocumentSnapshot,
  RawFields,
} from '../types/index.js';
import {
  DEFAULT_PAGE_SIZE,
  validatePageSize,
  type CollectionResolver,
  type CollectionSynchronizerOptions,
  type QueryModifier,
} from './options.js';

/**
 * Parameter of {@link CollectionSynchronizer.patch}
 */
export interface CollectionPatch {
  id: string;
  data: RawFields;
}

/**
 * Mirrors a query over one backend collection as an ordered, size-bounded
 * list, with a growable "live window" for pagination.
 *
 * - Identity changes, dependency emissions and {@link setQuery} cause a full
 *   re-attach: the list is cleared and `hasInitialized` resets. Changes
 *   arriving in the same turn are coalesced into one re-attach.
 * - {@link loadMore} and {@link resetPages} only resize the window: the same
 *   query is re-issued with the new limit and the list stays in place until
 *   the next snapshot replaces it.
 * - Every record also feeds a per-item observable from {@link notifierFor},
 *   so detail views can follow one document without scanning the list.
 *
 * @typeParam T - The model type
 *
 * @example
 * ```typescript
 * const notes = new CollectionSynchronizer<Note>({
 *   store,
 *   fromJson: Note.fromJson,
 *   resolve: (store, uid) => store.collection(`users/${uid}/notes`),
 *   identity: auth.uid,
 *   query: (q) => q.orderBy('updatedAt', 'desc'),
 *   pageSize: 20,
 * });
 *
 * notes.value.subscribe(renderList);
 * onScrollEnd(() => notes.loadMore());
 * ```
 */
export class CollectionSynchronizer<T extends JsonModel> {
  /** The current window of records, in backend order */
  readonly value = new ObservableValue<readonly T[]>([]);
  readonly isLoading = new ObservableValue<boolean>(true);
  /** False from the start of a full attach until its first result (or failure) */
  readonly hasInitialized = new ObservableValue<boolean>(false);
  /** Whether the last result filled the whole window */
  readonly hasMore = new ObservableValue<boolean>(true);
  /** Last stream, read or materialization error of the current attach */
  readonly error = new ObservableValue<Error | null>(null);
  /** Window growth unit */
  readonly pageSize: number;

  /** Create a document with a backend-assigned id; the result is that id */
  readonly add: Command<RawFields, string | null>;
  /** Merge a model's fields into its document */
  readonly set: Command<T, void>;
  /** Update an existing document with a raw field map */
  readonly patch: Command<CollectionPatch, void>;
  /** Update an existing document with every field of a model */
  readonly update: Command<T, void>;
  readonly delete: Command<string, void>;

  private readonly store: DocumentStore;
  private readonly fromJson: Materializer<T>;
  private readonly resolver: CollectionResolver;
  private readonly identity: ValueSource<string | null> | null;
  private readonly live: boolean;
  private readonly logger: Logger;

  private readonly limit: ObservableValue<number>;
  private readonly modifier: ObservableValue<QueryModifier | null>;
  private readonly items = new Map<string, ObservableValue<T | null>>();
  private readonly slot = new SubscriptionSlot();
  private readonly subscriptions = new Subscription();
  private appliedLimit: number;
  private resizing = false;
  private disposed = false;

  constructor(options: CollectionSynchronizerOptions<T>) {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    validatePageSize(pageSize);

    this.store = options.store;
    this.fromJson = options.fromJson;
    this.resolver = options.resolve;
    this.identity = options.identity ?? null;
    this.live = options.subscribe ?? true;
    this.logger = scopedLogger(options.logger, 'collection');
    this.pageSize = pageSize;
    this.limit = new ObservableValue<number>(pageSize);
    this.appliedLimit = pageSize;
    this.modifier = new ObservableValue<QueryModifier | null>(options.query ?? null);

    this.add = new Command<RawFields, string | null>(
      async (fields) => (await this.collectionOrThrow('add').add(fields)).id,
      { initialValue: null, name: 'add', logger: this.logger }
    );
    this.set = new Command<T, void>(
      (model) => this.collectionOrThrow('set').doc(model.id).set(model.toJson(), { merge: true }),
      { initialValue: undefined, name: 'set', logger: this.logger }
    );
    this.patch = new Command<CollectionPatch, void>(
      ({ id, data }) => this.collectionOrThrow('patch').doc(id).update(data),
      { initialValue: undefined, name: 'patch', logger: this.logger }
    );
    this.update = new Command<T, void>(
      (model) => this.collectionOrThrow('update').doc(model.id).update(model.toJson()),
      { initialValue: undefined, name: 'update', logger: this.logger }
    );
    this.delete = new Command<string, void>(
      (id) => this.collectionOrThrow('delete').doc(id).delete(),
      { initialValue: undefined, name: 'delete', logger: this.logger }
    );

    const triggers = [
      ...(this.identity ? [changesOf(this.identity)] : []),
      ...(options.dependencies ?? []),
      this.modifier.asObservable(),
    ];
    this.subscriptions.add(
      coalesceTriggers(triggers, (error) => this.reportTriggerError(error)).subscribe(
        () => void this.attach(true)
      )
    );
    this.subscriptions.add(
      this.limit
        .asObservable()
        .pipe(distinctUntilChanged(), skip(1))
        .subscribe(() => void this.resize())
    );

    void this.attach(true);
  }

  /** Current window limit */
  get windowLimit(): ValueSource<number> {
    return this.limit;
  }

  /** Active query modifier */
  get query(): ValueSource<QueryModifier | null> {
    return this.modifier;
  }

  /** Shorthand for `value.value` */
  get current(): readonly T[] {
    return this.value.value;
  }

  /** First load of an attach is in progress */
  get isInitializing(): boolean {
    return !this.hasInitialized.value && this.isLoading.value;
  }

  /** A reload is in progress while earlier results are shown */
  get isRefreshing(): boolean {
    return this.hasInitialized.value && this.isLoading.value;
  }

  /** Settled with an empty result */
  get showEmpty(): boolean {
    return this.hasInitialized.value && !this.isLoading.value && this.value.value.length === 0;
  }

  /**
   * Swap the active query modifier; `null` queries the bare collection.
   * Passing the modifier already in effect is a no-op.
   */
  setQuery(modifier: QueryModifier | null): void {
    if (this.disposed || this.modifier.value === modifier) return;
    this.modifier.next(modifier);
  }

  /**
   * Force a full re-attach with the current identity, query and window.
   */
  refresh(): Promise<void> {
    return this.attach(true);
  }

  /**
   * Per-item observable for `id`, created on first request. Entries are
   * never evicted and keep their last value when the item leaves the window.
   */
  notifierFor(id: string): ObservableValue<T | null> {
    let entry = this.items.get(id);
    if (!entry) {
      entry = new ObservableValue<T | null>(null);
      this.items.set(id, entry);
    }
    return entry;
  }

  /**
   * Grow the window by one page. Ignored when the last result was short or
   * the previous resize has not delivered yet.
   */
  loadMore(): void {
    if (this.disposed || !this.hasMore.value || this.resizing) return;
    this.limit.next(this.limit.value + this.pageSize);
  }

  /**
   * Shrink the window back to one page.
   */
  resetPages(): void {
    if (this.disposed) return;
    this.hasMore.nextDistinct(true);
    this.limit.next(this.pageSize);
  }

  /**
   * Remove every listener, cancel the active subscription and complete all
   * aggregate and per-item observables. Safe to call more than once.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    this.subscriptions.unsubscribe();
    this.slot.dispose();

    for (const command of [this.add, this.set, this.patch, this.update, this.delete]) {
      command.destroy();
    }
    for (const entry of this.items.values()) {
      entry.destroy();
    }
    this.items.clear();

    this.value.destroy();
    this.isLoading.destroy();
    this.hasInitialized.destroy();
    this.hasMore.destroy();
    this.error.destroy();
    this.limit.destroy();
    this.modifier.destroy();
  }

  // ── internals ─────────────────────────────────────────────────────────

  private get currentIdentity(): string | null {
    return this.identity?.value ?? null;
  }

  private collectionOrThrow(operation: string): CollectionRef {
    const identity = this.currentIdentity;
    if (identity === null) {
      throw new UnauthenticatedError(operation);
    }
    return this.resolver(this.store, identity);
  }

  private buildQuery(identity: string, limit: number): Query {
    const base = this.resolver(this.store, identity);
    const modifier = this.modifier.value;
    return (modifier ? modifier(base) : base).limit(limit);
  }

  private async attach(clearExisting: boolean): Promise<void> {
    if (this.disposed) return;

    const token = this.slot.begin();
    this.resizing = false;
    this.isLoading.nextDistinct(true);
    this.hasInitialized.nextDistinct(false);
    this.error.nextDistinct(null);
    if (clearExisting && this.value.value.length > 0) {
      this.value.next([]);
    }

    try {
      const identity = this.currentIdentity;
      if (identity === null) {
        this.logger.debug('Detached: no identity');
        this.hasInitialized.nextDistinct(true);
        this.hasMore.nextDistinct(false);
        this.isLoading.nextDistinct(false);
        return;
      }

      this.hasMore.nextDistinct(true);
      this.logger.debug('Attaching', { limit: this.limit.value, live: this.live });
      await this.open(token, identity, this.limit.value);
    } catch (error) {
      if (this.slot.isCurrent(token)) {
        this.settleWithError(error, 'TIDEWATCH_X900', 'Attach failed');
      }
    }
  }

  private async resize(): Promise<void> {
    if (this.disposed || this.resizing) return;
    const identity = this.currentIdentity;
    if (identity === null) return;

    this.resizing = true;
    const limit = this.limit.value;
    this.isLoading.nextDistinct(true);
    this.error.nextDistinct(null);
    this.logger.debug('Resizing window', { limit });

    const token = this.slot.begin();
    try {
      await this.open(token, identity, limit);
    } catch (error) {
      if (this.slot.isCurrent(token)) {
        this.settleWithError(error, 'TIDEWATCH_X900', 'Resize failed');
      }
    }
  }

  /**
   * Close the in-flight resize once its query delivered or failed. A limit
   * change suppressed in the meantime is applied now.
   */
  private finishResize(): void {
    if (!this.resizing) return;
    this.resizing = false;
    if (!this.disposed && this.limit.value !== this.appliedLimit) {
      void this.resize();
    }
  }

  private async open(token: number, identity: string, limit: number): Promise<void> {
    const query = this.buildQuery(identity, limit);
    this.appliedLimit = limit;

    if (this.live) {
      const subscription = query.snapshots().subscribe({
        next: (snapshot) => {
          if (this.slot.isCurrent(token)) this.handleSnapshot(snapshot.docs, limit);
        },
        error: (error: unknown) => {
          if (this.slot.isCurrent(token)) {
            this.settleWithError(error, 'TIDEWATCH_B201', 'Snapshot listener failed');
          }
        },
      });
      this.slot.hold(token, subscription);
      return;
    }

    try {
      const snapshot = await query.get({ source: 'default' });
      if (this.slot.isCurrent(token)) {
        this.handleSnapshot(snapshot.docs, limit);
      }
    } catch (error) {
      if (this.slot.isCurrent(token)) {
        this.settleWithError(error, 'TIDEWATCH_B202', 'Read failed');
      }
    } finally {
      if (this.slot.isCurrent(token)) {
        this.isLoading.nextDistinct(false);
      }
    }
  }

  private handleSnapshot(docs: readonly QueryDocumentSnapshot[], limit: number): void {
    let list: T[];
    try {
      list = docs.map((doc) => materialize(doc.id, doc.data(), this.fromJson));
    } catch (error) {
      this.settleWithError(error, 'TIDEWATCH_M300', 'Materialization failed');
      return;
    }

    for (const model of list) {
      const entry = this.items.get(model.id);
      if (entry) {
        entry.next(model);
      } else {
        this.items.set(model.id, new ObservableValue<T | null>(model));
      }
    }

    this.value.next(list);
    this.hasMore.nextDistinct(docs.length >= limit);
    this.isLoading.nextDistinct(false);
    this.hasInitialized.nextDistinct(true);
    this.finishResize();
  }

  /** A failed dependency stops triggering; the current results stay live */
  private reportTriggerError(error: unknown): void {
    if (this.disposed) return;
    const err = ensureTidewatchError(error, 'TIDEWATCH_X900');
    this.logger.warn('Trigger source failed', { code: err.code, reason: err.message });
    this.error.next(err);
  }

  private settleWithError(error: unknown, code: ErrorCode, message: string): void {
    const err = ensureTidewatchError(error, code);
    this.logger.warn(message, { code: err.code, reason: err.message });
    this.error.next(err);
    this.hasInitialized.nextDistinct(true);
    this.isLoading.nextDistinct(false);
    this.finishResize();
  }
}
