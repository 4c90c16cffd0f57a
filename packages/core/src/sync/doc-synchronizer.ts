import type { Subscription } from 'rxjs';
import { Command } from '../command/index.js';
import {
  UnauthenticatedError,
  ensureTidewatchError,
  toError,
  type ErrorCode,
} from '../errors/index.js';
import { fieldsEqual, materialize } from '../fields/index.js';
import { scopedLogger, type Logger } from '../observability/index.js';
import {
  ObservableValue,
  SubscriptionSlot,
  changesOf,
  coalesceTriggers,
  type ValueSource,
} from '../observable/index.js';
import type {
  DocumentRef,
  DocumentSnapshot,
  DocumentStore,
  IdentifiedFields,
  JsonModel,
  Materializer,
  RawFields,
} from '../types/index.js';
import type { DocResolver, DocSynchronizerOptions } from './options.js';

/**
 * Parameter of {@link DocSynchronizer.write}
 */
export interface DocWrite<T extends JsonModel> {
  model: T;
  /** Merge into the stored fields instead of replacing them. @default true */
  merge?: boolean;
}

/**
 * Mirrors one backend document, chosen by the current identity, as an
 * observable value.
 *
 * On every identity change the synchronizer cancels its listener, primes
 * the value from the local cache when possible, then either streams live
 * snapshots or performs a single read. Signing out clears the value.
 *
 * Writes never touch `value` directly; their effect arrives through the
 * listener like any other change.
 *
 * @typeParam T - The model type
 *
 * @example
 * ```typescript
 * const settings = new DocSynchronizer<UserSettings>({
 *   store,
 *   fromJson: UserSettings.fromJson,
 *   resolve: (store, uid) => store.doc(`users/${uid}`),
 *   identity: auth.uid,
 * });
 *
 * settings.value.subscribe((current) => render(current));
 * await settings.write.execute({ model: current.withTheme('dark') });
 *
 * // Later
 * settings.dispose();
 * ```
 */
export class DocSynchronizer<T extends JsonModel> {
  /** The mirrored record; null while signed out or when the document does not exist */
  readonly value = new ObservableValue<T | null>(null);
  readonly isLoading = new ObservableValue<boolean>(true);
  /** Last stream, read or materialization error of the current attach */
  readonly error = new ObservableValue<Error | null>(null);

  /** Set the document from a model (merging by default) */
  readonly write: Command<DocWrite<T>, void>;
  /** Update the existing document with every field of a model */
  readonly update: Command<T, void>;
  /** Update the existing document with a raw field map */
  readonly patch: Command<RawFields, void>;
  readonly delete: Command<void, void>;

  private readonly store: DocumentStore;
  private readonly fromJson: Materializer<T>;
  private readonly resolver: DocResolver;
  private readonly identity: ValueSource<string | null> | null;
  private readonly live: boolean;
  private readonly logger: Logger;

  private readonly slot = new SubscriptionSlot();
  private readonly triggers: Subscription;
  // Fields (with id) behind the current value; used to squash duplicate snapshots
  private lastFields: IdentifiedFields | null = null;
  private disposed = false;

  constructor(options: DocSynchronizerOptions<T>) {
    this.store = options.store;
    this.fromJson = options.fromJson;
    this.resolver = options.resolve;
    this.identity = options.identity ?? null;
    this.live = options.subscribe ?? true;
    this.logger = scopedLogger(options.logger, 'doc');

    this.write = new Command<DocWrite<T>, void>(
      ({ model, merge = true }) => this.docOrThrow('write').set(model.toJson(), { merge }),
      { initialValue: undefined, name: 'write', logger: this.logger }
    );
    this.update = new Command<T, void>(
      (model) => this.docOrThrow('update').update(model.toJson()),
      { initialValue: undefined, name: 'update', logger: this.logger }
    );
    this.patch = new Command<RawFields, void>(
      (fields) => this.docOrThrow('patch').update(fields),
      { initialValue: undefined, name: 'patch', logger: this.logger }
    );
    this.delete = new Command<void, void>(() => this.docOrThrow('delete').delete(), {
      initialValue: undefined,
      name: 'delete',
      logger: this.logger,
    });

    const sources = this.identity ? [changesOf(this.identity)] : [];
    this.triggers = coalesceTriggers(sources, (error) => this.reportTriggerError(error)).subscribe(
      () => void this.attach()
    );

    void this.attach();
  }

  /** Shorthand for `value.value` */
  get current(): T | null {
    return this.value.value;
  }

  /**
   * Re-attach for the current identity, re-reading the document.
   */
  refresh(): Promise<void> {
    return this.attach();
  }

  /**
   * Cancel the listener, stop watching the identity and complete every
   * observable. Safe to call more than once.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    this.triggers.unsubscribe();
    this.slot.dispose();

    this.write.destroy();
    this.update.destroy();
    this.patch.destroy();
    this.delete.destroy();

    this.value.destroy();
    this.isLoading.destroy();
    this.error.destroy();
  }

  // ── internals ─────────────────────────────────────────────────────────

  private get currentIdentity(): string | null {
    return this.identity?.value ?? null;
  }

  private docOrThrow(operation: string): DocumentRef {
    const identity = this.currentIdentity;
    if (identity === null) {
      throw new UnauthenticatedError(operation);
    }
    return this.resolver(this.store, identity);
  }

  private async attach(): Promise<void> {
    if (this.disposed) return;

    const token = this.slot.begin();
    this.isLoading.nextDistinct(true);
    this.error.nextDistinct(null);

    try {
      const identity = this.currentIdentity;
      if (identity === null) {
        this.logger.debug('Detached: no identity');
        this.publishMissing();
        this.isLoading.nextDistinct(false);
        return;
      }

      const ref = this.resolver(this.store, identity);
      this.logger.debug('Attaching', { path: ref.path, live: this.live });

      await this.primeFromCache(token, ref);
      if (!this.slot.isCurrent(token)) return;

      if (this.live) {
        this.listen(token, ref);
      } else {
        await this.readOnce(token, ref);
      }
    } catch (error) {
      if (this.slot.isCurrent(token)) {
        this.settleWithError(error, 'TIDEWATCH_X900', 'Attach failed');
      }
    }
  }

  private async primeFromCache(token: number, ref: DocumentRef): Promise<void> {
    let snapshot: DocumentSnapshot;
    try {
      snapshot = await ref.get({ source: 'cache' });
    } catch (error) {
      this.logger.debug('Cache probe missed', { path: ref.path, reason: toError(error).message });
      return;
    }

    if (!this.slot.isCurrent(token)) return;

    const fields = snapshot.data();
    if (!snapshot.exists || fields === undefined) return;

    if (this.accept(snapshot.id, fields)) {
      this.isLoading.nextDistinct(false);
    }
  }

  private listen(token: number, ref: DocumentRef): void {
    const subscription = ref.snapshots({ includeMetadataChanges: true }).subscribe({
      next: (snapshot) => {
        if (this.slot.isCurrent(token)) this.handleSnapshot(snapshot);
      },
      error: (error: unknown) => {
        if (this.slot.isCurrent(token)) {
          this.settleWithError(error, 'TIDEWATCH_B201', 'Snapshot listener failed');
        }
      },
    });
    this.slot.hold(token, subscription);
  }

  private async readOnce(token: number, ref: DocumentRef): Promise<void> {
    try {
      const snapshot = await ref.get({ source: 'default' });
      if (!this.slot.isCurrent(token)) return;

      const fields = snapshot.data();
      if (snapshot.exists && fields !== undefined) {
        this.accept(snapshot.id, fields);
      } else {
        this.publishMissing();
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

  private handleSnapshot(snapshot: DocumentSnapshot): void {
    const pending = snapshot.metadata.hasPendingWrites;
    const fields = snapshot.data();

    if (!snapshot.exists || fields === undefined) {
      // Absence backed by a pending local write is not authoritative yet
      if (!pending) {
        this.publishMissing();
        this.isLoading.nextDistinct(false);
      }
      return;
    }

    this.accept(snapshot.id, fields);
    if (!pending) {
      this.isLoading.nextDistinct(false);
    }
  }

  /**
   * Materialize and publish unless the fields equal the last published ones.
   *
   * @returns false when materialization failed
   */
  private accept(id: string, fields: RawFields): boolean {
    const next: IdentifiedFields = { ...fields, id };
    if (this.lastFields !== null && fieldsEqual(this.lastFields, next)) {
      this.logger.debug('Skipped unchanged snapshot', { id });
      return true;
    }

    let model: T;
    try {
      model = materialize(id, fields, this.fromJson);
    } catch (error) {
      this.settleWithError(error, 'TIDEWATCH_M300', 'Materialization failed');
      return false;
    }

    this.lastFields = next;
    this.value.next(model);
    return true;
  }

  private publishMissing(): void {
    this.lastFields = null;
    this.value.nextDistinct(null);
  }

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
    this.isLoading.nextDistinct(false);
  }
}
