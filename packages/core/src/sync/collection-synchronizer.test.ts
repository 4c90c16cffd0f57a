import { MemoryDocumentStore } from '@tidewatch/backend-memory';
import { Subject } from 'rxjs';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { TidewatchError, UnauthenticatedError } from '../errors/index.js';
import { ObservableValue } from '../observable/index.js';
import type { DocumentStore, IdentifiedFields, JsonModel, RawFields } from '../types/index.js';
import { CollectionSynchronizer } from './collection-synchronizer.js';
import type { CollectionResolver, QueryModifier } from './options.js';

const flush = () => new Promise((resolve) => setTimeout(resolve, 10));

class Note implements JsonModel {
  constructor(
    readonly id: string,
    readonly title: string,
    readonly rank: number,
    readonly done = false
  ) {}

  static fromJson(fields: IdentifiedFields): Note {
    const { id, title, rank, done } = fields;
    if (typeof title !== 'string') throw new Error('title must be a string');
    if (typeof rank !== 'number') throw new Error('rank must be a number');
    return new Note(id, title, rank, done === true);
  }

  toJson(): RawFields {
    return { title: this.title, rank: this.rank, done: this.done };
  }
}

const byRank: QueryModifier = (q) => q.orderBy('rank');
const ids = (notes: readonly Note[]) => notes.map((note) => note.id);

function seed(store: MemoryDocumentStore, uid: string, count: number): void {
  for (let i = 1; i <= count; i++) {
    store.applyRemote(`users/${uid}/notes/n${i}`, { title: `Note ${i}`, rank: i, done: i % 2 === 0 });
  }
}

describe('CollectionSynchronizer', () => {
  let store: MemoryDocumentStore;
  let uid: ObservableValue<string | null>;
  let resolve: Mock<CollectionResolver>;
  let sync: CollectionSynchronizer<Note> | undefined;

  const create = (
    options: {
      pageSize?: number;
      subscribe?: boolean;
      query?: QueryModifier | null;
      dependencies?: Subject<unknown>[];
    } = {}
  ) => {
    sync = new CollectionSynchronizer<Note>({
      store,
      fromJson: Note.fromJson,
      resolve,
      identity: uid,
      pageSize: options.pageSize ?? 3,
      subscribe: options.subscribe,
      query: options.query === undefined ? byRank : options.query,
      dependencies: options.dependencies,
    });
    return sync;
  };

  beforeEach(() => {
    store = new MemoryDocumentStore();
    uid = new ObservableValue<string | null>(null);
    resolve = vi.fn((s: DocumentStore, id: string) => s.collection(`users/${id}/notes`));
  });

  afterEach(() => {
    sync?.dispose();
    sync = undefined;
  });

  describe('pagination', () => {
    it('should grow the window until the collection is exhausted', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create();
      expect(notes.isInitializing).toBe(true);
      await flush();

      expect(ids(notes.current)).toEqual(['n1', 'n2', 'n3']);
      expect(notes.hasMore.value).toBe(true);

      notes.loadMore();
      expect(notes.windowLimit.value).toBe(6);
      expect(notes.isRefreshing).toBe(true);
      expect(notes.current).toHaveLength(3);
      await flush();

      expect(ids(notes.current)).toEqual(['n1', 'n2', 'n3', 'n4', 'n5']);
      expect(notes.hasMore.value).toBe(false);
      expect(notes.isLoading.value).toBe(false);

      notes.loadMore();
      expect(notes.windowLimit.value).toBe(6);
    });

    it('should grow the window by one page per loadMore', async () => {
      seed(store, 'u1', 10);
      uid.next('u1');
      const notes = create({ pageSize: 2 });
      await flush();

      notes.loadMore();
      await flush();
      notes.loadMore();
      await flush();

      expect(notes.windowLimit.value).toBe(6);
      expect(notes.current).toHaveLength(6);
      expect(notes.hasMore.value).toBe(true);
    });

    it('should ignore loadMore while a resize has not delivered', async () => {
      seed(store, 'u1', 10);
      uid.next('u1');
      const notes = create();
      await flush();

      notes.loadMore();
      notes.loadMore();
      await flush();

      expect(notes.windowLimit.value).toBe(6);
      expect(notes.current).toHaveLength(6);
    });

    it('should shrink back to one page with a single resubscription', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create();
      await flush();
      notes.loadMore();
      await flush();
      const resolutions = resolve.mock.calls.length;

      notes.resetPages();
      await flush();

      expect(resolve.mock.calls.length).toBe(resolutions + 1);
      expect(notes.windowLimit.value).toBe(3);
      expect(ids(notes.current)).toEqual(['n1', 'n2', 'n3']);
      expect(notes.hasMore.value).toBe(true);
      expect(store.activeListenerCount()).toBe(1);
    });

    it('should page in one-shot mode', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create({ subscribe: false });
      await flush();

      expect(notes.current).toHaveLength(3);
      expect(store.activeListenerCount()).toBe(0);

      notes.loadMore();
      await flush();

      expect(notes.current).toHaveLength(5);
      expect(notes.hasMore.value).toBe(false);
      expect(notes.isLoading.value).toBe(false);
    });

    it('should reject a non-positive page size', () => {
      expect(() => create({ pageSize: 0 })).toThrow(TidewatchError);
    });
  });

  describe('attach', () => {
    it('should settle empty without touching the backend when signed out', async () => {
      seed(store, 'u1', 5);
      const notes = create();
      await flush();

      expect(notes.current).toEqual([]);
      expect(notes.isLoading.value).toBe(false);
      expect(notes.hasInitialized.value).toBe(true);
      expect(notes.hasMore.value).toBe(false);
      expect(notes.showEmpty).toBe(true);
      expect(resolve).not.toHaveBeenCalled();
      expect(store.readCount()).toBe(0);
      expect(store.activeListenerCount()).toBe(0);
    });

    it('should load after sign-in', async () => {
      seed(store, 'u1', 5);
      const notes = create();
      await flush();

      uid.next('u1');
      await flush();

      expect(notes.current).toHaveLength(3);
      expect(notes.hasMore.value).toBe(true);
    });

    it('should clear the list and reload on identity change', async () => {
      seed(store, 'u1', 5);
      store.applyRemote('users/u2/notes/m1', { title: 'Other', rank: 1 });
      uid.next('u1');
      const notes = create();
      await flush();

      const lengths: number[] = [];
      const initialized: boolean[] = [];
      notes.value.subscribe((list) => lengths.push(list.length));
      notes.hasInitialized.subscribe((flag) => initialized.push(flag));

      uid.next('u2');
      await flush();

      expect(lengths).toEqual([3, 0, 1]);
      expect(initialized).toEqual([true, false, true]);
      expect(ids(notes.current)).toEqual(['m1']);
      expect(notes.hasMore.value).toBe(false);
    });

    it('should keep one listener after rapid identity changes', async () => {
      seed(store, 'u1', 2);
      seed(store, 'u2', 4);
      uid.next('u1');
      const notes = create();

      await Promise.resolve();
      uid.next('u2');
      await Promise.resolve();
      uid.next('u1');
      uid.next('u2');
      await flush();

      expect(store.activeListenerCount()).toBe(1);
      expect(notes.current.map((note) => note.title)).toEqual(['Note 1', 'Note 2', 'Note 3']);
    });

    it('should coalesce dependency bursts into one re-attach', async () => {
      seed(store, 'u1', 3);
      uid.next('u1');
      const filter = new Subject<unknown>();
      const sort = new Subject<unknown>();
      create({ dependencies: [filter, sort] });
      await flush();
      const resolutions = resolve.mock.calls.length;

      filter.next('open');
      sort.next('desc');
      filter.next('done');
      await flush();

      expect(resolve.mock.calls.length).toBe(resolutions + 1);
    });

    it('should re-attach when the query modifier changes', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create();
      await flush();

      notes.setQuery((q) => q.where('done', '==', true).orderBy('rank'));
      await flush();

      expect(ids(notes.current)).toEqual(['n2', 'n4']);
      expect(notes.hasMore.value).toBe(false);
    });

    it('should ignore setting the active modifier again', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create();
      await flush();
      const resolutions = resolve.mock.calls.length;

      notes.setQuery(byRank);
      await flush();

      expect(resolve.mock.calls.length).toBe(resolutions);
    });

    it('should query the bare collection without a modifier', async () => {
      store.applyRemote('users/u1/notes/b', { title: 'B', rank: 1 });
      store.applyRemote('users/u1/notes/a', { title: 'A', rank: 2 });
      uid.next('u1');
      const notes = create({ query: null });
      await flush();

      expect(ids(notes.current)).toEqual(['a', 'b']);
    });

    it('should reload from scratch on refresh', async () => {
      seed(store, 'u1', 2);
      uid.next('u1');
      const notes = create({ subscribe: false });
      await flush();

      store.applyRemote('users/u1/notes/n0', { title: 'New', rank: 0 });
      await notes.refresh();

      expect(ids(notes.current)).toEqual(['n0', 'n1', 'n2']);
    });

    it('should follow live changes inside the window', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create();
      await flush();

      store.applyRemote('users/u1/notes/n0', { title: 'First', rank: 0 });

      expect(ids(notes.current)).toEqual(['n0', 'n1', 'n2']);
    });
  });

  describe('errors', () => {
    it('should settle and keep the list when the listener fails', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create();
      await flush();

      store.failListeners('users/u1/notes', new Error('permission revoked'));

      expect(TidewatchError.isCode(notes.error.value, 'TIDEWATCH_B201')).toBe(true);
      expect(notes.isLoading.value).toBe(false);
      expect(notes.hasInitialized.value).toBe(true);
      expect(notes.current).toHaveLength(3);
    });

    it('should surface one-shot read failures', async () => {
      store.failNextRead('users/u1/notes', new Error('offline'));
      uid.next('u1');
      const notes = create({ subscribe: false });
      await flush();

      expect(TidewatchError.isCode(notes.error.value, 'TIDEWATCH_B202')).toBe(true);
      expect(notes.isLoading.value).toBe(false);
      expect(notes.hasInitialized.value).toBe(true);
    });

    it('should keep the previous list when a document fails to materialize', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create();
      await flush();

      store.applyRemote('users/u1/notes/n1', { title: 5, rank: 1 });

      expect(TidewatchError.isCode(notes.error.value, 'TIDEWATCH_M300')).toBe(true);
      expect(notes.current[0]?.title).toBe('Note 1');
    });

    it('should report a failed dependency and keep following the identity', async () => {
      seed(store, 'u1', 5);
      seed(store, 'u2', 2);
      uid.next('u1');
      const dependency = new Subject<unknown>();
      const notes = create({ dependencies: [dependency] });
      await flush();

      dependency.error(new Error('dependency failed'));

      expect(TidewatchError.isCode(notes.error.value, 'TIDEWATCH_X900')).toBe(true);
      expect(notes.current).toHaveLength(3);

      uid.next('u2');
      await flush();

      expect(notes.error.value).toBeNull();
      expect(resolve).toHaveBeenLastCalledWith(store, 'u2');
      expect(ids(notes.current)).toEqual(['n1', 'n2']);
    });

    it('should clear a listener error when the window grows', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create();
      await flush();

      store.failListeners('users/u1/notes', new Error('permission revoked'));
      expect(notes.error.value).not.toBeNull();

      notes.loadMore();
      expect(notes.error.value).toBeNull();
      await flush();

      expect(notes.error.value).toBeNull();
      expect(notes.current).toHaveLength(5);
    });
  });

  describe('notifierFor()', () => {
    it('should update the same per-item observable in place', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create();
      await flush();

      const first = notes.notifierFor('n1');
      expect(first.value?.title).toBe('Note 1');

      store.applyRemote('users/u1/notes/n1', { title: 'Renamed', rank: 1 });

      expect(notes.notifierFor('n1')).toBe(first);
      expect(first.value?.title).toBe('Renamed');
    });

    it('should keep the last value after the item leaves the window', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create();
      await flush();
      const first = notes.notifierFor('n1');

      store.applyRemote('users/u1/notes/n1', { title: 'Sunk', rank: 10 });

      expect(ids(notes.current)).toEqual(['n2', 'n3', 'n4']);
      expect(first.value).toEqual(new Note('n1', 'Note 1', 1, false));
    });

    it('should fill an entry requested before the item arrives', async () => {
      seed(store, 'u1', 2);
      uid.next('u1');
      const notes = create();
      const pending = notes.notifierFor('n9');
      expect(pending.value).toBeNull();

      store.applyRemote('users/u1/notes/n9', { title: 'Late', rank: 0 });
      await flush();

      expect(pending.value?.title).toBe('Late');
    });
  });

  describe('commands', () => {
    beforeEach(() => {
      seed(store, 'u1', 5);
      uid.next('u1');
    });

    it('should add with a backend-assigned id', async () => {
      store = new MemoryDocumentStore({ idGenerator: () => 'new-1' });
      seed(store, 'u1', 5);
      const notes = create();
      await flush();
      expect(notes.add.result.value).toBeNull();

      const id = await notes.add.execute({ title: 'Added', rank: 0 });

      expect(id).toBe('new-1');
      expect(notes.add.result.value).toBe('new-1');
      expect(ids(notes.current)).toEqual(['new-1', 'n1', 'n2']);
    });

    it('should merge models on set', async () => {
      const notes = create();
      await flush();

      await notes.set.execute(new Note('n1', 'Merged', 1, true));

      expect(notes.notifierFor('n1').value).toEqual(new Note('n1', 'Merged', 1, true));
    });

    it('should patch raw fields', async () => {
      const notes = create();
      await flush();

      await notes.patch.execute({ id: 'n2', data: { title: 'Patched' } });

      expect(notes.current[1]?.title).toBe('Patched');
    });

    it('should fail update of a missing document on the command only', async () => {
      const notes = create();
      await flush();

      await expect(notes.update.execute(new Note('missing', 'x', 1))).rejects.toBeInstanceOf(TidewatchError);
      expect(TidewatchError.isCode(notes.update.error.value, 'TIDEWATCH_B203')).toBe(true);
      expect(notes.error.value).toBeNull();
    });

    it('should delete by id', async () => {
      const notes = create();
      await flush();

      await notes.delete.execute('n1');

      expect(ids(notes.current)).toEqual(['n2', 'n3', 'n4']);
    });

    it('should fail commands as unauthenticated when signed out', async () => {
      uid.next(null);
      const notes = create();
      await flush();

      await expect(notes.add.execute({ title: 'x', rank: 1 })).rejects.toBeInstanceOf(UnauthenticatedError);
      await expect(notes.delete.execute('n1')).rejects.toBeInstanceOf(UnauthenticatedError);
      expect(notes.add.result.value).toBeNull();
    });
  });

  describe('dispose()', () => {
    it('should cancel the listener and complete every observable', async () => {
      seed(store, 'u1', 5);
      uid.next('u1');
      const notes = create();
      await flush();
      const entry = notes.notifierFor('n1');

      notes.dispose();
      notes.dispose();

      expect(store.activeListenerCount()).toBe(0);
      expect(entry.isDestroyed).toBe(true);
      expect(notes.value.isDestroyed).toBe(true);

      notes.loadMore();
      uid.next('u2');
      await flush();
      expect(store.activeListenerCount()).toBe(0);
    });
  });
});
