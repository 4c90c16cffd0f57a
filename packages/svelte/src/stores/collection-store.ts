import type { CollectionSynchronizer, JsonModel, QueryModifier } from '@tidewatch/core';
import { derived, type Readable } from 'svelte/store';
import { fromValue } from './from-value.js';

/**
 * Store view of a {@link CollectionSynchronizer}
 */
export interface CollectionStore<T extends JsonModel> extends Readable<readonly T[]> {
  isLoading: Readable<boolean>;
  hasInitialized: Readable<boolean>;
  hasMore: Readable<boolean>;
  error: Readable<Error | null>;
  /** Settled with no records */
  showEmpty: Readable<boolean>;
  loadMore: () => void;
  resetPages: () => void;
  refresh: () => Promise<void>;
  setQuery: (modifier: QueryModifier | null) => void;
  /** Store for one record, fed by the per-item notifier */
  item: (id: string) => Readable<T | null>;
}

/**
 * Wrap a collection synchronizer in Svelte stores.
 *
 * @example
 * ```svelte
 * <script>
 * import { collectionStore } from '@tidewatch/svelte';
 * import { notesSync } from './sync.js';
 *
 * const notes = collectionStore(notesSync);
 * const { hasMore, showEmpty } = notes;
 * </script>
 *
 * {#each $notes as note (note.id)}
 *   <NoteRow {note} />
 * {/each}
 * {#if $showEmpty}<p>No notes yet</p>{/if}
 * {#if $hasMore}<button on:click={notes.loadMore}>More</button>{/if}
 * ```
 */
export function collectionStore<T extends JsonModel>(sync: CollectionSynchronizer<T>): CollectionStore<T> {
  const value = fromValue(sync.value);
  const isLoading = fromValue(sync.isLoading);
  const hasInitialized = fromValue(sync.hasInitialized);

  return {
    subscribe: value.subscribe,
    isLoading,
    hasInitialized,
    hasMore: fromValue(sync.hasMore),
    error: fromValue(sync.error),
    showEmpty: derived(
      [hasInitialized, isLoading, value],
      ([$initialized, $loading, $value]) => $initialized && !$loading && $value.length === 0
    ),
    loadMore: () => sync.loadMore(),
    resetPages: () => sync.resetPages(),
    refresh: () => sync.refresh(),
    setQuery: (modifier) => sync.setQuery(modifier),
    item: (id) => fromValue(sync.notifierFor(id)),
  };
}
