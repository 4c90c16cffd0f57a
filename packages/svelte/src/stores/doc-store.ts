import type { DocSynchronizer, JsonModel } from '@tidewatch/core';
import type { Readable } from 'svelte/store';
import { fromValue } from './from-value.js';

/**
 * Store view of a {@link DocSynchronizer}
 */
export interface DocStore<T extends JsonModel> extends Readable<T | null> {
  /** Whether the document is loading */
  isLoading: Readable<boolean>;
  /** Last stream, read or materialization error */
  error: Readable<Error | null>;
  /** Re-read the document for the current identity */
  refresh: () => Promise<void>;
}

/**
 * Wrap a document synchronizer in Svelte stores.
 *
 * The synchronizer keeps its own lifecycle; call `dispose()` on it when
 * the owning component or module goes away.
 *
 * @example
 * ```svelte
 * <script>
 * import { docStore } from '@tidewatch/svelte';
 * import { settingsSync } from './sync.js';
 *
 * const settings = docStore(settingsSync);
 * const { isLoading } = settings;
 * </script>
 *
 * {#if $isLoading}
 *   <p>Loading...</p>
 * {:else if $settings}
 *   <p>Theme: {$settings.theme}</p>
 * {:else}
 *   <p>Signed out</p>
 * {/if}
 * ```
 */
export function docStore<T extends JsonModel>(sync: DocSynchronizer<T>): DocStore<T> {
  const value = fromValue(sync.value);

  return {
    subscribe: value.subscribe,
    isLoading: fromValue(sync.isLoading),
    error: fromValue(sync.error),
    refresh: () => sync.refresh(),
  };
}
