/**
 * @tidewatch/svelte - Svelte stores for Tidewatch synchronizers
 *
 * Each synchronizer observable becomes a readable store, so components can
 * use `$store` syntax while the synchronizer keeps running outside them.
 *
 * @example
 * ```svelte
 * <script>
 * import { collectionStore, commandStore } from '@tidewatch/svelte';
 * import { notesSync } from './sync.js';
 *
 * const notes = collectionStore(notesSync);
 * const remove = commandStore(notesSync.delete);
 * </script>
 *
 * <ul>
 *   {#each $notes as note (note.id)}
 *     <li>
 *       {note.title}
 *       <button disabled={$remove.isLoading} on:click={() => remove.execute(note.id)}>Delete</button>
 *     </li>
 *   {/each}
 * </ul>
 * ```
 *
 * @module @tidewatch/svelte
 */

export {
  collectionStore,
  commandStore,
  docStore,
  fromValue,
  type CollectionStore,
  type CommandStore,
  type CommandStoreOptions,
  type DocStore,
} from './stores/index.js';
