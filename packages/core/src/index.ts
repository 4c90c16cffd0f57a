/**
 * @packageDocumentation
 *
 * Reactive synchronizers that bind one backend document, or one query over
 * a collection, to observable state that follows identity changes, server
 * pushes and pagination requests.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { CollectionSynchronizer, ObservableValue } from '@tidewatch/core';
 *
 * const uid = new ObservableValue<string | null>(null);
 *
 * const notes = new CollectionSynchronizer<Note>({
 *   store,
 *   fromJson: Note.fromJson,
 *   resolve: (store, identity) => store.collection(`users/${identity}/notes`),
 *   identity: uid,
 *   pageSize: 20,
 * });
 *
 * uid.next('user-1'); // attaches and starts streaming
 * ```
 *
 * @module @tidewatch/core
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Observable/Reactive
export * from './observable/index.js';

// Field utilities
export * from './fields/index.js';

// Commands
export * from './command/index.js';

// Synchronizers
export * from './sync/index.js';
