export { collectionStore, type CollectionStore } from './collection-store.js';
export { commandStore, type CommandStore, type CommandStoreOptions } from './command-store.js';
export { docStore, type DocStore } from './doc-store.js';
export { fromValue } from './from-value.js';
