export {
  CollectionSynchronizer,
  type CollectionPatch,
} from './collection-synchronizer.js';
export { DocSynchronizer, type DocWrite } from './doc-synchronizer.js';
export {
  DEFAULT_PAGE_SIZE,
  validatePageSize,
  type BaseSynchronizerOptions,
  type CollectionResolver,
  type CollectionSynchronizerOptions,
  type DocResolver,
  type DocSynchronizerOptions,
  type QueryModifier,
} from './options.js';
