import type { Observable } from 'rxjs';
import { TidewatchError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import type { ValueSource } from '../observable/index.js';
import type {
  CollectionRef,
  DocumentRef,
  DocumentStore,
  JsonModel,
  Materializer,
  Query,
} from '../types/index.js';

/** Default collection window growth unit */
export const DEFAULT_PAGE_SIZE = 25;

/**
 * Maps the current identity to the document a {@link DocSynchronizer} mirrors.
 * Only called while an identity is present.
 */
export type DocResolver = (store: DocumentStore, identity: string) => DocumentRef;

/**
 * Maps the current identity to the base collection of a {@link CollectionSynchronizer}.
 */
export type CollectionResolver = (store: DocumentStore, identity: string) => CollectionRef;

/**
 * Filter/sort applied on top of the base collection before the window limit.
 */
export type QueryModifier = (base: Query) => Query;

/**
 * Options shared by both synchronizers
 */
export interface BaseSynchronizerOptions<T extends JsonModel> {
  /** Backend entry point */
  store: DocumentStore;
  /** Rebuilds a model from raw fields with the document id injected */
  fromJson: Materializer<T>;
  /** Current identity; when omitted the synchronizer stays detached */
  identity?: ValueSource<string | null>;
  /** Live stream (true) or a single read per attach (false). @default true */
  subscribe?: boolean;
  /** Logger; defaults to a silent Tidewatch logger */
  logger?: Logger;
}

/**
 * Options for a {@link DocSynchronizer}
 */
export interface DocSynchronizerOptions<T extends JsonModel> extends BaseSynchronizerOptions<T> {
  resolve: DocResolver;
}

/**
 * Options for a {@link CollectionSynchronizer}
 */
export interface CollectionSynchronizerOptions<T extends JsonModel>
  extends BaseSynchronizerOptions<T> {
  resolve: CollectionResolver;
  /** Extra sources whose every emission forces a full re-attach */
  dependencies?: readonly Observable<unknown>[];
  /** Initial query modifier. @default null */
  query?: QueryModifier | null;
  /** Window growth unit for loadMore(). @default 25 */
  pageSize?: number;
}

/**
 * Validate a window page size.
 *
 * @throws {TidewatchError} `TIDEWATCH_C400` unless a positive safe integer
 */
export function validatePageSize(pageSize: number): void {
  if (!Number.isSafeInteger(pageSize) || pageSize < 1) {
    throw new TidewatchError({
      code: 'TIDEWATCH_C400',
      message: `pageSize must be a positive integer, got ${String(pageSize)}`,
      context: { option: 'pageSize', value: pageSize },
    });
  }
}
