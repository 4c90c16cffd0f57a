import { TidewatchError } from '@tidewatch/core';

/**
 * Split a slash-separated path, ignoring leading, trailing and doubled slashes.
 */
export function segmentsOf(path: string): string[] {
  return path.split('/').filter((segment) => segment.length > 0);
}

/**
 * Normalize a document path; documents live at an even number of segments.
 *
 * @throws {TidewatchError} `TIDEWATCH_C400` for collection-shaped paths
 */
export function documentPath(path: string): string {
  const segments = segmentsOf(path);
  if (segments.length === 0 || segments.length % 2 !== 0) {
    throw new TidewatchError({
      code: 'TIDEWATCH_C400',
      message: `"${path}" is not a document path`,
      context: { path },
    });
  }
  return segments.join('/');
}

/**
 * Normalize a collection path; collections live at an odd number of segments.
 *
 * @throws {TidewatchError} `TIDEWATCH_C400` for document-shaped paths
 */
export function collectionPath(path: string): string {
  const segments = segmentsOf(path);
  if (segments.length % 2 !== 1) {
    throw new TidewatchError({
      code: 'TIDEWATCH_C400',
      message: `"${path}" is not a collection path`,
      context: { path },
    });
  }
  return segments.join('/');
}

/** Last segment of a normalized path */
export function lastSegment(path: string): string {
  const segments = segmentsOf(path);
  return segments[segments.length - 1] ?? '';
}

/** Collection a normalized document path belongs to */
export function parentOf(path: string): string {
  const index = path.lastIndexOf('/');
  return index === -1 ? '' : path.slice(0, index);
}
