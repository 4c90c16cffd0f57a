/**
 * Tidewatch Error System
 *
 * Every failure surfaced by a synchronizer, command or backend is a
 * {@link TidewatchError} carrying a code, a category and context.
 *
 * @example
 * ```typescript
 * import { TidewatchError } from '@tidewatch/core';
 *
 * try {
 *   await notes.add.execute({ title: 'Draft' });
 * } catch (error) {
 *   if (TidewatchError.isCategory(error, 'authentication')) {
 *     redirectToLogin();
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  MaterializationError,
  TidewatchError,
  UnauthenticatedError,
  ensureTidewatchError,
  toError,
  type SerializedTidewatchError,
  type TidewatchErrorOptions,
} from './tidewatch-error.js';
