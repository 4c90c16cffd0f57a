/**
 * @tidewatch/zod - Zod schema integration
 *
 * Turns a Zod schema into the materializer and serializer a synchronizer
 * needs, so stored fields are validated on the way in and out.
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 * import { CollectionSynchronizer } from '@tidewatch/core';
 * import { zodModel } from '@tidewatch/zod';
 *
 * const noteModel = zodModel(z.object({ title: z.string(), pinned: z.boolean().default(false) }));
 *
 * const notes = new CollectionSynchronizer({
 *   store,
 *   fromJson: noteModel.fromJson,
 *   resolve: (s, uid) => s.collection(`users/${uid}/notes`),
 *   identity: auth.uid,
 * });
 * ```
 *
 * @module @tidewatch/zod
 */

export {
  ZodDocument,
  ZodModel,
  zodModel,
  type ZodFieldError,
  type ZodModelOptions,
  type ZodValidationResult,
} from './zod-model.js';
