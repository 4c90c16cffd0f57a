/**
 * Zod-backed model codecs for Tidewatch synchronizers
 *
 * @module @tidewatch/zod
 */

import type { IdentifiedFields, JsonModel, Materializer, RawFields } from '@tidewatch/core';
import type { z } from 'zod';

/**
 * Options for {@link zodModel}
 */
export interface ZodModelOptions {
  /** Validate fields before every write. @default true */
  validateOnWrite?: boolean;
}

/** A single validation failure */
export interface ZodFieldError {
  path: string;
  message: string;
}

export interface ZodValidationResult {
  valid: boolean;
  errors: ZodFieldError[];
}

function describeIssues(error: z.ZodError): ZodFieldError[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * A validated record paired with its document id.
 *
 * Instances are immutable; {@link with} returns a new, re-validated one.
 */
export class ZodDocument<T extends RawFields> implements JsonModel {
  constructor(
    readonly id: string,
    readonly data: Readonly<T>,
    private readonly model: ZodModel<T>
  ) {}

  toJson(): RawFields {
    return this.model.toJson(this.data);
  }

  /**
   * Copy with some fields replaced.
   *
   * @throws {Error} when the result fails validation
   */
  with(changes: Partial<T>): ZodDocument<T> {
    return this.model.create(this.id, { ...this.data, ...changes });
  }
}

/**
 * Converts between raw document fields and validated {@link ZodDocument}s.
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 * import { zodModel } from '@tidewatch/zod';
 *
 * const settingsModel = zodModel(
 *   z.object({
 *     theme: z.enum(['light', 'dark']).default('light'),
 *     fontSize: z.number().int().min(8).default(14),
 *   })
 * );
 *
 * const settings = new DocSynchronizer({
 *   store,
 *   fromJson: settingsModel.fromJson,
 *   resolve: (s, uid) => s.doc(`settings/${uid}`),
 *   identity: auth.uid,
 * });
 *
 * const next = settings.current?.with({ theme: 'dark' });
 * ```
 */
export class ZodModel<T extends RawFields> {
  /** Materializer for synchronizer options */
  readonly fromJson: Materializer<ZodDocument<T>>;

  private readonly validateOnWrite: boolean;

  constructor(
    readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: ZodModelOptions = {}
  ) {
    this.validateOnWrite = options.validateOnWrite ?? true;
    this.fromJson = (fields: IdentifiedFields) => this.create(fields.id, fields);
  }

  /**
   * Parse raw data with the schema.
   *
   * @throws {Error} listing every failing field
   */
  parse(data: unknown): T {
    const result = this.schema.safeParse(data);
    if (!result.success) {
      const errors = describeIssues(result.error).map((e) => `${e.path || '(root)'}: ${e.message}`);
      throw new Error(`Validation failed: ${errors.join(', ')}`);
    }
    return result.data;
  }

  validate(data: unknown): ZodValidationResult {
    const result = this.schema.safeParse(data);
    return result.success ? { valid: true, errors: [] } : { valid: false, errors: describeIssues(result.error) };
  }

  /** Build a validated document for `id` */
  create(id: string, data: unknown): ZodDocument<T> {
    return new ZodDocument(id, this.parse(data), this);
  }

  /**
   * Field map to store for `data`; the `id` key is never written.
   */
  toJson(data: Readonly<T>): RawFields {
    const fields: RawFields = { ...(this.validateOnWrite ? this.parse(data) : data) };
    delete fields['id'];
    return fields;
  }
}

/**
 * Create a {@link ZodModel} for a schema.
 */
export function zodModel<T extends RawFields>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: ZodModelOptions
): ZodModel<T> {
  return new ZodModel(schema, options);
}
