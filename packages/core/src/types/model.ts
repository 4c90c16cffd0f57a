/**
 * Raw field map as stored by the backend. Never contains the document id;
 * the backend owns identifier placement.
 */
export type RawFields = Record<string, unknown>;

/**
 * A raw field map with the document's own identifier injected.
 */
export type IdentifiedFields = RawFields & { id: string };

/**
 * Minimal contract for backend-mirrored entities.
 *
 * - `id` is always present on in-memory models.
 * - `toJson()` omits `id`.
 *
 * @example
 * ```typescript
 * class UserSettings implements JsonModel {
 *   constructor(readonly id: string, readonly theme: 'light' | 'dark') {}
 *
 *   static fromJson(fields: IdentifiedFields): UserSettings {
 *     return new UserSettings(fields.id, fields.theme === 'dark' ? 'dark' : 'light');
 *   }
 *
 *   toJson(): RawFields {
 *     return { theme: this.theme };
 *   }
 * }
 * ```
 */
export interface JsonModel {
  readonly id: string;
  toJson(): RawFields;
}

/**
 * Pure reconstruction of a domain object from its raw fields plus id.
 */
export type Materializer<T> = (fields: IdentifiedFields) => T;
