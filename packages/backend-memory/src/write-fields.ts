import { isRecord, type RawFields } from '@tidewatch/core';

/**
 * Deep-merge `incoming` into `existing`; nested maps merge, everything else
 * is replaced. Neither input is mutated.
 */
export function mergeFields(existing: RawFields, incoming: RawFields): RawFields {
  const result: RawFields = { ...existing };
  for (const [key, value] of Object.entries(incoming)) {
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? mergeFields(current, value) : structuredClone(value);
  }
  return result;
}

/**
 * Apply an update map whose keys may be dotted field paths (`prefs.theme`).
 */
export function applyUpdate(existing: RawFields, update: RawFields): RawFields {
  const result = structuredClone(existing);
  for (const [key, value] of Object.entries(update)) {
    const segments = key.split('.');
    const last = segments.pop();
    if (last === undefined) continue;

    let target: RawFields = result;
    for (const segment of segments) {
      const next = target[segment];
      if (isRecord(next)) {
        target = next;
      } else {
        const created: RawFields = {};
        target[segment] = created;
        target = created;
      }
    }
    target[last] = structuredClone(value);
  }
  return result;
}
