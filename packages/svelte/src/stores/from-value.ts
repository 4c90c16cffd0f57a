import type { ValueSource } from '@tidewatch/core';
import { readable, type Readable } from 'svelte/store';

/**
 * Expose an observable value as a Svelte readable store.
 *
 * The backing subscription exists only while the store has subscribers.
 */
export function fromValue<T>(source: ValueSource<T>): Readable<T> {
  return readable(source.value, (set) => {
    const subscription = source.asObservable().subscribe(set);
    return () => subscription.unsubscribe();
  });
}
