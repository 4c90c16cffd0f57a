import {
  EMPTY,
  Observable,
  asapScheduler,
  catchError,
  debounceTime,
  distinctUntilChanged,
  filter,
  merge,
} from 'rxjs';
import type { ValueSource } from './observable.js';

/**
 * Merge several trigger streams into one that fires at most once per
 * synchronous turn.
 *
 * Values replayed synchronously while subscribing (the current value of a
 * `BehaviorSubject`, for instance) are treated as wiring noise and dropped,
 * so only genuine changes arrive. A burst of changes from any number of
 * sources inside one turn collapses into a single emission on the next
 * microtask.
 *
 * A source that errors is reported through `onSourceError` and dropped;
 * the remaining sources keep triggering.
 *
 * @example
 * ```typescript
 * coalesceTriggers([identity$, filters$, sortOrder$]).subscribe(() => reattach());
 * filters.next('open');
 * sortOrder.next('desc'); // reattach() runs once
 * ```
 */
export function coalesceTriggers(
  sources: readonly Observable<unknown>[],
  onSourceError?: (error: unknown) => void
): Observable<void> {
  const guarded = sources.map((source) =>
    source.pipe(
      catchError((error: unknown) => {
        onSourceError?.(error);
        return EMPTY;
      })
    )
  );

  return new Observable<void>((subscriber) => {
    let wiring = true;
    const subscription = merge(...guarded)
      .pipe(
        filter(() => !wiring),
        debounceTime(0, asapScheduler)
      )
      .subscribe(() => subscriber.next());
    wiring = false;
    return subscription;
  });
}

/**
 * Change stream of a value source: distinct values only, so re-publishing
 * the same identity does not count as a change.
 */
export function changesOf<T>(source: ValueSource<T>): Observable<T> {
  return source.asObservable().pipe(distinctUntilChanged());
}
