import {
  BehaviorSubject,
  distinctUntilChanged,
  type Observable,
  type Observer,
  type Subscription,
} from 'rxjs';

/**
 * Read-only view of a reactive value: a synchronous current value plus a
 * stream that replays it to new subscribers.
 *
 * Identity sources are consumed through this interface, so an
 * {@link ObservableValue} or any wrapper over an auth SDK can be passed in.
 */
export interface ValueSource<T> {
  readonly value: T;
  /** Emits the current value on subscribe, then every change */
  asObservable(): Observable<T>;
}

/**
 * Holder for one piece of synchronizer state.
 *
 * The current record, loading flags, window limit and per-item entries are
 * all ObservableValues, and every state change is exactly one synchronous
 * `next`. Subscribers get the current value first.
 *
 * @example Identity source
 * ```typescript
 * const uid = new ObservableValue<string | null>(null);
 *
 * const settings = new DocSynchronizer({ ..., identity: uid });
 *
 * auth.onAuthStateChanged((user) => uid.next(user?.uid ?? null));
 * ```
 *
 * @example Reading state
 * ```typescript
 * settings.isLoading.subscribeDistinct((loading) => spinner.toggle(loading));
 * console.log(settings.value.value?.theme);
 * ```
 */
export class ObservableValue<T> implements ValueSource<T> {
  private readonly state: BehaviorSubject<T>;
  private destroyed = false;

  constructor(initial: T) {
    this.state = new BehaviorSubject(initial);
  }

  /** Current value; stays readable after {@link destroy} */
  get value(): T {
    return this.state.getValue();
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /** Publish `value`. No-op once destroyed. */
  next(value: T): void {
    if (this.destroyed) return;
    this.state.next(value);
  }

  /**
   * Publish only when `value` is not identical (`===`) to the current one.
   *
   * @returns whether subscribers were notified
   */
  nextDistinct(value: T): boolean {
    if (this.destroyed || this.state.getValue() === value) return false;
    this.state.next(value);
    return true;
  }

  /** Stream of the current value and every change; completes on destroy */
  asObservable(): Observable<T> {
    return this.state.asObservable();
  }

  subscribe(observer: ((value: T) => void) | Partial<Observer<T>>): Subscription {
    return this.state.subscribe(observer);
  }

  /**
   * Subscribe, skipping emissions equal to the previous one.
   *
   * @param isSame - equality used instead of `===`
   */
  subscribeDistinct(observer: (value: T) => void, isSame?: (a: T, b: T) => boolean): Subscription {
    return this.state.pipe(distinctUntilChanged(isSame)).subscribe(observer);
  }

  /** Complete every subscriber. Later publishes are ignored. */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.state.complete();
  }
}

/**
 * Combined state of an async operation, as exposed by commands.
 */
export interface AsyncState<T> {
  /** Last successful result, or the initial value */
  data: T;
  isLoading: boolean;
  /** Failure of the latest run; cleared when a new run starts */
  error: Error | null;
}
