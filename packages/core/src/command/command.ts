import { combineLatest, map, type Observable } from 'rxjs';
import { toError } from '../errors/index.js';
import { ObservableValue, type AsyncState } from '../observable/index.js';
import { noopLogger, type Logger } from '../observability/index.js';

/**
 * Options for a {@link Command}
 */
export interface CommandOptions<TResult> {
  /** Value of `result` before the first successful run */
  initialValue: TResult;
  /** Name used in log entries */
  name?: string;
  logger?: Logger;
}

/**
 * An async operation with its own observable pending/success/failure state.
 *
 * Synchronizers expose each write operation as a Command so a UI can bind
 * a button's disabled state to `isExecuting` and an error banner to
 * `error`, independent of the synchronized data itself.
 *
 * `execute` resolves with the result or rejects with the recorded error.
 * Failures are never retried.
 *
 * @typeParam TParam - Parameter type (`void` for parameterless commands)
 * @typeParam TResult - Result type
 *
 * @example
 * ```typescript
 * const save = new Command((model: Note) => ref.set(model.toJson()), { initialValue: undefined });
 *
 * save.isExecuting.subscribe((busy) => (button.disabled = busy));
 * save.error.subscribe((error) => banner.show(error?.message));
 *
 * await save.execute(note);
 * ```
 */
export class Command<TParam, TResult> {
  readonly isExecuting = new ObservableValue<boolean>(false);
  readonly error = new ObservableValue<Error | null>(null);
  readonly result: ObservableValue<TResult>;

  private readonly action: (param: TParam) => Promise<TResult>;
  private readonly name: string;
  private readonly logger: Logger;
  private running = 0;

  constructor(action: (param: TParam) => Promise<TResult>, options: CommandOptions<TResult>) {
    this.action = action;
    this.result = new ObservableValue<TResult>(options.initialValue);
    this.name = options.name ?? 'command';
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Current state as one snapshot.
   */
  get state(): AsyncState<TResult> {
    return {
      data: this.result.value,
      isLoading: this.isExecuting.value,
      error: this.error.value,
    };
  }

  /**
   * Stream of combined state snapshots.
   */
  stateObservable(): Observable<AsyncState<TResult>> {
    return combineLatest([
      this.result.asObservable(),
      this.isExecuting.asObservable(),
      this.error.asObservable(),
    ]).pipe(map(([data, isLoading, error]) => ({ data, isLoading, error })));
  }

  /**
   * Run the command.
   *
   * A synchronous throw from the action is recorded the same way as a
   * rejected promise.
   */
  async execute(param: TParam): Promise<TResult> {
    this.running += 1;
    this.isExecuting.next(true);
    this.error.next(null);

    try {
      const value = await this.action(param);
      this.result.next(value);
      return value;
    } catch (error) {
      const err = toError(error);
      this.logger.warn(`${this.name} failed`, { message: err.message });
      this.error.next(err);
      throw err;
    } finally {
      this.running -= 1;
      if (this.running === 0) {
        this.isExecuting.next(false);
      }
    }
  }

  /** Clear the recorded error */
  resetError(): void {
    this.error.next(null);
  }

  /** Complete every observable of this command */
  destroy(): void {
    this.isExecuting.destroy();
    this.error.destroy();
    this.result.destroy();
  }
}
