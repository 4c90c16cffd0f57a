import { toError, type AsyncState, type Command } from '@tidewatch/core';
import { readable, type Readable } from 'svelte/store';
import { fromValue } from './from-value.js';

/**
 * Store view of a synchronizer {@link Command}
 */
export interface CommandStore<TParam, TResult> extends Readable<AsyncState<TResult>> {
  /** Run the command; rejects with the recorded error */
  execute: (param: TParam) => Promise<TResult>;
  isExecuting: Readable<boolean>;
  error: Readable<Error | null>;
  resetError: () => void;
}

/**
 * Command store options
 */
export interface CommandStoreOptions<TResult> {
  /** Called after a successful run */
  onSuccess?: (result: TResult) => void;
  /** Called after a failed run, before the rejection reaches the caller */
  onError?: (error: Error) => void;
}

/**
 * Wrap a command in a store of its combined state.
 *
 * @example
 * ```svelte
 * <script>
 * import { commandStore } from '@tidewatch/svelte';
 *
 * const save = commandStore(settingsSync.write, {
 *   onError: (error) => toast(error.message),
 * });
 * </script>
 *
 * <button disabled={$save.isLoading} on:click={() => save.execute({ model })}>Save</button>
 * ```
 */
export function commandStore<TParam, TResult>(
  command: Command<TParam, TResult>,
  options: CommandStoreOptions<TResult> = {}
): CommandStore<TParam, TResult> {
  const state = readable<AsyncState<TResult>>(command.state, (set) => {
    const subscription = command.stateObservable().subscribe(set);
    return () => subscription.unsubscribe();
  });

  const execute = async (param: TParam): Promise<TResult> => {
    try {
      const result = await command.execute(param);
      options.onSuccess?.(result);
      return result;
    } catch (error) {
      const err = toError(error);
      options.onError?.(err);
      throw err;
    }
  };

  return {
    subscribe: state.subscribe,
    execute,
    isExecuting: fromValue(command.isExecuting),
    error: fromValue(command.error),
    resetError: () => command.resetError(),
  };
}
