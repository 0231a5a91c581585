/**
 * A Result type for explicit, type-safe error handling.
 *
 * Used where failure is an expected outcome (validating configuration)
 * rather than a broken contract, which throws instead.
 *
 * @example
 * ```typescript
 * const queue = buildSchedulerConfig(input)
 *   .map((config) => new UpdateQueue(config))
 *   .getOrThrow();
 * ```
 */
export class Result<T, E> {
  private constructor(
    private readonly _state:
      | { readonly ok: true; readonly value: T }
      | { readonly ok: false; readonly error: E },
  ) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Create a Result from a nullable value.
   */
  static fromNullable<T, E>(
    value: T | null | undefined,
    error: E,
  ): Result<T, E> {
    return value != null ? Result.ok(value) : Result.err(error);
  }

  isOk(): boolean {
    return this._state.ok;
  }

  isErr(): boolean {
    return !this._state.ok;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    const state = this._state;
    return state.ok ? Result.ok(fn(state.value)) : Result.err(state.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    const state = this._state;
    return state.ok ? Result.ok(state.value) : Result.err(fn(state.error));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    const state = this._state;
    return state.ok ? fn(state.value) : Result.err(state.error);
  }

  getOrElse(defaultValue: T): T {
    const state = this._state;
    return state.ok ? state.value : defaultValue;
  }

  /**
   * Unwrap the value, throwing the stored error on failure.
   */
  getOrThrow(): T {
    const state = this._state;
    if (state.ok) {
      return state.value;
    }
    throw state.error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    const state = this._state;
    return state.ok ? onOk(state.value) : onErr(state.error);
  }

  get success(): boolean {
    return this._state.ok;
  }

  get value(): T {
    const state = this._state;
    if (!state.ok) {
      throw new Error("Cannot access value of Err Result");
    }
    return state.value;
  }

  get error(): E {
    const state = this._state;
    if (state.ok) {
      throw new Error("Cannot access error of Ok Result");
    }
    return state.error;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
