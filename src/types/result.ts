/**
 * Result Type
 *
 * Lookups that can legitimately miss (unknown key, rejected coordinates)
 * return a Result<T, E> instead of throwing, so callers decide whether the
 * miss matters.
 *
 * @example
 * ```typescript
 * const cell = grid.cellOf('ORY')
 * if (isOk(cell)) {
 *   console.log(cell.value) // 'u09t'
 * } else {
 *   console.log(cell.error.code) // 'KEY_NOT_FOUND'
 * }
 * ```
 */

/**
 * Either a success carrying `value` or a failure carrying `error`.
 *
 * @typeParam T - The type of the success value
 * @typeParam E - The type of the error (defaults to Error)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Creates a successful Result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

/**
 * Creates a failed Result.
 */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error })

/**
 * Narrows a Result to its success branch.
 */
export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok === true
}

/**
 * Narrows a Result to its failure branch.
 */
export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return result.ok === false
}

/**
 * Returns the value of an Ok result, or throws its error.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value
  }
  throw result.error
}

/**
 * Returns the value of an Ok result, or `defaultValue` for an Err.
 */
export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return isOk(result) ? result.value : defaultValue
}

/**
 * Converts a Result into an optional value, returning undefined for Err.
 */
export function toOption<T, E>(result: Result<T, E>): T | undefined {
  return isOk(result) ? result.value : undefined
}
