/**
 * Unified result type for all operations that can fail.
 *
 * @example
 * ```typescript
 * const located = await locator.locateForSelection(root);
 * if (located.success) {
 *   console.log(located.value.projects.length); // TypeScript knows 'value' exists
 * } else {
 *   console.error(located.error.message); // TypeScript knows 'error' exists
 * }
 * ```
 */

export type Result<T, E = AppError> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

/**
 * Unified error type for all application errors.
 * Discriminated union of all possible error scenarios.
 */
export type AppError =
  | { readonly code: 'DirectoryNotFound'; readonly message: string; readonly directory: string }
  | { readonly code: 'NoProjectsFound'; readonly message: string; readonly directory: string }
  | { readonly code: 'FileOpenError'; readonly message: string; readonly filePath: string; readonly cause?: unknown }
  | { readonly code: 'Validation'; readonly message: string; readonly field?: string }
  | { readonly code: 'ParseError'; readonly message: string; readonly raw?: unknown }
  | { readonly code: 'Cancelled'; readonly message: string }
  | { readonly code: 'Unknown'; readonly message: string; readonly cause?: unknown };

export type AppErrorCode = AppError['code'];

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a successful result.
 */
export const ok = <T>(value: T): Result<T, never> => ({ success: true, value });

/**
 * Create a failed result.
 */
export const fail = <E = AppError>(error: E): Result<never, E> => ({ success: false, error });

// ============================================================================
// Combinators
// ============================================================================

/**
 * Map the success value of a result.
 * Errors pass through unchanged.
 */
export const mapResult = <T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> =>
  result.success ? ok(fn(result.value)) : result;

/**
 * Flat-map (chain) results.
 * Errors pass through unchanged.
 */
export const flatMapResult = <T, U, E>(result: Result<T, E>, fn: (value: T) => Result<U, E>): Result<U, E> =>
  result.success ? fn(result.value) : result;

/**
 * Provide a default value if result is error.
 */
export const unwrapOr = <T, E>(result: Result<T, E>, defaultValue: T): T =>
  result.success ? result.value : defaultValue;

/**
 * Normalize anything caught into an `Unknown` application error.
 */
export const toUnknownError = (cause: unknown): AppError => ({
  code: 'Unknown',
  message: cause instanceof Error ? cause.message : String(cause),
  cause,
});
