/**
 * Success result with data.
 */
export interface SuccessResult<T> {
  success: true;
  data: T;
}

/**
 * Failure result with error details.
 */
export interface FailureResult<E> {
  success: false;
  error: E;
}

/**
 * Outcome of an operation that can fail in an expected way.
 * Callers branch on `success` instead of catching.
 *
 * @example
 * const result = playlists.create('Road Trip');
 * if (!result.success) {
 *   renderer.failure(result.error);
 *   return;
 * }
 */
export type Result<T, E> = SuccessResult<T> | FailureResult<E>;

/**
 * Helper functions for creating Result values.
 */
export const Result = {
  ok<T>(data: T): SuccessResult<T> {
    return { success: true, data };
  },

  fail<E>(error: E): FailureResult<E> {
    return { success: false, error };
  },
};
