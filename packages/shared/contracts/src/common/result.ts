// =============================================================================
// RESULT TYPE (for distinguishing "no data" from errors)
// =============================================================================

/**
 * Error kinds for analysis operations.
 * Lets callers tell an expected gap in the data apart from bad input or a
 * failing data source.
 */
export const ANALYSIS_ERROR_KIND = {
  INSUFFICIENT_DATA: 'INSUFFICIENT_DATA',
  INVALID_INPUT: 'INVALID_INPUT',
  UPSTREAM_FAILURE: 'UPSTREAM_FAILURE',
} as const;

export type AnalysisErrorKind = (typeof ANALYSIS_ERROR_KIND)[keyof typeof ANALYSIS_ERROR_KIND];

export interface AnalysisError {
  code: AnalysisErrorKind;
  message: string;
  cause?: unknown;
}

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
export interface FailureResult {
  success: false;
  error: AnalysisError;
}

/**
 * Result type returned by single-result analysis operations.
 *
 * @example
 * const forecast = await forecaster.forecastLinear(clientId, 'organic_clicks');
 * if (!forecast.success) {
 *   // INSUFFICIENT_DATA: omit the section and keep assembling the report
 *   logger.debug('Forecast skipped', { error: forecast.error });
 *   return null;
 * }
 * return forecast.data;
 */
export type Result<T> = SuccessResult<T> | FailureResult;

/**
 * Helper functions for creating Result values.
 */
export const Result = {
  ok<T>(data: T): SuccessResult<T> {
    return { success: true, data };
  },

  fail(code: AnalysisErrorKind, message: string, cause?: unknown): FailureResult {
    return {
      success: false,
      error: cause === undefined ? { code, message } : { code, message, cause },
    };
  },

  isOk<T>(result: Result<T>): result is SuccessResult<T> {
    return result.success;
  },

  isFail<T>(result: Result<T>): result is FailureResult {
    return !result.success;
  },

  /**
   * Unwrap a result or throw an error.
   * Use when you want to convert back to exception-based handling.
   */
  unwrap<T>(result: Result<T>): T {
    if (result.success) {
      return result.data;
    }
    throw new Error(`${result.error.code}: ${result.error.message}`);
  },

  unwrapOr<T>(result: Result<T>, defaultValue: T): T {
    return result.success ? result.data : defaultValue;
  },

  /**
   * Transform the data of a successful result; failures pass through.
   */
  map<T, U>(result: Result<T>, fn: (data: T) => U): Result<U> {
    return result.success ? Result.ok(fn(result.data)) : result;
  },
};
