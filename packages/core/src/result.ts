/**
 * Conversion result types
 *
 * Fallible conversions return a Result<T> rather than throwing, so callers
 * handle the failure branch explicitly.
 */

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error category for conversion failures
 */
export type ConversionErrorCategory = `invalid_length`; // Sequence is not the expected length

/**
 * Error information from a failed conversion
 */
export interface ConversionError {
  /** Error category */
  category: ConversionErrorCategory;
  /** Human-readable error message */
  message: string;
}

// ============================================================================
// Result Types
// ============================================================================

/**
 * Result of a fallible conversion
 *
 * Usage:
 * ```ts
 * const result = tryFromSlice(values);
 * if (result.ok) {
 *   const v = result.value;
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ConversionError };

// ============================================================================
// Result Constructors
// ============================================================================

/**
 * Create a successful result
 */
export function success<T>(value: T): Result<T> {
  return { ok: true, value };
}

/**
 * Create a failed result
 */
export function failure<T>(error: ConversionError): Result<T> {
  return { ok: false, error };
}

/**
 * Create a conversion error
 */
export function createConversionError(
  category: ConversionErrorCategory,
  message: string
): ConversionError {
  return { category, message };
}
