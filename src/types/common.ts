/**
 * Common type definitions shared across layers.
 */

/**
 * Validation messages keyed by field name. Errors that do not belong to a
 * single field are reported under `non_field_errors`.
 */
export type FieldErrors = Record<string, string[]>;

/**
 * Key used for errors that concern the request body as a whole.
 */
export const NON_FIELD_ERRORS = 'non_field_errors';

/**
 * Outcome of validating a candidate value.
 */
export type ValidationOutcome<T> =
  | { valid: true; value: T }
  | { valid: false; errors: FieldErrors };
