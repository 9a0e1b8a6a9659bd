/**
 * API request type definitions
 */

/**
 * Outcome of required-field validation; a valid result carries the narrowed body
 */
export type ValidationResult =
  | { valid: true; body: Record<string, unknown> }
  | { valid: false; message: string };
