/**
 * Core types for cqlgen
 */

// Result type for predictable errors
export type Result<T, E = Error> =
  | { success: true; value: T }
  | { success: false; error: E };

export * from './generated-code.js';
