/**
 * Shared Type Definitions
 */

/**
 * Result of a validation operation
 */
export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** Human-readable error message if invalid */
  error?: string;
  /** Set when the input is well-formed but reserved for the service itself */
  reserved?: boolean;
}

/**
 * Outcome of destination validation; a valid destination carries the
 * normalized URL to store
 */
export type DestinationValidation = { valid: true; href: string } | { valid: false; error: string };

/**
 * Source of candidate short codes
 */
export interface CodeGenerator {
  generate(): string;
}
