/**
 * Short Code Generation Module
 *
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ RESPONSIBILITIES                                                        │
 * ├─────────────────────────────────────────────────────────────────────────┤
 * │ 1. GENERATION  - Random codes over the unambiguous alphabet            │
 * │ 2. VALIDATION  - Format and reserved-code checks                       │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * Strategy: Random, fixed length
 * - Length: 6 characters (58^6 = ~38 billion combinations)
 * - Alphabet: letters and digits without 0, O, I, l
 * - Collision handling lives with the caller: existence check, then an
 *   insert guarded by the store's unique constraint.
 */

import { randomInt } from "node:crypto";
import { SHORTCODE_CONFIG, RESERVED_CODES } from "../constants/index.js";
import type { CodeGenerator, ValidationResult } from "../types/index.js";

// =============================================================================
// SECTION 1: GENERATION
// =============================================================================

/**
 * Generate a random short code.
 *
 * `randomInt` draws without modulo bias, so every alphabet character is
 * equally likely at every position.
 *
 * @example
 * ```ts
 * generateRandomCode();   // "aB3xY9"
 * generateRandomCode(8);  // "aB3xY9kM"
 * ```
 */
export function generateRandomCode(
  length: number = SHORTCODE_CONFIG.DEFAULT_LENGTH,
  alphabet: string = SHORTCODE_CONFIG.ALPHABET
): string {
  let code = "";
  for (let i = 0; i < length; i++) {
    code += alphabet[randomInt(alphabet.length)];
  }
  return code;
}

export interface RandomCodeGeneratorOptions {
  length?: number;
  alphabet?: string;
}

/**
 * Default CodeGenerator: fixed-length random draws.
 */
export class RandomCodeGenerator implements CodeGenerator {
  readonly length: number;
  readonly alphabet: string;

  constructor(options: RandomCodeGeneratorOptions = {}) {
    const { length = SHORTCODE_CONFIG.DEFAULT_LENGTH, alphabet = SHORTCODE_CONFIG.ALPHABET } = options;
    const { MIN_LENGTH, MAX_LENGTH } = SHORTCODE_CONFIG.CODE;

    if (!Number.isInteger(length) || length < MIN_LENGTH || length > MAX_LENGTH) {
      throw new RangeError(`Code length must be an integer between ${MIN_LENGTH} and ${MAX_LENGTH}`);
    }
    if (alphabet.length < 2 || !SHORTCODE_CONFIG.CODE.PATTERN.test(alphabet)) {
      throw new RangeError("Alphabet must hold at least two characters from [a-zA-Z0-9_-]");
    }

    this.length = length;
    this.alphabet = alphabet;
  }

  generate(): string {
    return generateRandomCode(this.length, this.alphabet);
  }
}

// =============================================================================
// SECTION 2: VALIDATION
// =============================================================================

/**
 * Check if a code is reserved. Case-insensitive exact match.
 */
export function isReservedCode(code: string): boolean {
  return RESERVED_CODES.has(code.toLowerCase());
}

/**
 * Validate a short code, custom or generated.
 *
 * Rules:
 * - Length: 3-50 characters
 * - Characters: a-zA-Z0-9, hyphen (-), underscore (_)
 * - Not a reserved code
 *
 * @example
 * ```ts
 * validateCode("my-link")  // { valid: true }
 * validateCode("ab")       // { valid: false, error: "..." }
 * validateCode("docs")     // { valid: false, reserved: true, error: "..." }
 * ```
 */
export function validateCode(code: string): ValidationResult {
  const { MIN_LENGTH, MAX_LENGTH, PATTERN } = SHORTCODE_CONFIG.CODE;

  if (code.length < MIN_LENGTH) {
    return {
      valid: false,
      error: `Short code must be at least ${MIN_LENGTH} characters`,
    };
  }

  if (code.length > MAX_LENGTH) {
    return {
      valid: false,
      error: `Short code must be at most ${MAX_LENGTH} characters`,
    };
  }

  if (!PATTERN.test(code)) {
    return {
      valid: false,
      error: "Short code can only contain letters, numbers, hyphens, and underscores",
    };
  }

  if (isReservedCode(code)) {
    return {
      valid: false,
      reserved: true,
      error: `Short code "${code}" is reserved and cannot be used`,
    };
  }

  return { valid: true };
}
