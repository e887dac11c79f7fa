/**
 * JSON Document Parser
 *
 * Parses JSON text into the generic tree the normalizer consumes.
 */

import { ParseError } from '../core/errors';

/**
 * Parse a JSON string into a JavaScript value.
 * Handles common edge cases like BOM markers, trailing commas (lenient mode).
 */
export function parseJson(input: string, source = '(input)'): unknown {
  // Remove BOM if present
  let cleaned = input.trim();
  if (cleaned.charCodeAt(0) === 0xfeff) {
    cleaned = cleaned.substring(1);
  }

  try {
    return JSON.parse(cleaned);
  } catch (error) {
    // Try lenient parsing: strip trailing commas
    try {
      const lenient = cleaned.replace(/,\s*([\]}])/g, '$1');
      return JSON.parse(lenient);
    } catch {
      throw new ParseError(
        source,
        `Failed to parse JSON: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}

/**
 * Check if a string looks like a JSON document.
 */
export function isJson(input: string): boolean {
  const trimmed = input.replace(/^\uFEFF/, '').trim();
  return (
    (trimmed.startsWith('{') && trimmed.endsWith('}')) ||
    (trimmed.startsWith('[') && trimmed.endsWith(']'))
  );
}
