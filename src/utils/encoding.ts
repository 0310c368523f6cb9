/**
 * Query string encoding
 *
 * @module utils/encoding
 */
import { QueryEncodingError } from "../errors.js";

/**
 * Characters left alone by encodeURIComponent but escaped by form encoding
 */
const EXTRA_RESERVED = /[!'()~]/g;

/**
 * Form-encode a query component as UTF-8.
 *
 * Only `A-Z a-z 0-9 . - * _` pass through unchanged; a space becomes `%20`
 * rather than `+`. Keeping `*` literal lets glob patterns survive encoding.
 *
 * @throws {QueryEncodingError} If the input is not valid UTF-16 (lone surrogate)
 *
 * @example
 * ```typescript
 * formEncode("a b+c");   // "a%20b%2Bc"
 * formEncode("user*");   // "user*"
 * ```
 */
export function formEncode(input: string): string {
  let encoded: string;
  try {
    encoded = encodeURIComponent(input);
  } catch (error) {
    if (error instanceof URIError) {
      throw new QueryEncodingError(input);
    }
    throw error;
  }

  return encoded.replace(
    EXTRA_RESERVED,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}
