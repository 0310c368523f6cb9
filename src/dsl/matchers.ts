/**
 * Matcher factories used throughout the DSL
 *
 * @example
 * ```typescript
 * service("https://api.example.com")
 *   .get(startsWith("/api/bookings/"))
 *   .queryParam("page", any())
 *   .willReturn(success());
 * ```
 */
import type { MatcherInput, RequestFieldMatcher } from "../types.js";
import {
  exactlyMatches,
  globMatches,
  jsonMatches,
  regexMatches,
} from "./field-matcher.js";

/**
 * Exact match on the given value
 */
export function equalsTo(value: string): RequestFieldMatcher {
  return { pattern: value, fieldMatcher: exactlyMatches(value) };
}

/**
 * Glob match; `*` matches zero or more characters
 */
export function matches(glob: string): RequestFieldMatcher {
  return { pattern: glob, fieldMatcher: globMatches(glob) };
}

export function startsWith(prefix: string): RequestFieldMatcher {
  return matches(`${prefix}*`);
}

export function endsWith(suffix: string): RequestFieldMatcher {
  return matches(`*${suffix}`);
}

export function contains(fragment: string): RequestFieldMatcher {
  return matches(`*${fragment}*`);
}

/**
 * Match any value (glob `*`)
 */
export function any(): RequestFieldMatcher {
  return matches("*");
}

/**
 * Regular expression match
 */
export function matchesRegex(pattern: string): RequestFieldMatcher {
  return { pattern, fieldMatcher: regexMatches(pattern) };
}

/**
 * Structural JSON match; non-string values are serialized first
 */
export function equalsToJson(value: unknown): RequestFieldMatcher {
  const json = typeof value === "string" ? value : JSON.stringify(value);
  return { pattern: json, fieldMatcher: jsonMatches(json) };
}

/**
 * Lift a DSL argument to a matcher; strings become exact matches
 */
export function toRequestFieldMatcher(input: MatcherInput): RequestFieldMatcher {
  return typeof input === "string" ? equalsTo(input) : input;
}
