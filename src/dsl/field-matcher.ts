/**
 * Field matcher constructors, comparison and (de)serialization
 */
import { isDeepStrictEqual } from "util";
import type { FieldMatcher, FieldMatcherDocument, ValuedFieldMatcher } from "../types.js";

/**
 * Match the literal value only
 */
export function exactlyMatches(value: string): FieldMatcher {
  return { kind: "exact", value };
}

/**
 * Match a glob pattern where `*` stands for zero or more characters
 */
export function globMatches(pattern: string): FieldMatcher {
  return { kind: "glob", value: pattern };
}

/**
 * Alias of {@link globMatches}
 */
export const wildcardMatches = globMatches;

/**
 * Match a regular expression
 */
export function regexMatches(pattern: string): FieldMatcher {
  return { kind: "regex", value: pattern };
}

/**
 * Match a JSON document structurally (key order and whitespace ignored)
 */
export function jsonMatches(json: string): FieldMatcher {
  return { kind: "json", value: json };
}

const BLANK: FieldMatcher = { kind: "blank" };
const ANY: FieldMatcher = { kind: "any" };

/**
 * No constraint supplied: only an empty or absent value matches
 */
export function blankMatcher(): FieldMatcher {
  return BLANK;
}

/**
 * Matches every value, including absence
 */
export function anyMatcher(): FieldMatcher {
  return ANY;
}

/**
 * Narrow to matchers that carry a pattern
 */
export function hasValue(matcher: FieldMatcher): matcher is ValuedFieldMatcher {
  return "value" in matcher;
}

/**
 * True for `exact`; every other kind is fuzzy
 */
export function isExact(matcher: FieldMatcher): boolean {
  return matcher.kind === "exact";
}

/**
 * Structural equality (kind and value)
 */
export function fieldMatcherEquals(a: FieldMatcher, b: FieldMatcher): boolean {
  if (a.kind !== b.kind) {
    return false;
  }
  return !hasValue(a) || !hasValue(b) || a.value === b.value;
}

/**
 * Pattern string of a matcher; `*` for any, empty for blank
 */
export function patternOf(matcher: FieldMatcher): string {
  if (hasValue(matcher)) {
    return matcher.value;
  }
  return matcher.kind === "any" ? "*" : "";
}

/**
 * Regular expression source for a glob: literals escaped, `*` as `.*`, unanchored
 */
export function globToRegexSource(pattern: string): string {
  return pattern
    .split("*")
    .map((literal) => literal.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
}

function globToRegExp(pattern: string): RegExp {
  return new RegExp(`^${globToRegexSource(pattern)}$`, "s");
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/**
 * Evaluate a matcher against a request value.
 *
 * Hoverfly performs the real matching at replay time; this mirrors its
 * semantics so simulations can be checked without a running proxy.
 *
 * @param matcher - Matcher to apply
 * @param value - Request value, `undefined` when the field is absent
 */
export function matchesValue(matcher: FieldMatcher, value: string | undefined): boolean {
  switch (matcher.kind) {
    case "any":
      return true;
    case "blank":
      return value === undefined || value === "";
    case "exact":
      return value === matcher.value;
    case "glob":
      return value !== undefined && globToRegExp(matcher.value).test(value);
    case "regex":
      return value !== undefined && new RegExp(matcher.value).test(value);
    case "json": {
      if (value === undefined) {
        return false;
      }
      const expected = parseJson(matcher.value);
      const actual = parseJson(value);
      return expected.ok && actual.ok && isDeepStrictEqual(expected.value, actual.value);
    }
  }
}

/**
 * Serialize to the simulation document shape (`null` for any, `{}` for blank)
 */
export function toFieldMatcherDocument(matcher: FieldMatcher): FieldMatcherDocument | null {
  switch (matcher.kind) {
    case "any":
      return null;
    case "blank":
      return {};
    case "exact":
      return { exactMatch: matcher.value };
    case "glob":
      return { globMatch: matcher.value };
    case "regex":
      return { regexMatch: matcher.value };
    case "json":
      return { jsonMatch: matcher.value };
  }
}

/**
 * Parse a serialized matcher; the first populated key wins
 */
export function fromFieldMatcherDocument(
  document: FieldMatcherDocument | null | undefined
): FieldMatcher {
  if (document == null) {
    return ANY;
  }
  if (document.exactMatch !== undefined) {
    return exactlyMatches(document.exactMatch);
  }
  if (document.globMatch !== undefined) {
    return globMatches(document.globMatch);
  }
  if (document.regexMatch !== undefined) {
    return regexMatches(document.regexMatch);
  }
  if (document.jsonMatch !== undefined) {
    return jsonMatches(document.jsonMatch);
  }
  return BLANK;
}
