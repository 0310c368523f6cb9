/**
 * Ordered multimap of query parameter matchers and its query string encoding
 */
import type { FieldMatcher, RequestFieldMatcher } from "../types.js";
import { formEncode } from "../utils/encoding.js";
import { exactlyMatches, globMatches } from "./field-matcher.js";

interface Entry<K, V> {
  key: K;
  values: V[];
}

/**
 * Multimap preserving first-insertion order of keys and call order of values.
 *
 * Keys are compared with `keyOf`, so two structurally equal matchers share
 * one entry.
 */
export class QueryParamMultimap<K, V> {
  private readonly elements = new Map<string, Entry<K, V>>();

  constructor(private readonly keyOf: (key: K) => string) {}

  add(key: K, value: V): void {
    const id = this.keyOf(key);
    const entry = this.elements.get(id);
    if (entry) {
      entry.values.push(value);
    } else {
      this.elements.set(id, { key, values: [value] });
    }
  }

  isEmpty(): boolean {
    return this.elements.size === 0;
  }

  clear(): void {
    this.elements.clear();
  }

  /**
   * Entries in key insertion order; value arrays are copies
   */
  entries(): [K, V[]][] {
    return Array.from(this.elements.values(), ({ key, values }) => [key, [...values]]);
  }
}

/**
 * Multimap keyed by request field matchers
 */
export type QueryMatcherMultimap = QueryParamMultimap<RequestFieldMatcher, RequestFieldMatcher>;

export function createQueryMatcherMultimap(): QueryMatcherMultimap {
  return new QueryParamMultimap((key) => `${key.fieldMatcher.kind}:${key.pattern}`);
}

/**
 * Join every `key=value` pair with `&`, keys in insertion order and values in
 * call order, form-encoding both sides
 *
 * @example
 * ```typescript
 * // queryParam("tag", "a", "b")
 * encodeQuery(params); // "tag=a&tag=b"
 * ```
 */
export function encodeQuery(params: QueryMatcherMultimap): string {
  return params
    .entries()
    .flatMap(([key, values]) =>
      values.map((value) => `${formEncode(key.pattern)}=${formEncode(value.pattern)}`)
    )
    .join("&");
}

/**
 * Compose the query matcher. A single fuzzy key or value turns the whole
 * encoded string into a glob.
 */
export function buildQueryMatcher(params: QueryMatcherMultimap, fuzzy: boolean): FieldMatcher {
  const query = encodeQuery(params);
  return fuzzy ? globMatches(query) : exactlyMatches(query);
}
