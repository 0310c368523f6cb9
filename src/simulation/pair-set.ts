/**
 * Deduplicated collection of request/response pairs
 */
import type { RequestResponsePair } from "../types.js";

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, nested]) => [key, sortKeys(nested)])
    );
  }
  return value;
}

/**
 * JSON serialization with object keys sorted; arrays keep their order
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

/**
 * Structural equality of two pairs (object key order ignored)
 */
export function pairsEqual(a: RequestResponsePair, b: RequestResponsePair): boolean {
  return canonicalize(a) === canonicalize(b);
}

/**
 * Set of pairs under structural equality. Adding a pair equal to one already
 * present is a no-op; iteration follows first insertion.
 */
export class RequestResponsePairSet implements Iterable<RequestResponsePair> {
  private readonly pairs = new Map<string, RequestResponsePair>();

  constructor(pairs: Iterable<RequestResponsePair> = []) {
    for (const pair of pairs) {
      this.add(pair);
    }
  }

  /**
   * @returns true if the pair was not already present
   */
  add(pair: RequestResponsePair): boolean {
    const key = canonicalize(pair);
    if (this.pairs.has(key)) {
      return false;
    }
    this.pairs.set(key, pair);
    return true;
  }

  has(pair: RequestResponsePair): boolean {
    return this.pairs.has(canonicalize(pair));
  }

  get size(): number {
    return this.pairs.size;
  }

  values(): RequestResponsePair[] {
    return Array.from(this.pairs.values());
  }

  [Symbol.iterator](): Iterator<RequestResponsePair> {
    return this.pairs.values();
  }
}
