/**
 * Tests for RequestResponsePairSet
 */
import { describe, test, expect } from "vitest";
import { RequestResponsePairSet, canonicalize, pairsEqual } from "../simulation/pair-set.js";
import { service } from "../dsl/stub-service-builder.js";
import { success } from "../dsl/response-builder.js";
import type { RequestResponsePair } from "../types.js";

function pair(path: string, body = "ok"): RequestResponsePair {
  return {
    request: service("localhost").get(path).build(),
    response: success(body).build(),
  };
}

describe("canonicalize", () => {
  test("sorts object keys at every level", () => {
    expect(canonicalize({ b: 1, a: { d: 2, c: 3 } })).toBe('{"a":{"c":3,"d":2},"b":1}');
  });

  test("keeps array order", () => {
    expect(canonicalize({ list: [{ y: 1, x: 2 }, "z"] })).toBe('{"list":[{"x":2,"y":1},"z"]}');
  });
});

describe("pairsEqual", () => {
  test("ignores header insertion order", () => {
    const a = pair("/a");
    const b: RequestResponsePair = {
      request: { ...a.request, headers: { X: ["1"], Y: ["2"] } },
      response: a.response,
    };
    const c: RequestResponsePair = {
      request: { ...a.request, headers: { Y: ["2"], X: ["1"] } },
      response: a.response,
    };
    expect(pairsEqual(b, c)).toBe(true);
  });

  test("detects differing responses", () => {
    expect(pairsEqual(pair("/a", "one"), pair("/a", "two"))).toBe(false);
  });
});

describe("RequestResponsePairSet", () => {
  test("adds distinct pairs in insertion order", () => {
    const set = new RequestResponsePairSet();
    expect(set.add(pair("/a"))).toBe(true);
    expect(set.add(pair("/b"))).toBe(true);

    expect(set.size).toBe(2);
    expect(set.values().map((p) => p.request.path)).toEqual([
      { kind: "exact", value: "/a" },
      { kind: "exact", value: "/b" },
    ]);
  });

  test("ignores a structurally equal pair", () => {
    const set = new RequestResponsePairSet([pair("/a")]);
    expect(set.add(pair("/a"))).toBe(false);
    expect(set.size).toBe(1);
  });

  test("keeps the first of equal pairs", () => {
    const first = pair("/a");
    const set = new RequestResponsePairSet([first, pair("/a")]);
    expect(set.values()[0]).toBe(first);
  });

  test("has() uses structural equality", () => {
    const set = new RequestResponsePairSet([pair("/a")]);
    expect(set.has(pair("/a"))).toBe(true);
    expect(set.has(pair("/b"))).toBe(false);
  });

  test("is iterable", () => {
    const set = new RequestResponsePairSet([pair("/a"), pair("/b")]);
    expect([...set]).toHaveLength(2);
  });

  test("values() returns a copy", () => {
    const set = new RequestResponsePairSet([pair("/a")]);
    set.values().push(pair("/b"));
    expect(set.size).toBe(1);
  });
});
