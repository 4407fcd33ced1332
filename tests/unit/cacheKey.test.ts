import { canonicalize, deriveCacheKey, sha256 } from "../../src/shared/hash/cacheKey";

describe("cache keys", () => {
  it("hashes with SHA-256 hex", () => {
    expect(sha256("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
  });

  it("canonicalizes objects with sorted keys and without undefined members", () => {
    expect(canonicalize({ b: 1, a: [2, 1], c: undefined, d: { z: true, y: null } })).toBe(
      '{"a":[2,1],"b":1,"d":{"y":null,"z":true}}'
    );
  });

  it("sorts array members only when unordered", () => {
    expect(canonicalize(["b", "a"], true)).toBe('["a","b"]');
    expect(canonicalize(["b", "a"])).toBe('["b","a"]');
  });

  it("derives the same key regardless of property order", () => {
    const first = deriveCacheKey("result", { itemId: "item-1", target: { name: "t", fields: ["a"] } });
    const second = deriveCacheKey("result", { target: { fields: ["a"], name: "t" }, itemId: "item-1" });

    expect(first).toBe(second);
    expect(first).toMatch(/^[a-f0-9]{64}$/);
  });

  it("separates namespaces", () => {
    expect(deriveCacheKey("query", { q: "x" })).not.toBe(deriveCacheKey("result", { q: "x" }));
  });
});
