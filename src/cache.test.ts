import { describe, expect, it } from "vitest";
import { LruCache } from "./cache.js";

describe("LruCache", () => {
  it("evicts the least recently used key past capacity", () => {
    const cache = new LruCache<number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.set("c", 3);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.get("b")?.value).toBe(2);
    expect(cache.get("c")?.value).toBe(3);
  });

  it("refreshes recency on read", () => {
    const cache = new LruCache<string>(2);
    cache.set("a", "x");
    cache.set("b", "y");
    cache.get("a");
    cache.set("c", "z");
    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")?.value).toBe("x");
  });

  it("stores falsy values as hits", () => {
    const cache = new LruCache<string>();
    cache.set("empty", "");
    expect(cache.get("empty")).toEqual({ value: "" });
    expect(cache.get("missing")).toBeUndefined();
  });

  it("defaults to 128 entries and never goes below one", () => {
    expect(new LruCache().capacity).toBe(128);
    expect(new LruCache(0).capacity).toBe(1);
  });
});
