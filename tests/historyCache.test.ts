import { HistoryCache } from "../src/infrastructure/queue/HistoryCache.js";

describe("HistoryCache", () => {
  test("should evict the oldest entry beyond capacity", () => {
    const cache = new HistoryCache<number>(2);
    expect(cache.add("a", 1)).toEqual([]);
    expect(cache.add("b", 2)).toEqual([]);
    expect(cache.add("c", 3)).toEqual(["a"]);

    expect(cache.has("a")).toBe(false);
    expect(cache.get("a")).toBeNull();
    expect(cache.keys()).toEqual(["b", "c"]);
    expect(cache.size).toBe(2);
  });

  test("should move a re-added key to the newest position", () => {
    const cache = new HistoryCache<string>(3);
    cache.add("a", "first");
    cache.add("b", "second");
    cache.add("a", "again");

    expect(cache.keys()).toEqual(["b", "a"]);
    expect(cache.get("a")).toBe("again");

    // "b" is now the oldest and goes first
    cache.add("c", "third");
    cache.add("d", "fourth");
    expect(cache.keys()).toEqual(["a", "c", "d"]);
  });

  test("should list most recent first", () => {
    const cache = new HistoryCache<number>(5);
    cache.add("a", 1);
    cache.add("b", 2);
    cache.add("c", 3);

    expect(cache.recent()).toEqual([3, 2, 1]);
    expect(cache.recent(2)).toEqual([3, 2]);
    expect(cache.recent(-1)).toEqual([3, 2, 1]);
    expect(cache.recent(10)).toEqual([3, 2, 1]);
  });

  test("should clear all entries", () => {
    const cache = new HistoryCache<number>();
    cache.add("a", 1);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.capacity).toBe(20);
  });

  test("should reject a capacity below one", () => {
    expect(() => new HistoryCache<number>(0)).toThrow(RangeError);
  });
});
