import { beforeEach, describe, expect, it } from "vitest";
import { MemoryCache } from "../src/cache";

describe("MemoryCache", () => {
  let now: number;
  let cache: MemoryCache;

  beforeEach(() => {
    now = 0;
    cache = new MemoryCache(() => now);
  });

  it("should return null for missing keys", async () => {
    expect(await cache.get("missing")).toBeNull();
  });

  it("should return stored values until the TTL elapses", async () => {
    await cache.set("feed:a", { rows: 2 }, 300);

    now = 299_999;
    expect(await cache.get("feed:a")).toEqual({ rows: 2 });

    now = 300_000;
    expect(await cache.get("feed:a")).toBeNull();
  });

  it("should expire each key on its own TTL", async () => {
    await cache.set("short", 1, 10);
    await cache.set("long", 2, 100);

    now = 10_000;
    expect(await cache.get("short")).toBeNull();
    expect(await cache.get("long")).toBe(2);
  });

  it("should replace a value and its expiry on set", async () => {
    await cache.set("a", 1, 10);
    now = 5_000;
    await cache.set("a", 2, 10);

    now = 12_000;
    expect(await cache.get("a")).toBe(2);
  });
});
