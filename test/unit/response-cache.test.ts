import { describe, it, expect } from "vitest";
import { MemoryCacheStore, ResponseCache, fingerprint, normalizeText, type CacheStore } from "../../src/llm/cache.js";
import type { ContextChunk } from "../../src/review/types.js";

const entry = { text: '{"findings": []}', modelId: "m1", cost: 0.01, createdAt: 0 };

describe("MemoryCacheStore", () => {
  it("expires entries at their ttl", async () => {
    let now = 0;
    const store = new MemoryCacheStore(() => now);
    await store.put("k", entry, 100);

    now = 99;
    expect(await store.get("k")).toEqual(entry);

    now = 100;
    expect(await store.get("k")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("sweeps expired entries on write", async () => {
    let now = 0;
    const store = new MemoryCacheStore(() => now);
    await store.put("short", entry, 100);
    await store.put("long", entry, 1_000);

    now = 150;
    await store.put("fresh", entry, 100);

    expect(store.size).toBe(2);
    expect(await store.get("long")).toEqual(entry);
  });

  it("drops the least recently written entries past its capacity", async () => {
    const store = new MemoryCacheStore(() => 0, 2);
    await store.put("a", entry, 1_000);
    await store.put("b", entry, 1_000);
    await store.put("a", { ...entry, text: "rewritten" }, 1_000);
    await store.put("c", entry, 1_000);

    expect(store.size).toBe(2);
    expect(await store.get("b")).toBeUndefined();
    expect(await store.get("a")).toMatchObject({ text: "rewritten" });
    expect(await store.get("c")).toEqual(entry);
  });
});

describe("ResponseCache", () => {
  it("counts hits and misses", async () => {
    const cache = new ResponseCache(new MemoryCacheStore(() => 5), 1_000, () => 5);

    expect(await cache.lookup("fp")).toBeUndefined();
    await cache.save("fp", { text: "ok", modelId: "m1", cost: 0.02 });
    expect(await cache.lookup("fp")).toEqual({ text: "ok", modelId: "m1", cost: 0.02, createdAt: 5 });

    expect(cache.stats()).toEqual({ hits: 1, misses: 1, hitRate: 0.5 });
  });

  it("reports a zero hit rate before any lookup", () => {
    expect(new ResponseCache(new MemoryCacheStore(), 1_000).stats()).toEqual({ hits: 0, misses: 0, hitRate: 0 });
  });

  it("treats a failing store as a miss", async () => {
    const broken: CacheStore = {
      get: () => Promise.reject(new Error("disk full")),
      put: () => Promise.reject(new Error("disk full")),
    };
    const cache = new ResponseCache(broken, 1_000);

    await expect(cache.save("fp", { text: "ok", modelId: "m1", cost: 0 })).resolves.toBeUndefined();
    await expect(cache.lookup("fp")).resolves.toBeUndefined();
    expect(cache.stats().misses).toBe(1);
  });
});

describe("fingerprint", () => {
  const chunk: ContextChunk = { path: "a.ts", startLine: 1, endLine: 3, text: "x", relevance: 0.5, origin: "code" };

  it("ignores line-ending and trailing whitespace differences", () => {
    expect(fingerprint("triage", "2", "a  \r\nb\n\n", [])).toBe(fingerprint("triage", "2", "a\nb", []));
  });

  it("changes with tier, template version and context", () => {
    const base = fingerprint("triage", "2", "diff", []);

    expect(fingerprint("detailed", "2", "diff", [])).not.toBe(base);
    expect(fingerprint("triage", "3", "diff", [])).not.toBe(base);
    expect(fingerprint("triage", "2", "diff", [chunk])).not.toBe(base);
  });

  it("changes with the system instructions", () => {
    const security = fingerprint("detailed", "2", "diff", [], "flagged: security");

    expect(fingerprint("detailed", "2", "diff", [], "flagged: performance")).not.toBe(security);
    expect(fingerprint("detailed", "2", "diff", [], "flagged: security  \r\n")).toBe(security);
  });

  it("ignores relevance scores", () => {
    expect(fingerprint("triage", "2", "diff", [chunk])).toBe(
      fingerprint("triage", "2", "diff", [{ ...chunk, relevance: 0.9 }])
    );
  });
});

describe("normalizeText", () => {
  it("unifies line endings and trims line ends", () => {
    expect(normalizeText("a \r\nb\t\rc\n\n")).toBe("a\nb\nc");
  });
});
