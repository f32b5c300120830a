import { createHash } from "node:crypto";
import type { ContextChunk } from "../review/types.js";
import { createChildLogger } from "../utils/logger.js";
import type { ModelTier } from "./types.js";

const log = createChildLogger({ module: "response-cache" });

/** A memoized model response */
export interface CacheEntry {
  text: string;
  modelId: string;
  /** USD spent producing the response */
  cost: number;
  /** Epoch ms */
  createdAt: number;
}

export interface CacheStore {
  get(fingerprint: string): Promise<CacheEntry | undefined>;
  put(fingerprint: string, entry: CacheEntry, ttlMs: number): Promise<void>;
}

export type Clock = () => number;

/**
 * In-process store. An entry is never returned at or past its expiry; past
 * `maxEntries` the least recently written entries are dropped.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, { entry: CacheEntry; expiresAt: number }>();

  constructor(
    private readonly now: Clock = Date.now,
    private readonly maxEntries = 10_000
  ) {}

  async get(fingerprint: string): Promise<CacheEntry | undefined> {
    const slot = this.entries.get(fingerprint);
    if (!slot) return undefined;
    if (this.now() >= slot.expiresAt) {
      this.entries.delete(fingerprint);
      return undefined;
    }
    return slot.entry;
  }

  async put(fingerprint: string, entry: CacheEntry, ttlMs: number): Promise<void> {
    const now = this.now();
    for (const [key, slot] of this.entries) {
      if (now >= slot.expiresAt) this.entries.delete(key);
    }
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, { entry, expiresAt: now + ttlMs });

    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** 0 when there have been no lookups */
  hitRate: number;
}

/**
 * Counts hits and misses over a `CacheStore`. Store failures are treated as
 * misses (reads) or dropped writes, and logged.
 */
export class ResponseCache {
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly store: CacheStore,
    private readonly ttlMs: number,
    private readonly now: Clock = Date.now
  ) {}

  async lookup(fingerprint: string): Promise<CacheEntry | undefined> {
    let entry: CacheEntry | undefined;
    try {
      entry = await this.store.get(fingerprint);
    } catch (err) {
      log.warn({ err }, "Cache read failed, treating as miss");
      entry = undefined;
    }
    if (entry) this.hits++;
    else this.misses++;
    log.debug({ fingerprint: fingerprint.slice(0, 12), hit: Boolean(entry) }, "Cache lookup");
    return entry;
  }

  async save(fingerprint: string, value: Omit<CacheEntry, "createdAt">): Promise<void> {
    try {
      await this.store.put(fingerprint, { ...value, createdAt: this.now() }, this.ttlMs);
    } catch (err) {
      log.warn({ err }, "Cache write failed");
    }
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return { hits: this.hits, misses: this.misses, hitRate: total === 0 ? 0 : this.hits / total };
  }
}

/** Line endings unified, trailing whitespace dropped */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/\s+$/, ""))
    .join("\n")
    .replace(/\n+$/, "");
}

export function fingerprint(
  tier: ModelTier,
  templateVersion: string,
  diff: string,
  context: readonly ContextChunk[],
  instructions = ""
): string {
  const content = createHash("sha256");
  content.update(normalizeText(diff));
  content.update(`\0${normalizeText(instructions)}`);
  for (const chunk of context) {
    content.update(`\0${chunk.path}:${chunk.startLine}-${chunk.endLine}\0${normalizeText(chunk.text)}`);
  }
  return createHash("sha256")
    .update(`${tier}\0${templateVersion}\0${content.digest("hex")}`)
    .digest("hex");
}
