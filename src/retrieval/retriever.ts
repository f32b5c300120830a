import { createChildLogger } from "../utils/logger.js";
import { parseUnifiedDiff } from "../utils/diff-parser.js";
import { withTimeout } from "../utils/abort.js";
import { EngineError, RetrievalUnavailable, describeError } from "../errors.js";
import type { ContextChunk } from "../review/types.js";
import { chunkDiff } from "./chunker.js";
import type { IndexHit, SearchOutcome, SimilarityIndex } from "./types.js";

const log = createChildLogger({ module: "retriever" });

export interface RetrieverOptions {
  timeoutMs: number;
  maxChunkLines: number;
}

/**
 * Turns a diff into ranked repository context. One attempt per call; a
 * timeout or unavailable index surfaces as `RetrievalUnavailable` so the
 * caller can continue without context.
 */
export class ContextRetriever {
  constructor(
    private readonly index: SimilarityIndex | null,
    private readonly opts: RetrieverOptions
  ) {}

  get enabled(): boolean {
    return this.index !== null;
  }

  async retrieve(
    diff: string,
    filePaths: string[],
    repositoryRef: string,
    k: number,
    signal?: AbortSignal
  ): Promise<ContextChunk[]> {
    const index = this.index;
    if (!index || k <= 0) return [];

    const queries = chunkDiff(parseUnifiedDiff(diff, filePaths), this.opts.maxChunkLines);
    if (queries.length === 0) return [];

    let outcome: SearchOutcome;
    try {
      outcome = await withTimeout(
        (s) => index.search(queries, repositoryRef, k, s),
        this.opts.timeoutMs,
        () => new RetrievalUnavailable(`Similarity search timed out after ${this.opts.timeoutMs}ms`),
        signal
      );
    } catch (err) {
      if (signal?.aborted || err instanceof RetrievalUnavailable) throw err;
      // a throwing index counts as unavailable
      throw new RetrievalUnavailable(describeError(err), {
        cause: err instanceof EngineError ? err.code : undefined,
      });
    }

    if (outcome.status === "unavailable") {
      throw new RetrievalUnavailable(`Similarity index unavailable: ${outcome.reason}`);
    }

    const chunks = rankHits(outcome.hits, k);
    log.debug({ repositoryRef, queries: queries.length, hits: outcome.hits.length, kept: chunks.length }, "Retrieved context");
    return chunks;
  }
}

/**
 * Clamp scores to [0, 1], collapse hits for the same source range keeping
 * the best score, order by relevance then location, and keep the top `k`.
 */
export function rankHits(hits: IndexHit[], k: number): ContextChunk[] {
  const best = new Map<string, ContextChunk>();

  for (const hit of hits) {
    const relevance = Number.isFinite(hit.score) ? Math.min(1, Math.max(0, hit.score)) : 0;
    const key = `${hit.path}:${hit.startLine}-${hit.endLine}`;
    const existing = best.get(key);
    if (!existing || relevance > existing.relevance) {
      best.set(key, {
        path: hit.path,
        startLine: hit.startLine,
        endLine: hit.endLine,
        text: hit.text,
        relevance,
        origin: hit.origin,
      });
    }
  }

  return [...best.values()]
    .sort(
      (a, b) =>
        b.relevance - a.relevance ||
        a.path.localeCompare(b.path) ||
        a.startLine - b.startLine
    )
    .slice(0, Math.max(0, k));
}
