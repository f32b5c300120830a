import type { ContextChunk } from "../review/types.js";

/** A bounded unit of the diff used as a similarity query */
export interface QueryChunk {
  path: string;
  startLine: number;
  endLine: number;
  text: string;
}

/** A chunk as stored in the index, before it is scored against a query */
export type IndexedChunk = Omit<ContextChunk, "relevance">;

export type IndexHit = IndexedChunk & { score: number };

export type SearchOutcome =
  | { status: "ok"; hits: IndexHit[] }
  | { status: "unavailable"; reason: string };

/**
 * Similarity-search collaborator. Failures are reported as an
 * `unavailable` outcome rather than thrown.
 */
export interface SimilarityIndex {
  search(
    queries: QueryChunk[],
    repositoryRef: string,
    k: number,
    signal?: AbortSignal
  ): Promise<SearchOutcome>;
}

/** Feeds repository context into the index that `SimilarityIndex` searches */
export interface ContextWriter {
  upsert(repositoryRef: string, chunks: IndexedChunk[]): Promise<void>;
}
