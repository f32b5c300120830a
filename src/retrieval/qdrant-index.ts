import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import { z } from "zod";
import { createChildLogger } from "../utils/logger.js";
import { describeError } from "../errors.js";
import { embedText, VECTOR_SIZE } from "./embedding.js";
import type { ContextWriter, IndexHit, IndexedChunk, QueryChunk, SearchOutcome, SimilarityIndex } from "./types.js";

const log = createChildLogger({ module: "qdrant-index" });

const payloadSchema = z.object({
  repo: z.string(),
  path: z.string(),
  startLine: z.number().int(),
  endLine: z.number().int(),
  text: z.string(),
  origin: z.enum(["code", "doc", "history"]).default("code"),
});

/** Similarity index over chunks stored in a Qdrant collection, scoped by repository */
export class QdrantSimilarityIndex implements SimilarityIndex, ContextWriter {
  private readonly client: QdrantClient;

  constructor(url: string, private readonly collection: string) {
    this.client = new QdrantClient({ url });
  }

  async ensureCollection(): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === this.collection);
    if (!exists) {
      await this.client.createCollection(this.collection, {
        vectors: { size: VECTOR_SIZE, distance: "Cosine" },
      });
      log.info({ collection: this.collection }, "Created Qdrant collection");
    }
  }

  async upsert(repositoryRef: string, chunks: IndexedChunk[]): Promise<void> {
    if (chunks.length === 0) return;
    await this.client.upsert(this.collection, {
      wait: true,
      points: chunks.map((chunk) => ({
        id: pointId(repositoryRef, chunk),
        vector: embedText(chunk.text),
        payload: { repo: repositoryRef, ...chunk },
      })),
    });
    log.info({ repositoryRef, chunks: chunks.length }, "Context chunks indexed");
  }

  async search(
    queries: QueryChunk[],
    repositoryRef: string,
    k: number,
    signal?: AbortSignal
  ): Promise<SearchOutcome> {
    const hits: IndexHit[] = [];
    try {
      for (const query of queries) {
        if (signal?.aborted) return { status: "unavailable", reason: "aborted" };
        const results = await this.client.search(this.collection, {
          vector: embedText(query.text),
          limit: k,
          filter: { must: [{ key: "repo", match: { value: repositoryRef } }] },
          with_payload: true,
        });
        for (const r of results) {
          const parsed = payloadSchema.safeParse(r.payload);
          if (!parsed.success) continue;
          const { repo: _repo, ...chunk } = parsed.data;
          hits.push({ ...chunk, score: r.score });
        }
      }
    } catch (err) {
      log.warn({ err, collection: this.collection }, "Qdrant search failed");
      return { status: "unavailable", reason: describeError(err) };
    }
    return { status: "ok", hits };
  }
}

// Qdrant point ids must be unsigned integers or UUIDs
function pointId(repositoryRef: string, chunk: IndexedChunk): string {
  const hex = createHash("sha256")
    .update(`${repositoryRef}\0${chunk.path}\0${chunk.startLine}\0${chunk.endLine}`)
    .digest("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}
