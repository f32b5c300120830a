import { describe, it, expect, afterEach } from "vitest";
import { createEngine, type Engine, type EngineOptions } from "../../src/engine.js";
import type { EngineConfig } from "../../src/config-loader/schema.js";
import { DEFAULT_CONFIG } from "../../src/config/defaults.js";
import { ProviderRegistry } from "../../src/llm/providers/registry.js";
import { ReviewConflict, ReviewNotFound } from "../../src/errors.js";
import { MemoryReviewStore } from "../../src/storage/memory-store.js";
import type { StoredSuggestion } from "../../src/storage/types.js";
import type { Review } from "../../src/review/types.js";
import { CREDENTIAL_DIFF, MULTI_FILE_DIFF } from "../fixtures/sample-patch.js";
import { FakeIndex, hangingSearch, unavailableSearch } from "../fixtures/fake-index.js";
import { FakeProvider, replies, hangs, fails, TRIAGE_YES, DETAILED_DB } from "../fixtures/fake-provider.js";

let engine: Engine | null = null;

async function setup(overrides: Partial<EngineConfig> = {}, opts: Omit<EngineOptions, "config"> = {}): Promise<Engine> {
  engine = await createEngine({ config: { ...DEFAULT_CONFIG, ...overrides }, ...opts });
  return engine;
}

function models(triage: FakeProvider[], detailed: FakeProvider[] = triage): ProviderRegistry {
  const registry = new ProviderRegistry();
  for (const provider of new Set([...triage, ...detailed])) registry.register(provider);
  registry.assignTier("triage", { primary: triage[0].id, fallback: triage[1]?.id });
  registry.assignTier("detailed", { primary: detailed[0].id, fallback: detailed[1]?.id });
  return registry;
}

const slowRetrieval = { ...DEFAULT_CONFIG.retrieval, timeoutMs: 10_000 };

class CountingStore extends MemoryReviewStore {
  reviewReads = 0;
  suggestionReads = 0;

  async getReview(id: string): Promise<Review | null> {
    this.reviewReads++;
    return super.getReview(id);
  }

  async findSuggestion(id: string): Promise<StoredSuggestion | null> {
    this.suggestionReads++;
    return super.findSuggestion(id);
  }
}

class FailingSaveStore extends MemoryReviewStore {
  async saveReview(): Promise<void> {
    throw new Error("database unavailable");
  }
}

afterEach(async () => {
  await engine?.close();
  engine = null;
});

describe("ReviewOrchestrator", () => {
  it("completes with rule findings when the index is unavailable", async () => {
    const { reviews } = await setup({}, { index: new FakeIndex(unavailableSearch) });

    await reviews.submit({ id: "rev-1", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF, filePaths: ["src/config.ts"] });
    const review = await reviews.waitFor("rev-1");

    expect(review.status).toBe("completed");
    expect(review.error).toBeUndefined();
    expect(review.stats).toMatchObject({ contextChunks: 0, ruleFindings: 2, modelFindings: 0 });
    expect(review.stats.degradations).toEqual(["retrieval_unavailable"]);
    expect(review.suggestions.map((s) => s.patternIds)).toEqual([["hardcoded-credential"], ["missing-tests"]]);
    expect(review.suggestions[0]).toMatchObject({
      category: "security",
      severity: "critical",
      confidence: 0.9,
      location: { path: "src/config.ts", line: 2 },
      modelIds: [],
    });
  });

  it("emits ordered progress and exactly one completion", async () => {
    const { reviews } = await setup();

    await reviews.submit({ id: "rev-1", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF, filePaths: ["src/config.ts"] });
    const review = await reviews.waitFor("rev-1");
    const events = reviews.listEvents("rev-1");

    expect(events.map((e) => (e.type === "progress" ? e.status : "complete"))).toEqual([
      "pending",
      "retrieving",
      "analyzing",
      "aggregating",
      "complete",
    ]);
    expect(events.map((e) => e.seq)).toEqual([1, 2, 3, 4, 5]);
    const last = events[events.length - 1];
    expect(last.type === "complete" && last.suggestions.map((s) => s.id)).toEqual(review.suggestions.map((s) => s.id));
  });

  it("derives file paths from the diff headers", async () => {
    const { reviews } = await setup();

    const accepted = await reviews.submit({ repositoryRef: "acme/api", diff: MULTI_FILE_DIFF });

    expect(accepted.filePaths).toEqual(["src/db.ts", "src/flags.ts"]);
    expect(accepted.run).toBe(1);
  });

  it("rejects a second submission for an active review", async () => {
    const { reviews } = await setup({ retrieval: slowRetrieval }, { index: new FakeIndex(hangingSearch) });

    await reviews.submit({ id: "rev-dup", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF });

    await expect(reviews.submit({ id: "rev-dup", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF })).rejects.toBeInstanceOf(
      ReviewConflict
    );
    expect((await reviews.get("rev-dup")).status).toBe("retrieving");
  });

  it("cancels an active review", async () => {
    const { reviews } = await setup({ retrieval: slowRetrieval }, { index: new FakeIndex(hangingSearch) });
    await reviews.submit({ id: "rev-c", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF });

    const cancelled = await reviews.cancel("rev-c");
    const settled = await reviews.waitFor("rev-c");

    expect(cancelled.status).toBe("failed");
    expect(cancelled.error?.code).toBe("cancelled");
    expect(settled.suggestions).toEqual([]);
    expect(reviews.listEvents("rev-c").filter((e) => e.type === "complete")).toHaveLength(1);
    await expect(reviews.cancel("rev-c")).rejects.toBeInstanceOf(ReviewConflict);
  });

  it("fails a review that exceeds its deadline", async () => {
    const { reviews } = await setup(
      { retrieval: slowRetrieval, review: { ...DEFAULT_CONFIG.review, deadlineMs: 40 } },
      { index: new FakeIndex(hangingSearch) }
    );

    await reviews.submit({ id: "rev-slow", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF });
    const review = await reviews.waitFor("rev-slow");

    expect(review.status).toBe("failed");
    expect(review.error).toEqual({ code: "timeout", message: "Review rev-slow exceeded its 40ms deadline" });
  });

  it("rejects submissions beyond the active limit", async () => {
    const { reviews } = await setup(
      { retrieval: slowRetrieval, review: { ...DEFAULT_CONFIG.review, maxActiveReviews: 1 } },
      { index: new FakeIndex(hangingSearch) }
    );
    await reviews.submit({ id: "a", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF });

    await expect(reviews.submit({ id: "b", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF })).rejects.toThrow(
      "Active review limit of 1 reached"
    );
    expect(reviews.activeCount).toBe(1);
  });

  it("completes with rule findings when every provider times out", async () => {
    const slow = new FakeProvider("slow", hangs);
    const broken = new FakeProvider("broken", fails);
    const { reviews } = await setup(
      { models: { ...DEFAULT_CONFIG.models, timeoutMs: 20 } },
      { providers: models([slow, broken]) }
    );

    await reviews.submit({ id: "rev-m", repositoryRef: "acme/api", diff: MULTI_FILE_DIFF });
    const review = await reviews.waitFor("rev-m");

    expect(review.status).toBe("completed");
    expect(review.stats.providerCalls).toBe(2);
    expect(review.stats.degradations).toEqual(["provider_failed"]);
    expect(review.suggestions.map((s) => s.patternIds[0])).toEqual(["sql-injection", "missing-tests", "todo-comment"]);
    expect(review.suggestions.every((s) => s.modelIds.length === 0)).toBe(true);
  });

  it("merges a corroborating model finding into the rule suggestion", async () => {
    const provider = new FakeProvider("main", replies({ triage: TRIAGE_YES, detailed: DETAILED_DB }, 0.01));
    const { reviews } = await setup({}, { providers: models([provider]) });

    await reviews.submit({ id: "rev-m", repositoryRef: "acme/api", diff: MULTI_FILE_DIFF });
    const review = await reviews.waitFor("rev-m");

    const sql = review.suggestions[0];
    expect(sql.patternIds).toEqual(["sql-injection"]);
    expect(sql.modelIds).toEqual(["fake-model"]);
    expect(sql.confidence).toBe(0.95);
    expect(sql.severity).toBe("critical");
    expect(review.stats.modelFindings).toBe(1);
    expect(review.costEstimate).toBeCloseTo(0.02);
  });

  it("regenerates a finished review and keeps old suggestions resolvable", async () => {
    const { reviews, store } = await setup();
    await reviews.submit({ id: "rev-1", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF, filePaths: ["src/config.ts"] });
    const first = await reviews.waitFor("rev-1");

    const restarted = await reviews.regenerate("rev-1");
    expect(restarted.run).toBe(2);
    expect(restarted.history).toHaveLength(1);
    expect(restarted.history[0]).toMatchObject({ run: 1, status: "completed", suggestionCount: 2, costEstimate: 0 });

    const second = await reviews.waitFor("rev-1");
    expect(second.status).toBe("completed");
    expect(second.suggestions.map((s) => s.id)).not.toContain(first.suggestions[0].id);

    const orphan = await reviews.findSuggestion(first.suggestions[0].id);
    expect(orphan).toMatchObject({ reviewId: "rev-1", run: 1 });
    expect((await store.getReview("rev-1"))?.run).toBe(2);
    expect(reviews.listEvents("rev-1").filter((e) => e.type === "complete").map((e) => e.run)).toEqual([1, 2]);
  });

  it("rejects resubmitting and regenerating in the wrong state", async () => {
    const { reviews } = await setup({ retrieval: slowRetrieval }, { index: new FakeIndex(hangingSearch) });
    await reviews.submit({ id: "rev-1", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF });

    await expect(reviews.regenerate("rev-1")).rejects.toBeInstanceOf(ReviewConflict);
    await reviews.cancel("rev-1");
    await expect(reviews.submit({ id: "rev-1", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF })).rejects.toBeInstanceOf(
      ReviewConflict
    );
  });

  it("reports unknown reviews", async () => {
    const { reviews } = await setup();

    await expect(reviews.get("missing")).rejects.toBeInstanceOf(ReviewNotFound);
  });

  it("rejects an id another engine already stored", async () => {
    const store = new MemoryReviewStore();
    const { reviews } = await setup({}, { store });
    await reviews.submit({ id: "rev-1", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF, filePaths: ["src/config.ts"] });
    await reviews.waitFor("rev-1");
    await reviews.regenerate("rev-1");
    await reviews.waitFor("rev-1");

    const other = await createEngine({ config: DEFAULT_CONFIG, store });
    try {
      await expect(
        other.reviews.submit({ id: "rev-1", repositoryRef: "other/repo", diff: MULTI_FILE_DIFF })
      ).rejects.toBeInstanceOf(ReviewConflict);
      expect(other.reviews.activeCount).toBe(0);
    } finally {
      await other.close();
    }
    expect(await store.getReview("rev-1")).toMatchObject({
      repositoryRef: "acme/api",
      run: 2,
      status: "completed",
      history: [{ run: 1 }],
    });
  });

  it("reads settled reviews back from the store", async () => {
    const store = new CountingStore();
    const { reviews } = await setup({}, { store });
    await reviews.submit({ id: "rev-1", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF, filePaths: ["src/config.ts"] });

    const review = await reviews.waitFor("rev-1");
    const suggestion = await reviews.findSuggestion(review.suggestions[0].id);

    expect(review.status).toBe("completed");
    expect(store.reviewReads).toBe(2);
    expect(store.suggestionReads).toBe(1);
    expect(suggestion).toMatchObject({ reviewId: "rev-1", run: 1 });
  });

  it("keeps a review in memory while the store rejects it", async () => {
    const store = new FailingSaveStore();
    const { reviews } = await setup({}, { store });
    await reviews.submit({ id: "rev-1", repositoryRef: "acme/api", diff: CREDENTIAL_DIFF, filePaths: ["src/config.ts"] });

    const review = await reviews.waitFor("rev-1");

    expect(review.status).toBe("completed");
    expect(await store.getReview("rev-1")).toBeNull();
    await expect(reviews.findSuggestion(review.suggestions[0].id)).resolves.toMatchObject({ reviewId: "rev-1", run: 1 });
  });

  it("completes an empty diff without suggestions", async () => {
    const { reviews } = await setup();

    await reviews.submit({ id: "empty", repositoryRef: "acme/api", diff: "" });
    const review = await reviews.waitFor("empty");

    expect(review.status).toBe("completed");
    expect(review.suggestions).toEqual([]);
  });
});
