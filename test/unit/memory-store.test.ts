import { describe, it, expect } from "vitest";
import { MemoryReviewStore } from "../../src/storage/memory-store.js";
import { DuplicateFeedback } from "../../src/errors.js";
import type { Review } from "../../src/review/types.js";
import { MODEL_SUGGESTION, RULE_SUGGESTION, feedbackRecord } from "../fixtures/suggestions.js";

function review(overrides: Partial<Review> = {}): Review {
  return {
    id: "rev-1",
    repositoryRef: "acme/widgets@main",
    diff: "",
    filePaths: [],
    status: "completed",
    run: 1,
    createdAt: "2024-05-01T12:00:00.000Z",
    startedAt: "2024-05-01T12:00:00.000Z",
    finishedAt: "2024-05-01T12:00:01.000Z",
    durationMs: 1000,
    costEstimate: 0,
    suggestions: [RULE_SUGGESTION],
    stats: {
      contextChunks: 0,
      ruleFindings: 1,
      modelFindings: 0,
      patternErrors: 0,
      providerCalls: 0,
      cacheHits: 0,
      degradations: [],
    },
    history: [],
    ...overrides,
  };
}

describe("MemoryReviewStore", () => {
  it("keeps suggestions of earlier runs resolvable", async () => {
    const store = new MemoryReviewStore();
    await store.saveReview(review());
    await store.saveReview(review({ run: 2, suggestions: [MODEL_SUGGESTION] }));

    expect(await store.findSuggestion("s-rule")).toEqual({ reviewId: "rev-1", run: 1, suggestion: RULE_SUGGESTION });
    expect((await store.findSuggestion("s-model"))?.run).toBe(2);
    expect((await store.getReview("rev-1"))?.run).toBe(2);
    expect(await store.getReview("other")).toBeNull();
  });

  it("returns copies, not live state", async () => {
    const store = new MemoryReviewStore();
    await store.saveReview(review());

    const loaded = await store.getReview("rev-1");
    loaded?.suggestions.pop();

    expect((await store.getReview("rev-1"))?.suggestions).toHaveLength(1);
  });

  it("lists feedback oldest first and rejects duplicates", async () => {
    const store = new MemoryReviewStore();
    await store.addFeedback(feedbackRecord({ id: "a" }));
    await store.addFeedback(feedbackRecord({ id: "b" }));
    await store.addFeedback(feedbackRecord({ id: "c" }));

    await expect(store.addFeedback(feedbackRecord({ id: "a" }))).rejects.toBeInstanceOf(DuplicateFeedback);
    expect((await store.listFeedback()).map((r) => r.id)).toEqual(["a", "b", "c"]);
    expect((await store.listFeedback(2)).map((r) => r.id)).toEqual(["b", "c"]);
    expect(await store.listFeedback(0)).toEqual([]);
    expect(await store.hasFeedback("b")).toBe(true);
  });

  it("merges pattern weights by id", async () => {
    const store = new MemoryReviewStore();
    const at = "2024-05-01T12:00:00.000Z";
    await store.savePatternWeights([
      { patternId: "a", factor: 0.9, helpful: 0, unhelpful: 1, updatedAt: at },
      { patternId: "b", factor: 1, helpful: 1, unhelpful: 0, updatedAt: at },
    ]);
    await store.savePatternWeights([{ patternId: "a", factor: 0.81, helpful: 0, unhelpful: 2, updatedAt: at }]);

    expect((await store.loadPatternWeights()).map((w) => [w.patternId, w.factor])).toEqual([
      ["a", 0.81],
      ["b", 1],
    ]);
  });
});
