import { DuplicateFeedback } from "../errors.js";
import type { Review } from "../review/types.js";
import type { FeedbackRecord, LearningMetrics } from "../learning/types.js";
import type { PatternWeight } from "../learning/weights.js";
import type { ReviewStore, StoredSuggestion } from "./types.js";

/** Process-local store used when no database is configured, and in tests */
export class MemoryReviewStore implements ReviewStore {
  private readonly reviews = new Map<string, Review>();
  private readonly suggestions = new Map<string, StoredSuggestion>();
  private readonly feedback: FeedbackRecord[] = [];
  private readonly feedbackIds = new Set<string>();
  private weights: PatternWeight[] = [];
  private metrics: LearningMetrics | null = null;

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async saveReview(review: Review): Promise<void> {
    const copy = structuredClone(review);
    this.reviews.set(review.id, copy);
    for (const suggestion of copy.suggestions) {
      this.suggestions.set(suggestion.id, { reviewId: review.id, run: review.run, suggestion });
    }
  }

  async getReview(id: string): Promise<Review | null> {
    const review = this.reviews.get(id);
    return review ? structuredClone(review) : null;
  }

  async findSuggestion(id: string): Promise<StoredSuggestion | null> {
    const stored = this.suggestions.get(id);
    return stored ? structuredClone(stored) : null;
  }

  async addFeedback(record: FeedbackRecord): Promise<void> {
    if (this.feedbackIds.has(record.id)) throw new DuplicateFeedback(record.id);
    this.feedbackIds.add(record.id);
    this.feedback.push(structuredClone(record));
  }

  async hasFeedback(id: string): Promise<boolean> {
    return this.feedbackIds.has(id);
  }

  async listFeedback(limit?: number): Promise<FeedbackRecord[]> {
    const records = limit === undefined ? this.feedback : this.feedback.slice(-Math.max(0, limit));
    return limit === 0 ? [] : structuredClone(records);
  }

  async savePatternWeights(weights: PatternWeight[]): Promise<void> {
    const byId = new Map(this.weights.map((w) => [w.patternId, w]));
    for (const weight of weights) byId.set(weight.patternId, { ...weight });
    this.weights = [...byId.values()];
  }

  async loadPatternWeights(): Promise<PatternWeight[]> {
    return this.weights.map((w) => ({ ...w }));
  }

  async saveMetrics(metrics: LearningMetrics): Promise<void> {
    this.metrics = structuredClone(metrics);
  }

  async latestMetrics(): Promise<LearningMetrics | null> {
    return this.metrics ? structuredClone(this.metrics) : null;
  }
}
