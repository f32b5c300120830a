import type { Review, Suggestion } from "../review/types.js";
import type { FeedbackRecord, LearningMetrics } from "../learning/types.js";
import type { PatternWeight } from "../learning/weights.js";

export interface StoredSuggestion {
  reviewId: string;
  run: number;
  suggestion: Suggestion;
}

/**
 * Durable storage for finalized records. A resolved write is durable.
 * Suggestions of earlier runs stay retrievable after a Review is regenerated.
 */
export interface ReviewStore {
  init(): Promise<void>;
  close(): Promise<void>;

  saveReview(review: Review): Promise<void>;
  getReview(id: string): Promise<Review | null>;
  findSuggestion(id: string): Promise<StoredSuggestion | null>;

  /** Rejects with `DuplicateFeedback` when the id already exists */
  addFeedback(record: FeedbackRecord): Promise<void>;
  hasFeedback(id: string): Promise<boolean>;
  /** Oldest first; `limit` keeps the most recent records */
  listFeedback(limit?: number): Promise<FeedbackRecord[]>;

  savePatternWeights(weights: PatternWeight[]): Promise<void>;
  loadPatternWeights(): Promise<PatternWeight[]>;

  saveMetrics(metrics: LearningMetrics): Promise<void>;
  latestMetrics(): Promise<LearningMetrics | null>;
}
