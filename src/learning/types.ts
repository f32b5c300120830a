import type { Finding } from "../review/types.js";

/** A human judgment on one Suggestion, as submitted */
export interface FeedbackInput {
  id?: string;
  suggestionId: string;
  helpful: boolean;
  correction?: string;
  /** Defaults to the Suggestion's category */
  category?: string;
}

/**
 * Stored feedback. Attribution is captured when the record is made so the
 * learning state can be replayed after Suggestions are discarded.
 */
export interface FeedbackRecord {
  readonly id: string;
  readonly suggestionId: string;
  readonly reviewId: string;
  readonly helpful: boolean;
  readonly correction: string | null;
  readonly category: string;
  /** The Suggestion's confidence when it was shown */
  readonly confidence: number;
  readonly origins: readonly Finding["origin"][];
  readonly patternIds: readonly string[];
  readonly modelIds: readonly string[];
  readonly createdAt: string;
}

export interface CategoryMetrics {
  total: number;
  helpful: number;
  helpfulRatio: number;
}

export interface LearningMetrics {
  totalFeedback: number;
  helpfulCount: number;
  helpfulRatio: number;
  precision: number;
  /** Null when no golden set is available */
  recall: number | null;
  f1: number | null;
  /** Count-weighted mean |predicted confidence − observed helpful rate| over buckets */
  calibrationError: number;
  /** Precision of the latest window minus precision of the window before it */
  learningVelocity: number;
  byCategory: Record<string, CategoryMetrics>;
  computedAt: string;
}
