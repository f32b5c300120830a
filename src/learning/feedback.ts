import { randomUUID } from "node:crypto";
import type { EngineConfig } from "../config-loader/schema.js";
import { DuplicateFeedback, EngineError, UnknownSuggestion } from "../errors.js";
import type { ReviewStore, StoredSuggestion } from "../storage/types.js";
import { createChildLogger } from "../utils/logger.js";
import { computeLearningMetrics } from "./metrics.js";
import type { FeedbackInput, FeedbackRecord, LearningMetrics } from "./types.js";
import { PatternWeightTable, type PatternWeight, type WeightUpdateOptions } from "./weights.js";

const log = createChildLogger({ module: "learning-feedback" });

export interface SuggestionLookup {
  findSuggestion(suggestionId: string): Promise<StoredSuggestion | null>;
}

export interface FeedbackLearnerDeps {
  store: ReviewStore;
  weights: PatternWeightTable;
  suggestions: SuggestionLookup;
  settings: EngineConfig["learning"];
  /** Known-issue recall; omitted or null when no golden set is available */
  recall?: () => number | null;
  now?: () => Date;
  newId?: () => string;
}

export type BatchOutcome =
  | { suggestionId: string; ok: true; feedbackId: string }
  | { suggestionId: string; ok: false; error: { code: string; message: string } };

/**
 * Consumes feedback: attributes each judgment to the contributing patterns,
 * moves their factors, and recomputes the metrics snapshot. Records are
 * processed one at a time so stored order matches the order weights moved.
 */
export class FeedbackLearner {
  private queue: Promise<unknown> = Promise.resolve();
  private latest: LearningMetrics | null = null;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly deps: FeedbackLearnerDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  record(input: FeedbackInput): Promise<LearningMetrics> {
    return this.serialize(async () => {
      await this.apply(input);
      return this.recomputeNow();
    });
  }

  /** Sequential; a failing item does not stop the rest */
  recordBatch(inputs: FeedbackInput[]): Promise<{ metrics: LearningMetrics; outcomes: BatchOutcome[] }> {
    return this.serialize(async () => {
      const outcomes: BatchOutcome[] = [];
      for (const input of inputs) {
        try {
          const record = await this.apply(input);
          outcomes.push({ suggestionId: input.suggestionId, ok: true, feedbackId: record.id });
        } catch (err) {
          if (!(err instanceof EngineError)) throw err;
          log.warn({ err, suggestionId: input.suggestionId }, "Feedback item rejected");
          outcomes.push({ suggestionId: input.suggestionId, ok: false, error: { code: err.code, message: err.message } });
        }
      }
      return { metrics: await this.recomputeNow(), outcomes };
    });
  }

  /** Latest snapshot: in memory, else the last one stored, else freshly computed */
  async getMetrics(): Promise<LearningMetrics> {
    if (this.latest) return this.latest;
    const stored = await this.deps.store.latestMetrics();
    if (stored) {
      this.latest = stored;
      return stored;
    }
    return this.recompute();
  }

  recompute(): Promise<LearningMetrics> {
    return this.serialize(() => this.recomputeNow());
  }

  /** Most recent feedback first */
  async history(limit = 50): Promise<FeedbackRecord[]> {
    const records = await this.deps.store.listFeedback(limit);
    return records.reverse();
  }

  /** Replay the EMA over the full feedback history and swap in the result */
  rebuildWeights(): Promise<PatternWeight[]> {
    return this.serialize(async () => {
      const records = await this.deps.store.listFeedback();
      const replayed = new PatternWeightTable();
      for (const record of records) {
        for (const patternId of record.patternIds) {
          replayed.apply(patternId, record.helpful, this.weightOptions(), new Date(record.createdAt));
        }
      }
      const weights = replayed.snapshot();
      this.deps.weights.replaceAll(weights);
      await this.deps.store.savePatternWeights(weights);
      log.info({ records: records.length, patterns: weights.length }, "Pattern weights rebuilt from history");
      return weights;
    });
  }

  private async apply(input: FeedbackInput): Promise<FeedbackRecord> {
    const id = input.id ?? this.newId();
    if (await this.deps.store.hasFeedback(id)) throw new DuplicateFeedback(id);

    const target = await this.deps.suggestions.findSuggestion(input.suggestionId);
    if (!target) throw new UnknownSuggestion(input.suggestionId);
    const { suggestion } = target;

    const record: FeedbackRecord = {
      id,
      suggestionId: suggestion.id,
      reviewId: target.reviewId,
      helpful: input.helpful,
      correction: input.correction ?? null,
      category: input.category ?? suggestion.category,
      confidence: suggestion.confidence,
      origins: [...new Set(suggestion.contributions.map((c) => c.origin))].sort(),
      patternIds: [...suggestion.patternIds],
      modelIds: [...suggestion.modelIds],
      createdAt: this.now().toISOString(),
    };
    await this.deps.store.addFeedback(record);

    const at = this.now();
    const updated = record.patternIds.map((patternId) =>
      this.deps.weights.apply(patternId, record.helpful, this.weightOptions(), at)
    );
    if (updated.length > 0) await this.deps.store.savePatternWeights(updated);

    log.info(
      { feedbackId: id, suggestionId: suggestion.id, helpful: record.helpful, patterns: record.patternIds },
      "Feedback recorded"
    );
    return record;
  }

  private async recomputeNow(): Promise<LearningMetrics> {
    const records = await this.deps.store.listFeedback();
    const metrics = computeLearningMetrics(records, {
      calibrationBuckets: this.deps.settings.calibrationBuckets,
      velocityWindow: this.deps.settings.velocityWindow,
      recall: this.deps.recall?.() ?? null,
      now: this.now(),
    });
    this.latest = metrics;
    try {
      await this.deps.store.saveMetrics(metrics);
    } catch (err) {
      log.warn({ err }, "Failed to persist metrics snapshot");
    }
    return metrics;
  }

  private weightOptions(): WeightUpdateOptions {
    return { learningRate: this.deps.settings.learningRate, floor: this.deps.settings.confidenceFloor };
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task);
    this.queue = result.catch((err: unknown) => {
      log.debug({ err }, "Queued learning task failed");
    });
    return result;
  }
}
