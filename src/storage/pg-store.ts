import pg from "pg";
import { DuplicateFeedback } from "../errors.js";
import type { Review, Suggestion } from "../review/types.js";
import type { FeedbackRecord, LearningMetrics } from "../learning/types.js";
import type { PatternWeight } from "../learning/weights.js";
import { createChildLogger } from "../utils/logger.js";
import type { ReviewStore, StoredSuggestion } from "./types.js";

const log = createChildLogger({ module: "pg-store" });

const UNIQUE_VIOLATION = "23505";

type ReviewRow = {
  review_json: Review;
};

type SuggestionRow = {
  review_id: string;
  run: number;
  suggestion_json: Suggestion;
};

type FeedbackRow = {
  id: string;
  suggestion_id: string;
  review_id: string;
  helpful: boolean;
  correction: string | null;
  category: string;
  confidence: number;
  origins: string[];
  pattern_ids: string[];
  model_ids: string[];
  created_at: Date;
};

type WeightRow = {
  pattern_id: string;
  factor: number;
  helpful: number;
  unhelpful: number;
  updated_at: Date;
};

type MetricsRow = {
  metrics_json: LearningMetrics;
};

/** PostgreSQL-backed store; tables are created on `init` */
export class PgReviewStore implements ReviewStore {
  private readonly pool: pg.Pool;

  constructor(connectionString: string) {
    this.pool = new pg.Pool({ connectionString, max: 10 });
  }

  async init(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query(`
        CREATE TABLE IF NOT EXISTS reviews (
          id TEXT PRIMARY KEY,
          repository_ref TEXT NOT NULL,
          status TEXT NOT NULL,
          run INTEGER NOT NULL,
          created_at TIMESTAMPTZ NOT NULL,
          finished_at TIMESTAMPTZ,
          duration_ms INTEGER,
          cost_estimate DOUBLE PRECISION NOT NULL DEFAULT 0,
          review_json JSONB NOT NULL
        );

        CREATE TABLE IF NOT EXISTS suggestions (
          id TEXT PRIMARY KEY,
          review_id TEXT NOT NULL,
          run INTEGER NOT NULL,
          category TEXT NOT NULL,
          confidence DOUBLE PRECISION NOT NULL,
          suggestion_json JSONB NOT NULL
        );

        CREATE TABLE IF NOT EXISTS feedback (
          seq SERIAL,
          id TEXT PRIMARY KEY,
          suggestion_id TEXT NOT NULL,
          review_id TEXT NOT NULL,
          helpful BOOLEAN NOT NULL,
          correction TEXT,
          category TEXT NOT NULL,
          confidence DOUBLE PRECISION NOT NULL,
          origins TEXT[] NOT NULL,
          pattern_ids TEXT[] NOT NULL,
          model_ids TEXT[] NOT NULL,
          created_at TIMESTAMPTZ NOT NULL
        );

        CREATE TABLE IF NOT EXISTS pattern_weights (
          pattern_id TEXT PRIMARY KEY,
          factor DOUBLE PRECISION NOT NULL,
          helpful INTEGER NOT NULL,
          unhelpful INTEGER NOT NULL,
          updated_at TIMESTAMPTZ NOT NULL
        );

        CREATE TABLE IF NOT EXISTS learning_metrics (
          id SERIAL PRIMARY KEY,
          computed_at TIMESTAMPTZ NOT NULL,
          metrics_json JSONB NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_suggestions_review ON suggestions(review_id);
        CREATE INDEX IF NOT EXISTS idx_feedback_seq ON feedback(seq);
        CREATE INDEX IF NOT EXISTS idx_reviews_repo ON reviews(repository_ref, created_at);
      `);
      log.info("Review store tables initialized");
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async saveReview(review: Review): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(
        `INSERT INTO reviews (id, repository_ref, status, run, created_at, finished_at, duration_ms, cost_estimate, review_json)
         VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)
         ON CONFLICT (id) DO UPDATE SET
           status = EXCLUDED.status, run = EXCLUDED.run, finished_at = EXCLUDED.finished_at,
           duration_ms = EXCLUDED.duration_ms, cost_estimate = EXCLUDED.cost_estimate,
           review_json = EXCLUDED.review_json`,
        [
          review.id, review.repositoryRef, review.status, review.run, review.createdAt,
          review.finishedAt, review.durationMs, review.costEstimate, JSON.stringify(review),
        ]
      );
      for (const s of review.suggestions) {
        await client.query(
          `INSERT INTO suggestions (id, review_id, run, category, confidence, suggestion_json)
           VALUES ($1,$2,$3,$4,$5,$6)
           ON CONFLICT (id) DO NOTHING`,
          [s.id, review.id, review.run, s.category, s.confidence, JSON.stringify(s)]
        );
      }
      await client.query("COMMIT");
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  async getReview(id: string): Promise<Review | null> {
    const { rows } = await this.pool.query<ReviewRow>("SELECT review_json FROM reviews WHERE id = $1", [id]);
    return rows[0]?.review_json ?? null;
  }

  async findSuggestion(id: string): Promise<StoredSuggestion | null> {
    const { rows } = await this.pool.query<SuggestionRow>(
      "SELECT review_id, run, suggestion_json FROM suggestions WHERE id = $1",
      [id]
    );
    const row = rows[0];
    return row ? { reviewId: row.review_id, run: row.run, suggestion: row.suggestion_json } : null;
  }

  async addFeedback(record: FeedbackRecord): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO feedback (id, suggestion_id, review_id, helpful, correction, category,
           confidence, origins, pattern_ids, model_ids, created_at)
         VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11)`,
        [
          record.id, record.suggestionId, record.reviewId, record.helpful, record.correction,
          record.category, record.confidence, record.origins, record.patternIds, record.modelIds,
          record.createdAt,
        ]
      );
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateFeedback(record.id);
      throw err;
    }
  }

  async hasFeedback(id: string): Promise<boolean> {
    const { rowCount } = await this.pool.query("SELECT 1 FROM feedback WHERE id = $1", [id]);
    return (rowCount ?? 0) > 0;
  }

  async listFeedback(limit?: number): Promise<FeedbackRecord[]> {
    const { rows } =
      limit === undefined
        ? await this.pool.query<FeedbackRow>("SELECT * FROM feedback ORDER BY seq ASC")
        : await this.pool.query<FeedbackRow>(
            "SELECT * FROM (SELECT * FROM feedback ORDER BY seq DESC LIMIT $1) recent ORDER BY seq ASC",
            [Math.max(0, limit)]
          );
    return rows.map(toFeedbackRecord);
  }

  async savePatternWeights(weights: PatternWeight[]): Promise<void> {
    for (const w of weights) {
      await this.pool.query(
        `INSERT INTO pattern_weights (pattern_id, factor, helpful, unhelpful, updated_at)
         VALUES ($1,$2,$3,$4,$5)
         ON CONFLICT (pattern_id) DO UPDATE SET
           factor = EXCLUDED.factor, helpful = EXCLUDED.helpful,
           unhelpful = EXCLUDED.unhelpful, updated_at = EXCLUDED.updated_at`,
        [w.patternId, w.factor, w.helpful, w.unhelpful, w.updatedAt]
      );
    }
  }

  async loadPatternWeights(): Promise<PatternWeight[]> {
    const { rows } = await this.pool.query<WeightRow>("SELECT * FROM pattern_weights ORDER BY pattern_id");
    return rows.map((r) => ({
      patternId: r.pattern_id,
      factor: r.factor,
      helpful: r.helpful,
      unhelpful: r.unhelpful,
      updatedAt: r.updated_at.toISOString(),
    }));
  }

  async saveMetrics(metrics: LearningMetrics): Promise<void> {
    await this.pool.query("INSERT INTO learning_metrics (computed_at, metrics_json) VALUES ($1, $2)", [
      metrics.computedAt,
      JSON.stringify(metrics),
    ]);
  }

  async latestMetrics(): Promise<LearningMetrics | null> {
    const { rows } = await this.pool.query<MetricsRow>(
      "SELECT metrics_json FROM learning_metrics ORDER BY id DESC LIMIT 1"
    );
    return rows[0]?.metrics_json ?? null;
  }
}

function toFeedbackRecord(row: FeedbackRow): FeedbackRecord {
  return {
    id: row.id,
    suggestionId: row.suggestion_id,
    reviewId: row.review_id,
    helpful: row.helpful,
    correction: row.correction,
    category: row.category,
    confidence: row.confidence,
    origins: row.origins.filter((o): o is "rule" | "model" => o === "rule" || o === "model"),
    patternIds: row.pattern_ids,
    modelIds: row.model_ids,
    createdAt: row.created_at.toISOString(),
  };
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === UNIQUE_VIOLATION;
}
