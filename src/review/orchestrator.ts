import { randomUUID } from "node:crypto";
import {
  EngineError,
  RetrievalUnavailable,
  ReviewCancelled,
  ReviewConflict,
  ReviewNotFound,
  ReviewTimeout,
  describeError,
} from "../errors.js";
import type { EngineConfig } from "../config-loader/schema.js";
import { parseUnifiedDiff, type ParsedFile } from "../utils/diff-parser.js";
import { raceAbort, reasonToError } from "../utils/abort.js";
import { createChildLogger } from "../utils/logger.js";
import type { ContextRetriever } from "../retrieval/retriever.js";
import type { PatternRegistry } from "../rules/registry.js";
import type { FactorSource } from "../rules/types.js";
import { evaluatePatterns, type PatternEvaluation } from "../rules/engine.js";
import { CostBudget } from "../llm/budget.js";
import type { ModelAnalysis, ModelOrchestrator } from "../llm/orchestrator.js";
import type { ReviewStore, StoredSuggestion } from "../storage/types.js";
import { aggregate } from "./aggregator.js";
import type { ReviewEvent, ReviewEventListener, ReviewEventLog } from "./events.js";
import { STAGE_DESCRIPTIONS, assertTransition, isTerminal } from "./state-machine.js";
import type {
  AnalyzeRequest,
  ContextChunk,
  Finding,
  Review,
  ReviewFailure,
  ReviewStats,
  ReviewStatus,
  RunSummary,
} from "./types.js";

const log = createChildLogger({ module: "review-orchestrator" });

export type ReviewSettings = Pick<
  EngineConfig,
  "budget" | "models" | "retrieval" | "aggregation" | "learning" | "review"
>;

export interface ReviewOrchestratorDeps {
  retriever: ContextRetriever;
  patterns: PatternRegistry;
  weights: FactorSource;
  models: ModelOrchestrator;
  store: ReviewStore;
  events: ReviewEventLog;
  settings: ReviewSettings;
  now?: () => Date;
  newId?: () => string;
}

interface ActiveRun {
  run: number;
  controller: AbortController;
  timer: NodeJS.Timeout;
  done: Promise<void>;
}

/**
 * Owns every Review's lifecycle. One analysis per Review id at a time; each
 * run walks pending → retrieving → analyzing → aggregating → completed, or
 * ends in failed. Only this class mutates a Review.
 *
 * Settled Reviews are held in memory only until the store has acknowledged
 * them; reads after that go to the store.
 */
export class ReviewOrchestrator {
  private readonly reviews = new Map<string, Review>();
  private readonly active = new Map<string, ActiveRun>();
  private readonly suggestionIndex = new Map<string, StoredSuggestion>();
  /** Run number of the last terminal state the store acknowledged, per id */
  private readonly saved = new Map<string, number>();
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly deps: ReviewOrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.newId = deps.newId ?? randomUUID;
  }

  get activeCount(): number {
    return this.active.size;
  }

  /**
   * Accept a new analysis. Rejects with `ReviewConflict` when the id is
   * already known here or to the store, or the active limit is reached.
   */
  async submit(request: AnalyzeRequest): Promise<Review> {
    const id = request.id ?? this.newId();
    this.assertUnknown(id);
    if (await this.deps.store.getReview(id)) {
      throw new ReviewConflict(`Review ${id} already exists; regenerate it instead`, { reviewId: id });
    }
    // checked again: another submit may have claimed the id during the lookup
    this.assertUnknown(id);
    this.assertCapacity(id);

    const filePaths =
      request.filePaths && request.filePaths.length > 0
        ? [...request.filePaths]
        : parseUnifiedDiff(request.diff).map((f) => f.filename);

    const review: Review = {
      id,
      repositoryRef: request.repositoryRef,
      diff: request.diff,
      filePaths,
      status: "pending",
      run: 1,
      createdAt: this.now().toISOString(),
      startedAt: null,
      finishedAt: null,
      durationMs: null,
      costEstimate: 0,
      suggestions: [],
      stats: emptyStats(),
      history: [],
    };
    this.reviews.set(id, review);
    log.info({ reviewId: id, repositoryRef: review.repositoryRef, files: filePaths.length }, "Review accepted");

    this.start(review);
    return snapshot(review);
  }

  /**
   * Re-run a terminal Review under the same id. Prior Suggestions are
   * dropped from the Review but stay resolvable for feedback.
   */
  async regenerate(id: string): Promise<Review> {
    const review = await this.load(id);
    if (this.active.has(id) || !isTerminal(review.status)) {
      throw new ReviewConflict(`Review ${id} is already being analyzed`, { reviewId: id });
    }
    try {
      this.assertCapacity(id);
    } catch (err) {
      this.release(review);
      throw err;
    }

    review.history.push(summarize(review));
    review.run += 1;
    review.status = "pending";
    review.startedAt = null;
    review.finishedAt = null;
    review.durationMs = null;
    review.costEstimate = 0;
    review.suggestions = [];
    review.stats = emptyStats();
    delete review.error;
    log.info({ reviewId: id, run: review.run }, "Review regenerating");

    this.start(review);
    return snapshot(review);
  }

  /** Cancel an active Review; it fails with cause `cancelled` */
  async cancel(id: string): Promise<Review> {
    const review = this.reviews.get(id);
    const entry = this.active.get(id);
    if (!review || !entry || isTerminal(review.status)) {
      const current = await this.get(id);
      throw new ReviewConflict(`Review ${id} is not active`, { reviewId: id, status: current.status });
    }
    await this.abort(review, entry, new ReviewCancelled(id));
    return snapshot(review);
  }

  async get(id: string): Promise<Review> {
    const review = this.reviews.get(id) ?? (await this.deps.store.getReview(id));
    if (!review) throw new ReviewNotFound(id);
    return snapshot(review);
  }

  /** Resolves once the current run of `id` has settled */
  async waitFor(id: string): Promise<Review> {
    const entry = this.active.get(id);
    if (entry) await entry.done;
    return this.get(id);
  }

  listEvents(id: string, afterSeq?: number): ReviewEvent[] {
    return this.deps.events.list(id, afterSeq);
  }

  subscribe(id: string, listener: ReviewEventListener): () => void {
    return this.deps.events.subscribe(id, listener);
  }

  /** Suggestions from any run, including ones orphaned by regeneration */
  async findSuggestion(suggestionId: string): Promise<StoredSuggestion | null> {
    return this.suggestionIndex.get(suggestionId) ?? (await this.deps.store.findSuggestion(suggestionId));
  }

  /** Cancel every active Review and wait for the pipelines to settle */
  async shutdown(): Promise<void> {
    const pending: Promise<void>[] = [];
    for (const [id, entry] of this.active) {
      const review = this.reviews.get(id);
      if (review) await this.abort(review, entry, new ReviewCancelled(id));
      pending.push(entry.done);
    }
    await Promise.all(pending);
  }

  private assertUnknown(id: string): void {
    if (this.active.has(id)) {
      throw new ReviewConflict(`Review ${id} is already being analyzed`, { reviewId: id });
    }
    if (this.reviews.has(id)) {
      throw new ReviewConflict(`Review ${id} already exists; regenerate it instead`, { reviewId: id });
    }
  }

  private assertCapacity(id: string): void {
    const limit = this.deps.settings.review.maxActiveReviews;
    if (this.active.size >= limit) {
      throw new ReviewConflict(`Active review limit of ${limit} reached`, {
        reviewId: id,
        reason: "capacity",
      });
    }
  }

  /** The live Review for `id`, pulled back from the store when it was released */
  private async load(id: string): Promise<Review> {
    const cached = this.reviews.get(id);
    if (cached) return cached;
    const stored = await this.deps.store.getReview(id);
    if (!stored) throw new ReviewNotFound(id);
    const existing = this.reviews.get(id);
    if (existing) return existing;
    this.reviews.set(id, stored);
    this.saved.set(id, stored.run);
    return stored;
  }

  /** Drop a settled Review from memory once the store holds its final state */
  private release(review: Review): void {
    const { id } = review;
    if (this.reviews.get(id) !== review || this.active.has(id)) return;
    if (!isTerminal(review.status) || this.saved.get(id) !== review.run) return;

    this.reviews.delete(id);
    this.saved.delete(id);
    for (const [suggestionId, stored] of this.suggestionIndex) {
      if (stored.reviewId === id) this.suggestionIndex.delete(suggestionId);
    }
    log.debug({ reviewId: id, run: review.run }, "Settled review released from memory");
  }

  private start(review: Review): void {
    const { deadlineMs } = this.deps.settings.review;
    const controller = new AbortController();
    const entry: ActiveRun = {
      run: review.run,
      controller,
      timer: setTimeout(() => {
        this.abort(review, entry, new ReviewTimeout(review.id, deadlineMs)).catch((err: unknown) =>
          log.error({ err, reviewId: review.id }, "Failed to fail review at deadline")
        );
      }, deadlineMs),
      done: Promise.resolve(),
    };
    this.active.set(review.id, entry);
    this.emitProgress(review);

    entry.done = this.execute(review, entry.run, controller.signal)
      .catch((err: unknown) => log.error({ err, reviewId: review.id }, "Review pipeline crashed"))
      .finally(() => {
        clearTimeout(entry.timer);
        if (this.active.get(review.id) === entry) this.active.delete(review.id);
        this.release(review);
      });
  }

  /** Force the run to failed, then abandon its in-flight work */
  private async abort(review: Review, entry: ActiveRun, reason: EngineError): Promise<void> {
    if (review.run !== entry.run) return;
    const changed = this.fail(review, reason);
    entry.controller.abort(reason);
    if (changed) await this.persist(review);
  }

  private async execute(review: Review, run: number, signal: AbortSignal): Promise<void> {
    const startedMs = this.now().getTime();
    review.startedAt = this.now().toISOString();
    const { settings } = this.deps;

    try {
      this.transition(review, run, "retrieving");
      const files = parseUnifiedDiff(review.diff, review.filePaths);
      const context = await this.retrieve(review, signal);
      review.stats.contextChunks = context.length;

      this.transition(review, run, "analyzing");
      const budget = new CostBudget(settings.budget.perReviewUsd, settings.models.maxAttemptsPerReview);
      const [rules, model] = await raceAbort(
        Promise.allSettled([this.runRules(files, context), this.deps.models.analyze(files, context, budget, signal)]),
        signal
      );
      const findings = this.collect(review, rules, model);

      this.transition(review, run, "aggregating");
      const suggestions = aggregate(findings, {
        maxConfidence: settings.aggregation.maxConfidence,
        similarityThreshold: settings.aggregation.similarityThreshold,
        lineTolerance: settings.aggregation.lineTolerance,
        newId: this.newId,
      });

      if (review.run !== run || isTerminal(review.status)) return;
      review.suggestions = suggestions;
      for (const suggestion of suggestions) {
        this.suggestionIndex.set(suggestion.id, { reviewId: review.id, run, suggestion });
      }
      review.finishedAt = this.now().toISOString();
      review.durationMs = this.now().getTime() - startedMs;
      this.transition(review, run, "completed");
      log.info(
        {
          reviewId: review.id,
          run,
          suggestions: suggestions.length,
          durationMs: review.durationMs,
          cost: review.costEstimate,
          degradations: review.stats.degradations,
        },
        "Review complete"
      );
    } catch (err) {
      if (review.run !== run) return;
      const reason = signal.aborted ? reasonToError(signal.reason) : err;
      if (!this.fail(review, reason)) return;
    }

    await this.persist(review);
  }

  private async retrieve(review: Review, signal: AbortSignal): Promise<ContextChunk[]> {
    const { k } = this.deps.settings.retrieval;
    try {
      return await this.deps.retriever.retrieve(review.diff, review.filePaths, review.repositoryRef, k, signal);
    } catch (err) {
      if (signal.aborted) throw reasonToError(signal.reason);
      if (!(err instanceof RetrievalUnavailable)) throw err;
      log.warn({ err, reviewId: review.id }, "Retrieval unavailable, continuing without context");
      addDegradation(review.stats, "retrieval_unavailable");
      return [];
    }
  }

  private async runRules(files: ParsedFile[], context: ContextChunk[]): Promise<PatternEvaluation> {
    return evaluatePatterns(files, context, this.deps.patterns.active(), {
      factors: this.deps.weights,
      confidenceFloor: this.deps.settings.learning.confidenceFloor,
    });
  }

  /**
   * Join both sources. Either may fail alone; the run fails only when
   * neither produced a result.
   */
  private collect(
    review: Review,
    rules: PromiseSettledResult<PatternEvaluation>,
    model: PromiseSettledResult<ModelAnalysis>
  ): Finding[] {
    if (rules.status === "rejected" && model.status === "rejected") {
      throw new EngineError(
        `Rule and model analysis both failed: ${describeError(rules.reason)}; ${describeError(model.reason)}`,
        "analysis_failed",
        { reviewId: review.id }
      );
    }

    const findings: Finding[] = [];
    if (rules.status === "fulfilled") {
      findings.push(...rules.value.findings);
      review.stats.ruleFindings = rules.value.findings.length;
      review.stats.patternErrors = rules.value.errors.length;
    } else {
      log.warn({ err: rules.reason, reviewId: review.id }, "Rule analysis failed, continuing with model findings");
    }

    if (model.status === "fulfilled") {
      findings.push(...model.value.findings);
      review.stats.modelFindings = model.value.findings.length;
      review.stats.providerCalls = model.value.providerCalls;
      review.stats.cacheHits = model.value.cacheHits;
      for (const d of model.value.degradations) addDegradation(review.stats, d);
      review.costEstimate = model.value.cost;
    } else {
      log.warn({ err: model.reason, reviewId: review.id }, "Model analysis failed, continuing with rule findings");
      addDegradation(review.stats, "provider_failed");
    }

    return findings;
  }

  private transition(review: Review, run: number, to: ReviewStatus): void {
    if (review.run !== run) throw new ReviewConflict(`Review ${review.id} run ${run} was superseded`);
    assertTransition(review.status, to);
    review.status = to;
    if (to === "completed") {
      this.deps.events.emit({
        type: "complete",
        reviewId: review.id,
        run,
        status: "completed",
        suggestions: [...review.suggestions],
      });
    } else {
      this.emitProgress(review);
    }
  }

  /** Returns false when the run was already terminal */
  private fail(review: Review, err: unknown): boolean {
    if (isTerminal(review.status)) return false;
    const failure: ReviewFailure =
      err instanceof EngineError
        ? { code: err.code, message: err.message }
        : { code: "analysis_failed", message: describeError(err) };

    assertTransition(review.status, "failed");
    review.status = "failed";
    review.error = failure;
    review.suggestions = [];
    review.finishedAt = this.now().toISOString();
    review.durationMs = review.startedAt ? Date.parse(review.finishedAt) - Date.parse(review.startedAt) : 0;

    log.error({ err, reviewId: review.id, run: review.run, code: failure.code }, "Review failed");
    this.deps.events.emit({
      type: "complete",
      reviewId: review.id,
      run: review.run,
      status: "failed",
      suggestions: [],
      error: failure,
    });
    return true;
  }

  private emitProgress(review: Review): void {
    this.deps.events.emit({
      type: "progress",
      reviewId: review.id,
      run: review.run,
      status: review.status,
      stage: STAGE_DESCRIPTIONS[review.status],
    });
  }

  private async persist(review: Review): Promise<void> {
    const { run } = review;
    try {
      await this.deps.store.saveReview(snapshot(review));
    } catch (err) {
      log.warn({ err, reviewId: review.id }, "Failed to persist review; keeping it in memory");
      return;
    }
    if (review.run !== run) return;
    this.saved.set(review.id, run);
    this.release(review);
  }
}

function emptyStats(): ReviewStats {
  return {
    contextChunks: 0,
    ruleFindings: 0,
    modelFindings: 0,
    patternErrors: 0,
    providerCalls: 0,
    cacheHits: 0,
    degradations: [],
  };
}

function addDegradation(stats: ReviewStats, d: ReviewStats["degradations"][number]): void {
  if (!stats.degradations.includes(d)) stats.degradations.push(d);
}

function summarize(review: Review): RunSummary {
  const status = review.status === "completed" ? "completed" : "failed";
  return {
    run: review.run,
    status,
    suggestionCount: review.suggestions.length,
    costEstimate: review.costEstimate,
    durationMs: review.durationMs ?? 0,
    ...(review.error ? { error: { ...review.error } } : {}),
  };
}

function snapshot(review: Review): Review {
  return structuredClone(review);
}
