import type { EngineConfig } from "./config-loader/schema.js";
import { loadEngineConfig } from "./config-loader/loader.js";
import { isRetrievalEnabled, type Env } from "./config/env.js";
import { createChildLogger } from "./utils/logger.js";
import { PatternRegistry, buildPatternRegistry } from "./rules/registry.js";
import { ContextRetriever } from "./retrieval/retriever.js";
import { QdrantSimilarityIndex } from "./retrieval/qdrant-index.js";
import type { ContextWriter, SimilarityIndex } from "./retrieval/types.js";
import { MemoryCacheStore, ResponseCache, type CacheStore } from "./llm/cache.js";
import { ModelOrchestrator } from "./llm/orchestrator.js";
import { ProviderRegistry, buildProviderRegistry } from "./llm/providers/registry.js";
import { ReviewEventLog } from "./review/events.js";
import { ReviewOrchestrator } from "./review/orchestrator.js";
import { PatternWeightTable } from "./learning/weights.js";
import { FeedbackLearner } from "./learning/feedback.js";
import { GoldenSetEvaluator, loadGoldenSet, type GoldenCase } from "./learning/golden-set.js";
import { ScheduledJob } from "./learning/jobs.js";
import type { ReviewStore } from "./storage/types.js";
import { MemoryReviewStore } from "./storage/memory-store.js";
import { PgReviewStore } from "./storage/pg-store.js";

const log = createChildLogger({ module: "engine" });

export interface EngineOptions {
  config: EngineConfig;
  store?: ReviewStore;
  index?: SimilarityIndex | null;
  contextWriter?: ContextWriter | null;
  providers?: ProviderRegistry;
  cacheStore?: CacheStore;
  goldenSet?: GoldenCase[] | null;
  now?: () => Date;
  newId?: () => string;
}

export interface Engine {
  config: EngineConfig;
  store: ReviewStore;
  patterns: PatternRegistry;
  weights: PatternWeightTable;
  cache: ResponseCache;
  /** Null when no similarity index is configured */
  contextWriter: ContextWriter | null;
  reviews: ReviewOrchestrator;
  learner: FeedbackLearner;
  golden: GoldenSetEvaluator | null;
  metricsJob: ScheduledJob;
  close(): Promise<void>;
}

/** Wire every component from a configuration and its collaborators */
export async function createEngine(opts: EngineOptions): Promise<Engine> {
  const { config } = opts;
  const now = opts.now ?? (() => new Date());
  const store = opts.store ?? new MemoryReviewStore();
  await store.init();

  const patterns = buildPatternRegistry(config);
  const weights = new PatternWeightTable(await store.loadPatternWeights());
  const cache = new ResponseCache(
    opts.cacheStore ?? new MemoryCacheStore(() => now().getTime(), config.cache.maxEntries),
    config.cache.ttlMs,
    () => now().getTime()
  );
  const models = new ModelOrchestrator(opts.providers ?? new ProviderRegistry(), cache, config.models);
  const retriever = new ContextRetriever(opts.index ?? null, {
    timeoutMs: config.retrieval.timeoutMs,
    maxChunkLines: config.retrieval.maxChunkLines,
  });

  const reviews = new ReviewOrchestrator({
    retriever,
    patterns,
    weights,
    models,
    store,
    events: new ReviewEventLog(now, config.review.retainedEventLogs),
    settings: config,
    now,
    newId: opts.newId,
  });

  const golden = opts.goldenSet
    ? new GoldenSetEvaluator(opts.goldenSet, patterns, weights, {
        lineTolerance: config.aggregation.lineTolerance,
        confidenceFloor: config.learning.confidenceFloor,
      })
    : null;

  const learner = new FeedbackLearner({
    store,
    weights,
    suggestions: reviews,
    settings: config.learning,
    recall: golden ? () => golden.evaluate().recall : undefined,
    now,
    newId: opts.newId,
  });

  const metricsJob = new ScheduledJob(
    "learning-metrics",
    () => learner.recompute(),
    config.learning.recomputeIntervalMs,
    now
  );

  log.info(
    {
      patterns: patterns.active().length,
      modelAnalysis: models.enabled,
      retrieval: retriever.enabled,
      goldenCases: opts.goldenSet?.length ?? 0,
    },
    "Engine ready"
  );

  return {
    config,
    store,
    patterns,
    weights,
    cache,
    contextWriter: opts.contextWriter ?? null,
    reviews,
    learner,
    golden,
    metricsJob,
    async close() {
      metricsJob.stop();
      await reviews.shutdown();
      await store.close();
    },
  };
}

/** Build the engine from the process environment and the configuration file */
export async function createEngineFromEnv(env: Env): Promise<Engine> {
  const config = await loadEngineConfig(env.ENGINE_CONFIG_PATH);

  let index: QdrantSimilarityIndex | null = null;
  if (isRetrievalEnabled(env) && env.QDRANT_URL) {
    const qdrant = new QdrantSimilarityIndex(env.QDRANT_URL, env.QDRANT_COLLECTION);
    try {
      await qdrant.ensureCollection();
    } catch (err) {
      log.warn({ err }, "Qdrant not reachable at startup, searches will degrade until it is");
    }
    index = qdrant;
  } else {
    log.info("QDRANT_URL not set, reviews run without repository context");
  }

  if (!env.POSTGRES_URL) log.warn("POSTGRES_URL not set, reviews and feedback are kept in memory");

  return createEngine({
    config,
    store: env.POSTGRES_URL ? new PgReviewStore(env.POSTGRES_URL) : new MemoryReviewStore(),
    index,
    contextWriter: index,
    providers: buildProviderRegistry(config, {
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      openaiApiKey: env.OPENAI_API_KEY,
    }),
    goldenSet: await loadGoldenSet(config.learning.goldenSetPath),
  });
}
