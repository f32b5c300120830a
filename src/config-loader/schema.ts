import { z } from "zod";

export const severitySchema = z.enum(["critical", "high", "medium", "low"]);

const patternOverrideSchema = z.object({
  active: z.boolean().optional(),
  baseWeight: z.number().min(0).max(1).optional(),
  severity: severitySchema.optional(),
});

export type PatternOverride = z.infer<typeof patternOverrideSchema>;

const customPatternSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  category: z.string().min(1),
  severity: severitySchema.default("medium"),
  baseWeight: z.number().min(0).max(1).default(0.5),
  active: z.boolean().default(true),
  expression: z.string().min(1),
  flags: z.string().regex(/^[imsu]*$/).default("i"),
  message: z.string().min(1),
});

export type CustomPatternConfig = z.infer<typeof customPatternSchema>;

const providerSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(["anthropic", "openai-compatible"]),
  model: z.string().min(1),
  baseUrl: z.string().url().optional(),
  inputCostPerMTok: z.number().min(0).default(0),
  outputCostPerMTok: z.number().min(0).default(0),
  maxTokens: z.number().int().positive().default(2048),
});

export type ProviderConfig = z.infer<typeof providerSchema>;

const tierSchema = z.object({
  primary: z.string().min(1),
  fallback: z.string().min(1).optional(),
});

export type TierConfig = z.infer<typeof tierSchema>;

const engineConfigSchema = z.object({
  patterns: z.record(z.string(), patternOverrideSchema).default({}),
  customPatterns: z.array(customPatternSchema).default([]),
  providers: z.array(providerSchema).default([]),
  tiers: z
    .object({
      triage: tierSchema.optional(),
      detailed: tierSchema.optional(),
    })
    .default({}),
  models: z
    .object({
      timeoutMs: z.number().int().positive().default(30_000),
      maxPromptTokens: z.number().int().positive().default(24_000),
      maxAttemptsPerReview: z.number().int().positive().default(4),
      temperature: z.number().min(0).max(1).default(0),
    })
    .default({}),
  cache: z
    .object({
      ttlMs: z.number().int().positive().default(7 * 24 * 60 * 60 * 1000),
      /** Upper bound on responses held by the in-process cache */
      maxEntries: z.number().int().positive().default(10_000),
    })
    .default({}),
  budget: z
    .object({
      perReviewUsd: z.number().min(0).default(0.5),
    })
    .default({}),
  retrieval: z
    .object({
      k: z.number().int().positive().default(8),
      timeoutMs: z.number().int().positive().default(2_000),
      maxChunkLines: z.number().int().min(4).default(40),
    })
    .default({}),
  aggregation: z
    .object({
      maxConfidence: z.number().min(0).max(1).default(0.95),
      similarityThreshold: z.number().min(0).max(1).default(0.2),
      lineTolerance: z.number().int().min(0).default(2),
    })
    .default({}),
  learning: z
    .object({
      learningRate: z.number().gt(0).max(1).default(0.1),
      confidenceFloor: z.number().min(0).lt(1).default(0.1),
      calibrationBuckets: z.number().int().min(1).default(10),
      velocityWindow: z.number().int().positive().default(10),
      recomputeIntervalMs: z.number().int().positive().default(5 * 60 * 1000),
      goldenSetPath: z.string().default("data/golden-set.json"),
    })
    .default({}),
  review: z
    .object({
      deadlineMs: z.number().int().positive().default(120_000),
      maxActiveReviews: z.number().int().positive().default(32),
      /** Event logs of settled Reviews kept for replay */
      retainedEventLogs: z.number().int().positive().default(1000),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export function parseEngineConfig(raw: unknown): EngineConfig {
  return engineConfigSchema.parse(raw ?? {});
}
