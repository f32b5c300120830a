import { createHash } from "node:crypto";
import { BudgetExhausted, ProviderTimeout } from "../errors.js";
import type { EngineConfig } from "../config-loader/schema.js";
import type { ParsedFile } from "../utils/diff-parser.js";
import { withTimeout } from "../utils/abort.js";
import { createChildLogger } from "../utils/logger.js";
import type { ContextChunk, Degradation, Finding } from "../review/types.js";
import type { CostBudget } from "./budget.js";
import { fingerprint, type ResponseCache } from "./cache.js";
import { fitToBudget } from "./chunker.js";
import { parseDetailed, parseTriage, type ModelFinding } from "./parser.js";
import { PROMPT_TEMPLATE_VERSION, buildDetailedPrompt, buildTriagePrompt, buildUserPrompt } from "./prompts.js";
import type { ProviderRegistry } from "./providers/registry.js";
import { estimateTokens, type ModelTier, type PromptPayload } from "./types.js";

const log = createChildLogger({ module: "model-orchestrator" });

export type ModelSettings = EngineConfig["models"];

export interface ModelAnalysis {
  findings: Finding[];
  /** USD spent on provider calls in this analysis */
  cost: number;
  providerCalls: number;
  cacheHits: number;
  degradations: Degradation[];
  escalated: boolean;
}

interface TierResponse {
  text: string;
  modelId: string;
  /** USD charged for this response; 0 when served from cache */
  cost: number;
  fingerprint: string;
  cached: boolean;
}

/** Mutable tallies for one `analyze` call */
interface Tally {
  cost: number;
  providerCalls: number;
  cacheHits: number;
  degradations: Set<Degradation>;
}

/**
 * Two-tier model analysis: a triage call decides whether the diff is worth
 * a detailed call. Every tier goes through the response cache first, then
 * its primary provider, then its fallback. Provider failures and malformed
 * output degrade to zero model findings; only cancellation propagates.
 */
export class ModelOrchestrator {
  constructor(
    private readonly providers: ProviderRegistry,
    private readonly cache: ResponseCache,
    private readonly settings: ModelSettings
  ) {}

  get enabled(): boolean {
    return this.providers.forTier("triage") !== null || this.providers.forTier("detailed") !== null;
  }

  async analyze(
    files: ParsedFile[],
    context: readonly ContextChunk[],
    budget: CostBudget,
    signal?: AbortSignal
  ): Promise<ModelAnalysis> {
    const tally: Tally = { cost: 0, providerCalls: 0, cacheHits: 0, degradations: new Set() };
    const finish = (findings: Finding[], escalated: boolean): ModelAnalysis => ({
      findings,
      cost: tally.cost,
      providerCalls: tally.providerCalls,
      cacheHits: tally.cacheHits,
      degradations: [...tally.degradations],
      escalated,
    });

    if (!this.enabled) return finish([], false);

    const fitted = fitToBudget(files, this.settings.maxPromptTokens);
    if (fitted.files.length === 0) return finish([], false);
    if (fitted.omitted.length > 0) {
      log.info({ omitted: fitted.omitted }, "Files left out of the model prompt to fit the token budget");
    }
    const user = buildUserPrompt(fitted.files, context);

    let categories: string[] = [];
    if (this.providers.forTier("triage")) {
      const triage = await this.callTier("triage", buildTriagePrompt(), user, context, budget, tally, signal);
      if (!triage) return finish([], false);

      const verdict = parseTriage(triage.text);
      if (!verdict) {
        log.warn({ modelId: triage.modelId }, "Malformed triage output");
        tally.degradations.add("model_output_malformed");
        return finish([], false);
      }
      if (!triage.cached) await this.remember(triage);
      if (!verdict.hasIssues) return finish([], false);
      categories = verdict.categories;
    }

    if (!this.providers.forTier("detailed")) return finish([], false);

    const detailed = await this.callTier("detailed", buildDetailedPrompt(categories), user, context, budget, tally, signal);
    if (!detailed) return finish([], true);

    const parsed = parseDetailed(detailed.text);
    if (!parsed) {
      log.warn({ modelId: detailed.modelId }, "Malformed detailed output");
      tally.degradations.add("model_output_malformed");
      return finish([], true);
    }
    if (parsed.dropped > 0) {
      log.warn({ modelId: detailed.modelId, dropped: parsed.dropped }, "Dropped malformed model findings");
    }
    if (!detailed.cached) await this.remember(detailed);

    const inDiff = new Set(fitted.files.map((f) => f.filename));
    const findings = parsed.findings
      .filter((f) => inDiff.has(f.path))
      .map((f) => toFinding(f, detailed.modelId));

    log.info({ findings: findings.length, cost: tally.cost, calls: tally.providerCalls }, "Model analysis complete");
    return finish(findings, true);
  }

  // Only well-formed responses are cached
  private remember(response: TierResponse): Promise<void> {
    return this.cache.save(response.fingerprint, {
      text: response.text,
      modelId: response.modelId,
      cost: response.cost,
    });
  }

  /**
   * Serve a tier from cache, else its primary then fallback provider, each
   * gated by the attempt cap and remaining budget. Null when nothing answered.
   */
  private async callTier(
    tier: ModelTier,
    system: string,
    user: string,
    context: readonly ContextChunk[],
    budget: CostBudget,
    tally: Tally,
    signal?: AbortSignal
  ): Promise<TierResponse | null> {
    const tierProviders = this.providers.forTier(tier);
    if (!tierProviders) return null;

    const key = fingerprint(tier, PROMPT_TEMPLATE_VERSION, user, context, system);
    const cached = await this.cache.lookup(key);
    if (cached) {
      tally.cacheHits++;
      return { text: cached.text, modelId: cached.modelId, cost: 0, fingerprint: key, cached: true };
    }

    const payload: PromptPayload = {
      system,
      user,
      maxTokens: tier === "triage" ? 256 : 4096,
      temperature: this.settings.temperature,
    };
    const promptTokens = estimateTokens(system) + estimateTokens(user);
    const candidates = tierProviders.fallback
      ? [tierProviders.primary, tierProviders.fallback]
      : [tierProviders.primary];

    for (const provider of candidates) {
      if (budget.attemptsExhausted) {
        log.warn({ tier, attempts: budget.attempts }, "Model attempt cap reached");
        tally.degradations.add("attempts_exhausted");
        return null;
      }
      if (!budget.canAfford(provider.estimateInputCost(promptTokens))) {
        const err = new BudgetExhausted(budget.spent, budget.limitUsd);
        log.warn({ err, tier, providerId: provider.id }, "Skipping model call");
        tally.degradations.add("budget_exhausted");
        return null;
      }

      budget.recordAttempt();
      tally.providerCalls++;
      const timeoutMs = this.settings.timeoutMs;
      try {
        const result = await withTimeout(
          (s) => provider.complete(payload, tier, { timeoutMs, signal: s }),
          timeoutMs,
          () => new ProviderTimeout(provider.id, timeoutMs),
          signal
        );
        budget.charge(result.cost);
        tally.cost += result.cost;
        log.debug({ tier, providerId: provider.id, cost: result.cost }, "Provider call complete");
        return { text: result.text, modelId: result.modelId, cost: result.cost, fingerprint: key, cached: false };
      } catch (err) {
        if (signal?.aborted) throw err;
        log.warn({ err, tier, providerId: provider.id }, "Provider call failed");
        tally.degradations.add("provider_failed");
      }
    }

    return null;
  }
}

export function modelFindingId(modelId: string, f: ModelFinding): string {
  const hash = createHash("sha256")
    .update(`${modelId}\0${f.path}\0${f.line}\0${f.category}\0${f.message}`)
    .digest("hex");
  return `model_${hash.slice(0, 16)}`;
}

function toFinding(f: ModelFinding, modelId: string): Finding {
  return {
    id: modelFindingId(modelId, f),
    origin: "model",
    category: f.category.toLowerCase(),
    severity: f.severity,
    location: { path: f.path, line: f.line },
    message: f.message,
    confidence: f.confidence,
    modelId,
  };
}
