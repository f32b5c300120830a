import type { ProviderConfig } from "../../config-loader/schema.js";
import type { CompleteOptions, CompletionResult, ModelProvider, ModelTier, PromptPayload } from "../types.js";

const PER_MILLION = 1_000_000;

export abstract class PricedProvider implements ModelProvider {
  readonly id: string;
  readonly model: string;
  abstract readonly kind: ProviderConfig["kind"];

  constructor(protected readonly config: ProviderConfig) {
    this.id = config.id;
    this.model = config.model;
  }

  estimateInputCost(inputTokens: number): number {
    return (inputTokens * this.config.inputCostPerMTok) / PER_MILLION;
  }

  protected costOf(inputTokens: number, outputTokens: number): number {
    return (
      (inputTokens * this.config.inputCostPerMTok + outputTokens * this.config.outputCostPerMTok) /
      PER_MILLION
    );
  }

  abstract complete(payload: PromptPayload, tier: ModelTier, opts: CompleteOptions): Promise<CompletionResult>;
}
