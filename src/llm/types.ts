import type { ProviderConfig } from "../config-loader/schema.js";

export type ModelTier = "triage" | "detailed";

export interface PromptPayload {
  system: string;
  user: string;
  maxTokens: number;
  temperature: number;
}

export interface CompletionResult {
  text: string;
  modelId: string;
  inputTokens: number;
  outputTokens: number;
  /** USD */
  cost: number;
}

export interface CompleteOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Uniform capability every model provider exposes. Implementations throw
 * `ProviderError` on failure; the caller enforces the timeout.
 */
export interface ModelProvider {
  readonly id: string;
  readonly kind: ProviderConfig["kind"];
  readonly model: string;
  /** Cost of `inputTokens` at this provider's input price, in USD */
  estimateInputCost(inputTokens: number): number;
  complete(payload: PromptPayload, tier: ModelTier, opts: CompleteOptions): Promise<CompletionResult>;
}

export const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
