import Anthropic from "@anthropic-ai/sdk";
import { ProviderError, describeError } from "../../errors.js";
import type { ProviderConfig } from "../../config-loader/schema.js";
import type { CompleteOptions, CompletionResult, ModelTier, PromptPayload } from "../types.js";
import { PricedProvider } from "./base.js";

/** Anthropic Messages API */
export class AnthropicProvider extends PricedProvider {
  readonly kind = "anthropic";

  constructor(config: ProviderConfig, private readonly client: Anthropic) {
    super(config);
  }

  async complete(payload: PromptPayload, tier: ModelTier, opts: CompleteOptions): Promise<CompletionResult> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: Math.min(payload.maxTokens, this.config.maxTokens),
          temperature: payload.temperature,
          system: payload.system,
          messages: [{ role: "user", content: payload.user }],
        },
        { signal: opts.signal, timeout: opts.timeoutMs, maxRetries: 0 }
      );
    } catch (err) {
      throw new ProviderError(this.id, describeError(err), {
        tier,
        status: err instanceof Anthropic.APIError ? err.status : undefined,
      });
    }

    const text = response.content
      .filter((b): b is Anthropic.TextBlock => b.type === "text")
      .map((b) => b.text)
      .join("");

    const { input_tokens: inputTokens, output_tokens: outputTokens } = response.usage;
    return {
      text,
      modelId: response.model,
      inputTokens,
      outputTokens,
      cost: this.costOf(inputTokens, outputTokens),
    };
  }
}
