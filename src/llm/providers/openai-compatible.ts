import { z } from "zod";
import { ProviderError, describeError } from "../../errors.js";
import type { ProviderConfig } from "../../config-loader/schema.js";
import type { CompleteOptions, CompletionResult, ModelTier, PromptPayload } from "../types.js";
import { PricedProvider } from "./base.js";

const DEFAULT_BASE_URL = "https://api.openai.com/v1";

const chatResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable() }) }))
    .min(1),
  usage: z
    .object({ prompt_tokens: z.number(), completion_tokens: z.number() })
    .optional(),
});

/** Any endpoint speaking the chat-completions protocol */
export class OpenAICompatibleProvider extends PricedProvider {
  readonly kind = "openai-compatible";

  constructor(
    config: ProviderConfig,
    private readonly apiKey: string | undefined,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    super(config);
  }

  async complete(payload: PromptPayload, tier: ModelTier, opts: CompleteOptions): Promise<CompletionResult> {
    const url = `${(this.config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "")}/chat/completions`;
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    let body: unknown;
    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers,
        signal: opts.signal,
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: "system", content: payload.system },
            { role: "user", content: payload.user },
          ],
          temperature: payload.temperature,
          max_tokens: Math.min(payload.maxTokens, this.config.maxTokens),
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new ProviderError(this.id, `${response.status} ${response.statusText}: ${errorText.slice(0, 200)}`, {
          tier,
          status: response.status,
        });
      }
      body = await response.json();
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw new ProviderError(this.id, describeError(err), { tier });
    }

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(this.id, "Unexpected chat completion response shape", { tier });
    }

    const text = parsed.data.choices[0].message.content ?? "";
    const inputTokens = parsed.data.usage?.prompt_tokens ?? 0;
    const outputTokens = parsed.data.usage?.completion_tokens ?? 0;
    return {
      text,
      modelId: parsed.data.model ?? this.model,
      inputTokens,
      outputTokens,
      cost: this.costOf(inputTokens, outputTokens),
    };
  }
}
