import type {
  CompleteOptions,
  CompletionResult,
  ModelProvider,
  ModelTier,
  PromptPayload,
} from "../../src/llm/types.js";

export type Responder = (payload: PromptPayload, tier: ModelTier, opts: CompleteOptions) => Promise<CompletionResult>;

/** Scripted provider; records every call it receives */
export class FakeProvider implements ModelProvider {
  readonly kind = "openai-compatible";
  readonly model: string;
  readonly calls: ModelTier[] = [];

  constructor(
    readonly id: string,
    private readonly respond: Responder,
    private readonly pricePerToken = 0
  ) {
    this.model = `${id}-model`;
  }

  estimateInputCost(inputTokens: number): number {
    return inputTokens * this.pricePerToken;
  }

  complete(payload: PromptPayload, tier: ModelTier, opts: CompleteOptions): Promise<CompletionResult> {
    this.calls.push(tier);
    return this.respond(payload, tier, opts);
  }
}

export function replies(byTier: Partial<Record<ModelTier, string>>, cost = 0.001): Responder {
  return async (_payload, tier) => ({
    text: byTier[tier] ?? "",
    modelId: "fake-model",
    inputTokens: 100,
    outputTokens: 20,
    cost,
  });
}

/** Never answers; rejects once the call is aborted */
export const hangs: Responder = (_payload, _tier, opts) =>
  new Promise((_resolve, reject) => {
    opts.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });

export const fails: Responder = async () => {
  throw new Error("upstream 503");
};

export const TRIAGE_YES = '{"hasIssues": true, "categories": ["security"]}';
export const TRIAGE_NO = '{"hasIssues": false, "categories": []}';

export const DETAILED_DB = `Here is my review:
\`\`\`json
{
  "findings": [
    {"path": "src/db.ts", "line": 2, "category": "Security", "severity": "HIGH", "message": "Possible SQL injection: the query text is built from the user id. Use parameterized queries.", "confidence": 0.8},
    {"path": "src/elsewhere.ts", "line": 1, "category": "bugs", "severity": "low", "message": "Not part of this change.", "confidence": 0.6},
    {"path": "src/db.ts", "line": 0, "category": "bugs", "message": "Bad line number.", "confidence": 0.5}
  ]
}
\`\`\``;
