import { parseEngineConfig, type EngineConfig } from "../config-loader/schema.js";

/**
 * Built-in engine settings. The configuration file is merged over these
 * before validation, so every key here can be overridden.
 */
export const DEFAULT_RAW_CONFIG = {
  patterns: {
    "magic-number": { active: false },
  },
  providers: [
    {
      id: "anthropic-fast",
      kind: "anthropic",
      model: "claude-3-5-haiku-20241022",
      inputCostPerMTok: 0.8,
      outputCostPerMTok: 4,
      maxTokens: 1024,
    },
    {
      id: "anthropic-deep",
      kind: "anthropic",
      model: "claude-sonnet-4-20250514",
      inputCostPerMTok: 3,
      outputCostPerMTok: 15,
      maxTokens: 4096,
    },
  ],
  tiers: {
    triage: { primary: "anthropic-fast", fallback: "anthropic-deep" },
    detailed: { primary: "anthropic-deep", fallback: "anthropic-fast" },
  },
} as const;

export const DEFAULT_CONFIG: EngineConfig = parseEngineConfig(DEFAULT_RAW_CONFIG);
