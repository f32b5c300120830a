import Anthropic from "@anthropic-ai/sdk";
import { ConfigError } from "../../errors.js";
import type { EngineConfig, TierConfig } from "../../config-loader/schema.js";
import { createChildLogger } from "../../utils/logger.js";
import type { ModelProvider, ModelTier } from "../types.js";
import { AnthropicProvider } from "./anthropic.js";
import { OpenAICompatibleProvider } from "./openai-compatible.js";

const log = createChildLogger({ module: "provider-registry" });

export interface ProviderCredentials {
  anthropicApiKey?: string;
  openaiApiKey?: string;
}

export interface TierProviders {
  primary: ModelProvider;
  fallback: ModelProvider | null;
}

/** Providers keyed by id, plus the tier assignment from configuration */
export class ProviderRegistry {
  private readonly providers = new Map<string, ModelProvider>();
  private readonly tiers = new Map<ModelTier, TierConfig>();

  register(provider: ModelProvider): void {
    if (this.providers.has(provider.id)) {
      throw new ConfigError(`Duplicate provider id: ${provider.id}`, { providerId: provider.id });
    }
    this.providers.set(provider.id, provider);
  }

  get(id: string): ModelProvider | undefined {
    return this.providers.get(id);
  }

  list(): ModelProvider[] {
    return [...this.providers.values()];
  }

  assignTier(tier: ModelTier, config: TierConfig): void {
    if (!this.providers.has(config.primary)) {
      throw new ConfigError(`Tier ${tier} references unknown provider ${config.primary}`, { tier });
    }
    if (config.fallback && !this.providers.has(config.fallback)) {
      throw new ConfigError(`Tier ${tier} references unknown fallback ${config.fallback}`, { tier });
    }
    this.tiers.set(tier, config);
  }

  /** Resolve a tier to concrete providers, or null when the tier is unassigned */
  forTier(tier: ModelTier): TierProviders | null {
    const config = this.tiers.get(tier);
    if (!config) return null;
    const primary = this.providers.get(config.primary);
    if (!primary) return null;
    const fallback = config.fallback ? this.providers.get(config.fallback) ?? null : null;
    return { primary, fallback };
  }
}

/**
 * Build providers and tiers from configuration. Anthropic providers are
 * skipped when no API key is present, and tiers left without a usable
 * primary are unassigned.
 */
export function buildProviderRegistry(config: EngineConfig, creds: ProviderCredentials): ProviderRegistry {
  const registry = new ProviderRegistry();
  let anthropic: Anthropic | null = null;

  for (const provider of config.providers) {
    if (provider.kind === "anthropic") {
      if (!creds.anthropicApiKey) {
        log.warn({ providerId: provider.id }, "ANTHROPIC_API_KEY not set, provider disabled");
        continue;
      }
      anthropic ??= new Anthropic({ apiKey: creds.anthropicApiKey });
      registry.register(new AnthropicProvider(provider, anthropic));
    } else {
      registry.register(new OpenAICompatibleProvider(provider, creds.openaiApiKey));
    }
  }

  const tierNames: ModelTier[] = ["triage", "detailed"];
  for (const tier of tierNames) {
    const tierConfig = config.tiers[tier];
    if (!tierConfig) continue;
    const primary = registry.get(tierConfig.primary) ? tierConfig.primary : tierConfig.fallback;
    if (!primary || !registry.get(primary)) {
      log.warn({ tier }, "No usable provider for tier, model analysis disabled for it");
      continue;
    }
    const fallback =
      primary !== tierConfig.primary || !tierConfig.fallback || !registry.get(tierConfig.fallback)
        ? undefined
        : tierConfig.fallback;
    registry.assignTier(tier, { primary, fallback });
  }

  return registry;
}
