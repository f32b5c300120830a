import type { FactorSource } from "../rules/types.js";

export interface PatternWeight {
  patternId: string;
  /** Feedback-adjusted factor applied to the pattern's base weight */
  factor: number;
  helpful: number;
  unhelpful: number;
  updatedAt: string;
}

export interface WeightUpdateOptions {
  learningRate: number;
  floor: number;
}

export const NEUTRAL_FACTOR = 1.0;

/**
 * Exponential moving average toward 1.0 on helpful feedback and toward
 * `floor` on unhelpful feedback. The result never leaves [floor, 1].
 */
export function nextFactor(current: number, helpful: boolean, opts: WeightUpdateOptions): number {
  const target = helpful ? NEUTRAL_FACTOR : opts.floor;
  const next = current + opts.learningRate * (target - current);
  return Math.min(NEUTRAL_FACTOR, Math.max(opts.floor, next));
}

/**
 * Per-pattern factors shared by concurrent Reviews. Each entry is replaced
 * whole on update, so readers never observe a partial write.
 */
export class PatternWeightTable implements FactorSource {
  private readonly entries = new Map<string, PatternWeight>();

  constructor(initial: PatternWeight[] = []) {
    for (const weight of initial) this.entries.set(weight.patternId, { ...weight });
  }

  factor(patternId: string): number {
    return this.entries.get(patternId)?.factor ?? NEUTRAL_FACTOR;
  }

  get(patternId: string): PatternWeight | undefined {
    const entry = this.entries.get(patternId);
    return entry ? { ...entry } : undefined;
  }

  apply(patternId: string, helpful: boolean, opts: WeightUpdateOptions, at = new Date()): PatternWeight {
    const current = this.entries.get(patternId);
    const updated: PatternWeight = {
      patternId,
      factor: nextFactor(current?.factor ?? NEUTRAL_FACTOR, helpful, opts),
      helpful: (current?.helpful ?? 0) + (helpful ? 1 : 0),
      unhelpful: (current?.unhelpful ?? 0) + (helpful ? 0 : 1),
      updatedAt: at.toISOString(),
    };
    this.entries.set(patternId, updated);
    return { ...updated };
  }

  snapshot(): PatternWeight[] {
    return [...this.entries.values()]
      .map((w) => ({ ...w }))
      .sort((a, b) => a.patternId.localeCompare(b.patternId));
  }

  /** Swap in a freshly computed table, e.g. after replaying history */
  replaceAll(weights: PatternWeight[]): void {
    this.entries.clear();
    for (const weight of weights) this.entries.set(weight.patternId, { ...weight });
  }
}
