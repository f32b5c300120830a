import type { ParsedFile } from "../utils/diff-parser.js";
import type { ContextChunk, Severity } from "../review/types.js";

export interface PatternContext {
  file: ParsedFile;
  /** All files in the diff, for cross-file patterns such as missing-tests */
  allFiles: ParsedFile[];
  /** Retrieved repository context for this Review */
  context: readonly ContextChunk[];
}

export interface PatternMatch {
  line: number;
  message: string;
}

/**
 * A named detection rule. `kind` tags how the rule was defined; every kind
 * exposes the same `evaluate` capability and is looked up by `id`.
 */
export interface Pattern {
  id: string;
  name: string;
  description: string;
  kind: "builtin" | "regex";
  category: string;
  severity: Severity;
  /** Rule-intrinsic confidence before feedback adjustment, 0..1 */
  baseWeight: number;
  active: boolean;
  evaluate(ctx: PatternContext): PatternMatch[];
}

/** Read access to the feedback-adjusted factor of each pattern */
export interface FactorSource {
  factor(patternId: string): number;
}
