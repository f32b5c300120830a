import { createHash } from "node:crypto";
import type { ParsedFile } from "../utils/diff-parser.js";
import type { ContextChunk, Finding } from "../review/types.js";
import type { FactorSource, Pattern } from "./types.js";
import { PatternEvaluationError } from "../errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "pattern-engine" });

export const FACTOR_CEILING = 1.0;

export interface PatternEvaluation {
  findings: Finding[];
  evaluated: number;
  errors: PatternEvaluationError[];
}

export interface EvaluateOptions {
  factors: FactorSource;
  /** Lower clamp for the feedback-adjusted factor */
  confidenceFloor: number;
}

/**
 * Run every active pattern against every changed file. Output depends only
 * on the files, the pattern set and the current factors: findings are
 * ordered by path, line and pattern id, and ids are content hashes.
 */
export function evaluatePatterns(
  files: ParsedFile[],
  context: readonly ContextChunk[],
  patterns: Pattern[],
  opts: EvaluateOptions
): PatternEvaluation {
  const findings: Finding[] = [];
  const errors: PatternEvaluationError[] = [];
  let evaluated = 0;

  const orderedPatterns = patterns
    .filter((p) => p.active)
    .sort((a, b) => a.id.localeCompare(b.id));
  const orderedFiles = [...files].sort((a, b) => a.filename.localeCompare(b.filename));

  for (const pattern of orderedPatterns) {
    const confidence = patternConfidence(pattern, opts.factors.factor(pattern.id), opts.confidenceFloor);

    for (const file of orderedFiles) {
      try {
        const matches = pattern.evaluate({ file, allFiles: files, context });
        for (const match of matches) {
          findings.push({
            id: ruleFindingId(pattern.id, file.filename, match.line),
            origin: "rule",
            category: pattern.category,
            severity: pattern.severity,
            location: { path: file.filename, line: match.line },
            message: match.message,
            confidence,
            patternId: pattern.id,
          });
        }
        evaluated++;
      } catch (err) {
        const failure = new PatternEvaluationError(pattern.id, file.filename, err);
        errors.push(failure);
        log.warn({ err, pattern: pattern.id, file: file.filename }, "Pattern evaluation failed, skipped");
      }
    }
  }

  findings.sort(
    (a, b) =>
      a.location.path.localeCompare(b.location.path) ||
      a.location.line - b.location.line ||
      (a.patternId ?? "").localeCompare(b.patternId ?? "")
  );

  log.info(
    { evaluated, findings: findings.length, errors: errors.length, files: files.length },
    "Pattern evaluation complete"
  );
  return { findings, evaluated, errors };
}

/** base weight × feedback factor, with the factor clamped to [floor, 1] */
export function patternConfidence(pattern: Pattern, factor: number, floor: number): number {
  const clamped = Math.min(FACTOR_CEILING, Math.max(floor, factor));
  return Math.min(1, Math.max(0, pattern.baseWeight * clamped));
}

function ruleFindingId(patternId: string, path: string, line: number): string {
  const hash = createHash("sha256").update(`${patternId}\0${path}\0${line}`).digest("hex");
  return `rule_${hash.slice(0, 16)}`;
}
