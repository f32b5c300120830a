import { readFile } from "node:fs/promises";
import { z } from "zod";
import { parseUnifiedDiff } from "../utils/diff-parser.js";
import { evaluatePatterns } from "../rules/engine.js";
import type { PatternRegistry } from "../rules/registry.js";
import type { FactorSource } from "../rules/types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "golden-set" });

const expectedIssueSchema = z.object({
  path: z.string().min(1),
  line: z.number().int().positive(),
  category: z.string().min(1),
});

const goldenCaseSchema = z.object({
  id: z.string().min(1),
  description: z.string().optional(),
  diff: z.string(),
  filePaths: z.array(z.string()).default([]),
  expected: z.array(expectedIssueSchema),
});

const goldenSetSchema = z.object({
  version: z.literal(1),
  cases: z.array(goldenCaseSchema),
});

export type GoldenCase = z.infer<typeof goldenCaseSchema>;

export interface RecallReport {
  /** Null when the set has no expected issues */
  recall: number | null;
  expected: number;
  matched: number;
  missed: Array<{ caseId: string; path: string; line: number; category: string }>;
}

/** Read and validate a golden set file; null when it is missing or invalid */
export async function loadGoldenSet(path: string): Promise<GoldenCase[] | null> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    log.warn({ err, path }, "Golden set unavailable, recall will not be reported");
    return null;
  }

  const parsed = goldenSetSchema.safeParse(parseJson(content));
  if (!parsed.success) {
    log.warn({ path, issues: parsed.error.issues }, "Golden set is invalid, recall will not be reported");
    return null;
  }
  return parsed.data.cases;
}

/**
 * Known-issue recall of the pattern engine at the current weights. An
 * expected issue counts as found when a finding has the same path and
 * category within `lineTolerance` lines.
 */
export class GoldenSetEvaluator {
  constructor(
    private readonly cases: GoldenCase[],
    private readonly patterns: PatternRegistry,
    private readonly weights: FactorSource,
    private readonly opts: { lineTolerance: number; confidenceFloor: number }
  ) {}

  evaluate(): RecallReport {
    let expected = 0;
    let matched = 0;
    const missed: RecallReport["missed"] = [];

    for (const c of this.cases) {
      const files = parseUnifiedDiff(c.diff, c.filePaths);
      const { findings } = evaluatePatterns(files, [], this.patterns.active(), {
        factors: this.weights,
        confidenceFloor: this.opts.confidenceFloor,
      });

      for (const issue of c.expected) {
        expected++;
        const found = findings.some(
          (f) =>
            f.location.path === issue.path &&
            f.category === issue.category &&
            Math.abs(f.location.line - issue.line) <= this.opts.lineTolerance
        );
        if (found) matched++;
        else missed.push({ caseId: c.id, ...issue });
      }
    }

    return { recall: expected === 0 ? null : matched / expected, expected, matched, missed };
  }
}

function parseJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err) {
    log.warn({ err }, "Golden set is not valid JSON");
    return null;
  }
}
