import { randomUUID } from "node:crypto";
import { SEVERITY_RANK, type Contribution, type Finding, type Suggestion } from "./types.js";

export interface AggregateOptions {
  /** Upper bound on any Suggestion's confidence */
  maxConfidence: number;
  /** Minimum token Jaccard similarity for two messages to describe the same issue */
  similarityThreshold: number;
  /** Maximum line distance between findings in one group */
  lineTolerance: number;
  newId?: () => string;
}

/**
 * Merge overlapping findings into Suggestions.
 *
 * Findings join a group when they share path and category, sit within
 * `lineTolerance` lines of a member, and their message is similar enough to
 * a member's. A group never holds two findings from the same pattern or
 * model. Combined confidence is the noisy-or `1 - ∏(1 - c)`, capped at
 * `maxConfidence`.
 */
export function aggregate(findings: readonly Finding[], opts: AggregateOptions): Suggestion[] {
  const newId = opts.newId ?? randomUUID;
  const groups: Finding[][] = [];

  for (const finding of [...findings].sort(compareFindings)) {
    const group = groups.find((g) => joins(g, finding, opts));
    if (group) group.push(finding);
    else groups.push([finding]);
  }

  return groups
    .map((group) => toSuggestion(group, opts.maxConfidence, newId()))
    .sort(compareSuggestions);
}

export function combineConfidence(confidences: readonly number[], cap: number): number {
  let miss = 1;
  for (const c of confidences) miss *= 1 - clamp01(c);
  return clamp01(Math.min(cap, 1 - miss));
}

export function messageSimilarity(a: string, b: string): number {
  const ta = tokenize(a);
  const tb = tokenize(b);
  if (ta.size === 0 && tb.size === 0) return 1;
  let shared = 0;
  for (const t of ta) if (tb.has(t)) shared++;
  return shared / (ta.size + tb.size - shared);
}

function joins(group: Finding[], finding: Finding, opts: AggregateOptions): boolean {
  const source = sourceKey(finding);
  if (group.some((m) => sourceKey(m) === source)) return false;

  return group.some(
    (m) =>
      m.location.path === finding.location.path &&
      m.category === finding.category &&
      Math.abs(m.location.line - finding.location.line) <= opts.lineTolerance &&
      messageSimilarity(m.message, finding.message) >= opts.similarityThreshold
  );
}

function sourceKey(f: Finding): string {
  if (f.origin === "rule") return `rule:${f.patternId ?? f.id}`;
  return `model:${f.modelId ?? f.id}`;
}

function toSuggestion(group: Finding[], cap: number, id: string): Suggestion {
  const lead = [...group].sort(
    (a, b) => b.confidence - a.confidence || SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity]
  )[0];
  const severity = group.reduce(
    (max, f) => (SEVERITY_RANK[f.severity] > SEVERITY_RANK[max] ? f.severity : max),
    lead.severity
  );

  const contributions: Contribution[] = group.map((f) => ({
    findingId: f.id,
    origin: f.origin,
    confidence: f.confidence,
    ...(f.patternId !== undefined ? { patternId: f.patternId } : {}),
    ...(f.modelId !== undefined ? { modelId: f.modelId } : {}),
  }));

  return {
    id,
    category: lead.category,
    severity,
    location: { ...lead.location },
    message: lead.message,
    confidence: combineConfidence(
      group.map((f) => f.confidence),
      cap
    ),
    findingIds: group.map((f) => f.id),
    patternIds: unique(group.map((f) => f.patternId)),
    modelIds: unique(group.map((f) => f.modelId)),
    contributions,
  };
}

function compareFindings(a: Finding, b: Finding): number {
  return (
    a.location.path.localeCompare(b.location.path) ||
    a.location.line - b.location.line ||
    a.category.localeCompare(b.category) ||
    a.origin.localeCompare(b.origin) ||
    a.id.localeCompare(b.id)
  );
}

function compareSuggestions(a: Suggestion, b: Suggestion): number {
  return (
    b.confidence - a.confidence ||
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    a.location.path.localeCompare(b.location.path) ||
    a.location.line - b.location.line ||
    a.message.localeCompare(b.message)
  );
}

function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^a-z0-9]+/).filter((t) => t.length > 1));
}

function unique(values: Array<string | undefined>): string[] {
  const set = new Set<string>();
  for (const v of values) if (v !== undefined) set.add(v);
  return [...set].sort();
}

function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}
