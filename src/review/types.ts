export type Severity = "critical" | "high" | "medium" | "low";

export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
};

export interface FileLocation {
  path: string;
  line: number;
}

/** A retrieved snippet of repository context, scoped to one Review */
export interface ContextChunk {
  readonly path: string;
  readonly startLine: number;
  readonly endLine: number;
  readonly text: string;
  /** 0..1 */
  readonly relevance: number;
  readonly origin: "code" | "doc" | "history";
}

/** A raw candidate issue from one source, before aggregation */
export interface Finding {
  id: string;
  origin: "rule" | "model";
  category: string;
  severity: Severity;
  location: FileLocation;
  message: string;
  /** Raw confidence, 0..1 */
  confidence: number;
  patternId?: string;
  modelId?: string;
}

export interface Contribution {
  findingId: string;
  origin: Finding["origin"];
  confidence: number;
  patternId?: string;
  modelId?: string;
}

/** A finalized, deduplicated, confidence-scored issue */
export interface Suggestion {
  readonly id: string;
  readonly category: string;
  readonly severity: Severity;
  readonly location: FileLocation;
  readonly message: string;
  /** Calibrated confidence, 0..1 */
  readonly confidence: number;
  readonly findingIds: readonly string[];
  readonly patternIds: readonly string[];
  readonly modelIds: readonly string[];
  readonly contributions: readonly Contribution[];
}

export type ReviewStatus =
  | "pending"
  | "retrieving"
  | "analyzing"
  | "aggregating"
  | "completed"
  | "failed";

export interface ReviewFailure {
  code: string;
  message: string;
}

export type Degradation =
  | "retrieval_unavailable"
  | "provider_failed"
  | "budget_exhausted"
  | "model_output_malformed"
  | "attempts_exhausted";

export interface ReviewStats {
  contextChunks: number;
  ruleFindings: number;
  modelFindings: number;
  patternErrors: number;
  providerCalls: number;
  cacheHits: number;
  degradations: Degradation[];
}

/** Outcome of a finished run, kept when the Review is regenerated */
export interface RunSummary {
  run: number;
  status: "completed" | "failed";
  suggestionCount: number;
  costEstimate: number;
  durationMs: number;
  error?: ReviewFailure;
}

export interface Review {
  id: string;
  repositoryRef: string;
  diff: string;
  filePaths: string[];
  status: ReviewStatus;
  /** Starts at 1, incremented by every regenerate */
  run: number;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  durationMs: number | null;
  /** Cumulative model cost of the current run, USD */
  costEstimate: number;
  suggestions: Suggestion[];
  stats: ReviewStats;
  error?: ReviewFailure;
  history: RunSummary[];
}

export interface AnalyzeRequest {
  id?: string;
  repositoryRef: string;
  diff: string;
  filePaths?: string[];
}
