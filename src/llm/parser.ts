import { z } from "zod";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "llm-parser" });

const severityField = z
  .string()
  .transform((s) => s.toLowerCase())
  .pipe(z.enum(["critical", "high", "medium", "low"]))
  .catch("medium");

export const triageResponseSchema = z.object({
  hasIssues: z.boolean(),
  categories: z.array(z.string()).default([]),
});

export const modelFindingSchema = z.object({
  path: z.string().min(1),
  line: z.number().int().positive(),
  category: z.string().min(1),
  severity: severityField,
  message: z.string().min(1),
  confidence: z.number().min(0).max(1),
});

const detailedEnvelopeSchema = z.object({
  findings: z.array(z.unknown()),
});

export type TriageResponse = z.infer<typeof triageResponseSchema>;
export type ModelFinding = z.infer<typeof modelFindingSchema>;

export interface DetailedResponse {
  findings: ModelFinding[];
  /** Entries that did not match the finding shape */
  dropped: number;
}

const FENCED = /```(?:json)?\s*\n?([\s\S]*?)```/;

/** Pull a JSON value out of model text: a fenced block, or the outermost braces */
export function extractJson(text: string): unknown {
  const candidates: string[] = [];
  const fenced = FENCED.exec(text);
  if (fenced) candidates.push(fenced[1]);
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start !== -1 && end > start) candidates.push(text.slice(start, end + 1));

  for (const candidate of candidates) {
    const parsed = tryParse(candidate.trim());
    if (parsed.ok) return parsed.value;
  }
  return null;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    log.debug({ err }, "Candidate is not valid JSON");
    return { ok: false };
  }
}

export function parseTriage(text: string): TriageResponse | null {
  const parsed = triageResponseSchema.safeParse(extractJson(text));
  return parsed.success ? parsed.data : null;
}

/** Null when the envelope is malformed; individual bad entries are dropped */
export function parseDetailed(text: string): DetailedResponse | null {
  const envelope = detailedEnvelopeSchema.safeParse(extractJson(text));
  if (!envelope.success) return null;

  const findings: ModelFinding[] = [];
  let dropped = 0;
  for (const entry of envelope.data.findings) {
    const parsed = modelFindingSchema.safeParse(entry);
    if (parsed.success) findings.push(parsed.data);
    else dropped++;
  }
  return { findings, dropped };
}
