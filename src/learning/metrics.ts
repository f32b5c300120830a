import type { CategoryMetrics, FeedbackRecord, LearningMetrics } from "./types.js";

export interface MetricsOptions {
  calibrationBuckets: number;
  velocityWindow: number;
  recall: number | null;
  now: Date;
}

/**
 * Derive the metrics snapshot from the full feedback history. Pure: the same
 * records and options always give the same snapshot.
 */
export function computeLearningMetrics(
  records: readonly FeedbackRecord[],
  opts: MetricsOptions
): LearningMetrics {
  const total = records.length;
  const helpfulCount = records.filter((r) => r.helpful).length;
  const precision = ratio(helpfulCount, total);
  const recall = opts.recall;

  return {
    totalFeedback: total,
    helpfulCount,
    helpfulRatio: precision,
    precision,
    recall,
    f1: recall === null ? null : precision + recall === 0 ? 0 : (2 * precision * recall) / (precision + recall),
    calibrationError: calibrationError(records, opts.calibrationBuckets),
    learningVelocity: learningVelocity(records, opts.velocityWindow),
    byCategory: byCategory(records),
    computedAt: opts.now.toISOString(),
  };
}

/**
 * Expected calibration error: records are bucketed by predicted confidence
 * and each bucket's |mean confidence − helpful rate| is weighted by its size.
 */
export function calibrationError(records: readonly FeedbackRecord[], buckets: number): number {
  if (records.length === 0 || buckets < 1) return 0;

  const sums = Array.from({ length: buckets }, () => ({ n: 0, confidence: 0, helpful: 0 }));
  for (const r of records) {
    const c = Math.min(1, Math.max(0, r.confidence));
    const bucket = sums[Math.min(buckets - 1, Math.floor(c * buckets))];
    bucket.n++;
    bucket.confidence += c;
    bucket.helpful += r.helpful ? 1 : 0;
  }

  let error = 0;
  for (const b of sums) {
    if (b.n === 0) continue;
    error += (b.n / records.length) * Math.abs(b.confidence / b.n - b.helpful / b.n);
  }
  return error;
}

/** Precision of the last `window` records minus that of the `window` before; 0 until both exist */
export function learningVelocity(records: readonly FeedbackRecord[], window: number): number {
  if (window < 1 || records.length < 2 * window) return 0;
  const latest = records.slice(-window);
  const previous = records.slice(-2 * window, -window);
  return helpfulRate(latest) - helpfulRate(previous);
}

function byCategory(records: readonly FeedbackRecord[]): Record<string, CategoryMetrics> {
  const result: Record<string, CategoryMetrics> = {};
  for (const r of records) {
    const entry = result[r.category] ?? { total: 0, helpful: 0, helpfulRatio: 0 };
    entry.total++;
    if (r.helpful) entry.helpful++;
    entry.helpfulRatio = entry.helpful / entry.total;
    result[r.category] = entry;
  }
  return result;
}

function helpfulRate(records: readonly FeedbackRecord[]): number {
  return ratio(records.filter((r) => r.helpful).length, records.length);
}

function ratio(n: number, d: number): number {
  return d === 0 ? 0 : n / d;
}
