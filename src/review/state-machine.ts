import { InvalidTransition } from "../errors.js";
import type { ReviewStatus } from "./types.js";

const TRANSITIONS: Record<ReviewStatus, readonly ReviewStatus[]> = {
  pending: ["retrieving", "failed"],
  retrieving: ["analyzing", "failed"],
  analyzing: ["aggregating", "failed"],
  aggregating: ["completed", "failed"],
  completed: [],
  failed: [],
};

export const STAGE_DESCRIPTIONS: Record<ReviewStatus, string> = {
  pending: "Queued for analysis",
  retrieving: "Retrieving repository context",
  analyzing: "Running pattern rules and model analysis",
  aggregating: "Aggregating findings into suggestions",
  completed: "Analysis complete",
  failed: "Analysis failed",
};

export function isTerminal(status: ReviewStatus): status is "completed" | "failed" {
  return status === "completed" || status === "failed";
}

export function canTransition(from: ReviewStatus, to: ReviewStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Throws `InvalidTransition` for any move the lifecycle does not allow */
export function assertTransition(from: ReviewStatus, to: ReviewStatus): void {
  if (!canTransition(from, to)) throw new InvalidTransition(from, to);
}
