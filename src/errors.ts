/**
 * Error hierarchy for the analysis engine.
 *
 * Every failure the engine can contain or report carries a stable `code`.
 * Sub-component errors (retrieval, provider, pattern, budget) are downgraded
 * to partial results by their callers; only the Review-level errors end a run.
 */

export type ErrorCode =
  | "retrieval_unavailable"
  | "provider_timeout"
  | "provider_error"
  | "pattern_error"
  | "budget_exhausted"
  | "timeout"
  | "cancelled"
  | "conflict"
  | "not_found"
  | "unknown_suggestion"
  | "duplicate_feedback"
  | "invalid_transition"
  | "analysis_failed"
  | "config_error";

export class EngineError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "EngineError";
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class RetrievalUnavailable extends EngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "retrieval_unavailable", context);
    this.name = "RetrievalUnavailable";
  }
}

export class ProviderTimeout extends EngineError {
  constructor(providerId: string, timeoutMs: number) {
    super(
      `Provider ${providerId} did not respond within ${timeoutMs}ms`,
      "provider_timeout",
      { providerId, timeoutMs }
    );
    this.name = "ProviderTimeout";
  }
}

export class ProviderError extends EngineError {
  constructor(
    providerId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(`Provider ${providerId} failed: ${message}`, "provider_error", {
      providerId,
      ...context,
    });
    this.name = "ProviderError";
  }
}

export class PatternEvaluationError extends EngineError {
  constructor(patternId: string, filePath: string, cause: unknown) {
    super(
      `Pattern ${patternId} failed on ${filePath}: ${describeError(cause)}`,
      "pattern_error",
      { patternId, filePath }
    );
    this.name = "PatternEvaluationError";
  }
}

export class BudgetExhausted extends EngineError {
  constructor(spentUsd: number, limitUsd: number) {
    super(
      `Cost budget exhausted ($${spentUsd.toFixed(4)} of $${limitUsd.toFixed(4)})`,
      "budget_exhausted",
      { spentUsd, limitUsd }
    );
    this.name = "BudgetExhausted";
  }
}

export class ReviewTimeout extends EngineError {
  constructor(reviewId: string, deadlineMs: number) {
    super(
      `Review ${reviewId} exceeded its ${deadlineMs}ms deadline`,
      "timeout",
      { reviewId, deadlineMs }
    );
    this.name = "ReviewTimeout";
  }
}

export class ReviewCancelled extends EngineError {
  constructor(reviewId: string) {
    super(`Review ${reviewId} was cancelled`, "cancelled", { reviewId });
    this.name = "ReviewCancelled";
  }
}

export class ReviewConflict extends EngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "conflict", context);
    this.name = "ReviewConflict";
  }
}

export class ReviewNotFound extends EngineError {
  constructor(reviewId: string) {
    super(`Review ${reviewId} not found`, "not_found", { reviewId });
    this.name = "ReviewNotFound";
  }
}

export class UnknownSuggestion extends EngineError {
  constructor(suggestionId: string) {
    super(`Suggestion ${suggestionId} not found`, "unknown_suggestion", {
      suggestionId,
    });
    this.name = "UnknownSuggestion";
  }
}

export class DuplicateFeedback extends EngineError {
  constructor(feedbackId: string) {
    super(`Feedback ${feedbackId} was already recorded`, "duplicate_feedback", {
      feedbackId,
    });
    this.name = "DuplicateFeedback";
  }
}

export class InvalidTransition extends EngineError {
  constructor(from: string, to: string) {
    super(`Invalid review transition ${from} -> ${to}`, "invalid_transition", {
      from,
      to,
    });
    this.name = "InvalidTransition";
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "config_error", context);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
