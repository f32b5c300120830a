import type { ReviewFailure, ReviewStatus, Suggestion } from "./types.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "review-events" });

interface EventBase {
  reviewId: string;
  run: number;
  /** Monotonic per Review id, across runs */
  seq: number;
  at: string;
}

export type ProgressEvent = EventBase & {
  type: "progress";
  status: ReviewStatus;
  stage: string;
};

export type CompleteEvent = EventBase & {
  type: "complete";
  status: "completed" | "failed";
  suggestions: Suggestion[];
  error?: ReviewFailure;
};

export type ReviewEvent = ProgressEvent | CompleteEvent;

type Unsequenced<T> = T extends ReviewEvent ? Omit<T, "seq" | "at"> : never;

export type ReviewEventListener = (event: ReviewEvent) => void;

/**
 * Ordered event log per Review id, readable by any transport. At most one
 * `complete` event is appended per run. Only the `retainSettled` most
 * recently settled Reviews keep their logs; a Review with a run in flight
 * is never trimmed.
 */
export class ReviewEventLog {
  private readonly logs = new Map<string, ReviewEvent[]>();
  private readonly listeners = new Map<string, Set<ReviewEventListener>>();
  /** Ids whose latest event is `complete`, oldest first */
  private readonly settled = new Set<string>();

  constructor(
    private readonly now: () => Date = () => new Date(),
    private readonly retainSettled = 1000
  ) {}

  emit(event: Unsequenced<ReviewEvent>): ReviewEvent | null {
    const entries = this.logs.get(event.reviewId) ?? [];
    if (
      event.type === "complete" &&
      entries.some((e) => e.type === "complete" && e.run === event.run)
    ) {
      log.debug({ reviewId: event.reviewId, run: event.run }, "Complete event already emitted for run");
      return null;
    }

    const sequenced: ReviewEvent = {
      ...event,
      seq: entries.length + 1,
      at: this.now().toISOString(),
    };
    entries.push(sequenced);
    this.logs.set(event.reviewId, entries);
    this.settled.delete(event.reviewId);
    if (event.type === "complete") {
      this.settled.add(event.reviewId);
      this.trim();
    }

    for (const listener of this.listeners.get(event.reviewId) ?? []) {
      try {
        listener(sequenced);
      } catch (err) {
        log.warn({ err, reviewId: event.reviewId }, "Event listener threw");
      }
    }
    return sequenced;
  }

  private trim(): void {
    for (const id of this.settled) {
      if (this.settled.size <= this.retainSettled) return;
      this.settled.delete(id);
      this.logs.delete(id);
      log.debug({ reviewId: id }, "Event log trimmed");
    }
  }

  /** Events with `seq` greater than `afterSeq` */
  list(reviewId: string, afterSeq = 0): ReviewEvent[] {
    return (this.logs.get(reviewId) ?? []).filter((e) => e.seq > afterSeq);
  }

  subscribe(reviewId: string, listener: ReviewEventListener): () => void {
    const set = this.listeners.get(reviewId) ?? new Set<ReviewEventListener>();
    set.add(listener);
    this.listeners.set(reviewId, set);
    return () => {
      set.delete(listener);
      if (set.size === 0) this.listeners.delete(reviewId);
    };
  }
}
