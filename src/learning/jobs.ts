import { describeError } from "../errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "jobs" });

export interface JobState {
  name: string;
  lastRunAt: string | null;
  lastDurationMs: number | null;
  inProgress: boolean;
  runs: number;
  skipped: number;
  lastError: string | null;
}

export type TickResult = "ran" | "skipped" | "failed";

/**
 * A periodic task that owns its own state. A tick that arrives while the
 * previous run is still going is skipped, never stacked.
 */
export class ScheduledJob {
  private readonly current: JobState;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    name: string,
    private readonly task: () => Promise<unknown>,
    private readonly intervalMs: number,
    private readonly now: () => Date = () => new Date()
  ) {
    this.current = {
      name,
      lastRunAt: null,
      lastDurationMs: null,
      inProgress: false,
      runs: 0,
      skipped: 0,
      lastError: null,
    };
  }

  state(): JobState {
    return { ...this.current };
  }

  async tick(): Promise<TickResult> {
    if (this.current.inProgress) {
      this.current.skipped++;
      log.debug({ job: this.current.name }, "Previous run still in progress, tick skipped");
      return "skipped";
    }

    this.current.inProgress = true;
    const started = this.now();
    try {
      await this.task();
      this.current.lastError = null;
      return "ran";
    } catch (err) {
      this.current.lastError = describeError(err);
      log.warn({ err, job: this.current.name }, "Scheduled job failed");
      return "failed";
    } finally {
      this.current.inProgress = false;
      this.current.runs++;
      this.current.lastRunAt = started.toISOString();
      this.current.lastDurationMs = this.now().getTime() - started.getTime();
    }
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) => log.error({ err, job: this.current.name }, "Scheduled tick crashed"));
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }
}
