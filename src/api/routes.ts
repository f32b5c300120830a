import { Hono, type Context } from "hono";
import { streamSSE } from "hono/streaming";
import { z } from "zod";
import { EngineError } from "../errors.js";
import type { Engine } from "../engine.js";
import type { ReviewEvent } from "../review/events.js";
import { isTerminal } from "../review/state-machine.js";
import { patternConfidence } from "../rules/engine.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "api-routes" });

const VERSION = "0.1.0";

const analyzeSchema = z.object({
  id: z.string().min(1).max(128).optional(),
  repositoryRef: z.string().min(1),
  diff: z.string(),
  filePaths: z.array(z.string().min(1)).optional(),
});

const feedbackSchema = z.object({
  id: z.string().min(1).max(128).optional(),
  suggestionId: z.string().min(1),
  helpful: z.boolean(),
  correction: z.string().max(10_000).optional(),
  category: z.string().min(1).optional(),
});

const batchSchema = z.object({
  items: z.array(feedbackSchema).min(1).max(500),
});

const contextSchema = z.object({
  repositoryRef: z.string().min(1),
  chunks: z
    .array(
      z.object({
        path: z.string().min(1),
        startLine: z.number().int().positive(),
        endLine: z.number().int().positive(),
        text: z.string().min(1),
        origin: z.enum(["code", "doc", "history"]).default("code"),
      })
    )
    .min(1)
    .max(1000),
});

const limitSchema = z.coerce.number().int().min(1).max(1000).default(50);
const afterSchema = z.coerce.number().int().min(0).default(0);

class BadRequest extends Error {
  constructor(
    message: string,
    readonly issues?: z.ZodIssue[]
  ) {
    super(message);
    this.name = "BadRequest";
  }
}

export function createApiRouter(engine: Engine): Hono {
  const app = new Hono();

  app.onError((err, c) => {
    if (err instanceof BadRequest) {
      return c.json({ error: "bad_request", message: err.message, issues: err.issues }, 400);
    }
    if (err instanceof EngineError) {
      const status = statusFor(err.code);
      if (status === 500) log.error({ err }, "Request failed");
      return c.json({ error: err.code, message: err.message }, status);
    }
    log.error({ err }, "Unhandled request error");
    return c.json({ error: "internal_error", message: "Internal server error" }, 500);
  });

  app.get("/health", (c) =>
    c.json({
      status: "ok",
      version: VERSION,
      activeReviews: engine.reviews.activeCount,
      timestamp: new Date().toISOString(),
    })
  );

  // ─── Reviews ───

  app.post("/reviews", async (c) => {
    const body = await parseBody(c, analyzeSchema);
    const review = await engine.reviews.submit(body);
    return c.json(review, 202);
  });

  app.get("/reviews/:id", async (c) => c.json(await engine.reviews.get(c.req.param("id"))));

  app.post("/reviews/:id/regenerate", async (c) => {
    const review = await engine.reviews.regenerate(c.req.param("id"));
    return c.json(review, 202);
  });

  app.post("/reviews/:id/cancel", async (c) => c.json(await engine.reviews.cancel(c.req.param("id"))));

  app.get("/reviews/:id/events", async (c) => {
    const id = c.req.param("id");
    const current = await engine.reviews.get(id);
    const after = parseQuery(afterSchema, c.req.header("last-event-id") ?? c.req.query("after"));

    return streamSSE(c, async (stream) => {
      const queue: ReviewEvent[] = [];
      let wake: (() => void) | null = null;
      const unsubscribe = engine.reviews.subscribe(id, (event) => {
        queue.push(event);
        wake?.();
      });
      const aborted = new Promise<void>((resolve) => stream.onAbort(resolve));

      let lastSeq = after;
      // true once the terminal event of the watched run has been sent
      const send = async (event: ReviewEvent): Promise<boolean> => {
        if (event.seq <= lastSeq) return false;
        lastSeq = event.seq;
        await stream.writeSSE({ event: event.type, id: String(event.seq), data: JSON.stringify(event) });
        return event.type === "complete" && event.run >= current.run;
      };

      try {
        for (const event of engine.reviews.listEvents(id, after)) {
          if (await send(event)) return;
        }
        if (isTerminal(current.status)) return;

        while (!stream.aborted) {
          let next = queue.shift();
          while (next) {
            if (await send(next)) return;
            next = queue.shift();
          }
          await Promise.race([new Promise<void>((resolve) => (wake = resolve)), aborted]);
          wake = null;
        }
      } finally {
        unsubscribe();
      }
    });
  });

  // ─── Feedback ───

  app.post("/feedback", async (c) => {
    const body = await parseBody(c, feedbackSchema);
    const metrics = await engine.learner.record(body);
    return c.json({ metrics }, 201);
  });

  app.post("/feedback/batch", async (c) => {
    const { items } = await parseBody(c, batchSchema);
    return c.json(await engine.learner.recordBatch(items));
  });

  app.get("/feedback/metrics", async (c) =>
    c.json({
      metrics: await engine.learner.getMetrics(),
      job: engine.metricsJob.state(),
    })
  );

  app.get("/feedback/history", async (c) => {
    const limit = parseQuery(limitSchema, c.req.query("limit"));
    return c.json({ feedback: await engine.learner.history(limit) });
  });

  // ─── Repository context ───

  app.post("/context", async (c) => {
    const { repositoryRef, chunks } = await parseBody(c, contextSchema);
    if (!engine.contextWriter) {
      return c.json({ error: "retrieval_disabled", message: "No similarity index is configured" }, 503);
    }
    await engine.contextWriter.upsert(repositoryRef, chunks);
    return c.json({ repositoryRef, indexed: chunks.length });
  });

  // ─── Patterns & cache ───

  app.get("/patterns", (c) => {
    const floor = engine.config.learning.confidenceFloor;
    return c.json({
      patterns: engine.patterns.list().map((p) => ({
        id: p.id,
        name: p.name,
        description: p.description,
        kind: p.kind,
        category: p.category,
        severity: p.severity,
        active: p.active,
        baseWeight: p.baseWeight,
        factor: engine.weights.factor(p.id),
        confidence: patternConfidence(p, engine.weights.factor(p.id), floor),
      })),
    });
  });

  app.post("/patterns/:id/deactivate", (c) => {
    const id = c.req.param("id");
    if (!engine.patterns.deactivate(id)) {
      return c.json({ error: "not_found", message: `Pattern ${id} not found` }, 404);
    }
    return c.json({ id, active: false });
  });

  app.get("/cache/stats", (c) => c.json(engine.cache.stats()));

  return app;
}

function statusFor(code: EngineError["code"]): 400 | 404 | 409 | 500 {
  switch (code) {
    case "not_found":
    case "unknown_suggestion":
      return 404;
    case "conflict":
    case "duplicate_feedback":
      return 409;
    case "config_error":
      return 400;
    default:
      return 500;
  }
}

async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (err) {
    log.debug({ err }, "Request body is not JSON");
    throw new BadRequest("Request body must be valid JSON");
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new BadRequest("Invalid request body", parsed.error.issues);
  return parsed.data;
}

function parseQuery<T extends z.ZodTypeAny>(schema: T, value: string | undefined): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) throw new BadRequest("Invalid query parameter", parsed.error.issues);
  return parsed.data;
}
