import { z } from "zod";

const envSchema = z.object({
  // Model providers
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().min(1).optional(),

  // PostgreSQL (reviews, feedback, weights)
  POSTGRES_URL: z.string().optional(),

  // Similarity index (optional)
  QDRANT_URL: z.string().url().optional(),
  QDRANT_COLLECTION: z.string().default("reviewloop_context"),

  // Engine configuration file
  ENGINE_CONFIG_PATH: z.string().default("reviewloop.yml"),

  // Server
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function loadEnv(): Env {
  if (_env) return _env;

  const result = envSchema.safeParse({ ...process.env });
  if (!result.success) {
    const missing = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid environment variables:\n${missing}`);
  }

  _env = result.data;
  return _env;
}

export function isRetrievalEnabled(env: Env): boolean {
  return !!env.QDRANT_URL;
}
