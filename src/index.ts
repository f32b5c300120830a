import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { loadEnv } from "./config/env.js";
import { createEngineFromEnv } from "./engine.js";
import { createApiRouter } from "./api/routes.js";
import { getLogger } from "./utils/logger.js";

async function main() {
  const env = loadEnv();
  const log = getLogger();

  const engine = await createEngineFromEnv(env);
  engine.metricsJob.start();

  const app = new Hono();
  app.route("/", createApiRouter(engine));

  const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
    log.info({ port: info.port }, "reviewloop server started");
  });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Shutting down...");
    server.close();
    await engine.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      log.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

main().catch((err) => {
  getLogger().fatal({ err }, "Fatal startup error");
  process.exit(1);
});
