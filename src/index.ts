import { config } from "./config";
import { logger } from "./logger";
import { db, pool } from "./db";
import { runMigrations } from "./migrate";
import { JobStore } from "./repositories/jobStore";
import { PgJobStore } from "./repositories/jobRepository";
import { MemoryJobStore } from "./repositories/memoryJobStore";
import { buildServer } from "./server";
import { shutdownGracefully } from "./shutdown";
import { CacheIndex } from "./services/cacheIndex";
import { JobFacade } from "./services/jobFacade";
import { chatCompletion } from "./services/llmClient";
import { JobOrchestrator } from "./services/orchestrator";
import { buildResearchStages } from "./services/researchStages";
import { serpSearch } from "./services/serpClient";
import { TaskQueue } from "./services/taskQueue";

async function createStore(): Promise<JobStore> {
  if (config.store === "memory") {
    logger.warn("Using in-memory job store; jobs are lost on restart");
    return new MemoryJobStore();
  }
  await runMigrations();
  return new PgJobStore(db);
}

async function start() {
  const store = await createStore();
  const queue = new TaskQueue(config.worker.maxConcurrent);
  const orchestrator = new JobOrchestrator({
    store,
    cache: new CacheIndex(store, config.cache.ttlMs),
    stages: buildResearchStages({ chat: chatCompletion, search: serpSearch }),
    queue,
    stageTimeoutMs: config.worker.stageTimeoutMs,
  });
  const app = await buildServer({
    orchestrator,
    facade: new JobFacade(store),
    apiKey: config.apiKey,
    logLevel: process.env.LOG_LEVEL ?? "info",
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutting down");
    await shutdownGracefully({
      server: app,
      queue,
      closeStore: config.store === "postgres" ? () => pool.end() : undefined,
    });
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .catch((err) => {
          logger.error({ err }, "Shutdown failed");
          process.exitCode = 1;
        });
    });
  }

  const address = await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info(
    { address, cacheTtlHours: config.cache.ttlHours, maxConcurrent: config.worker.maxConcurrent },
    "Analysis API listening",
  );
}

start().catch((err) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
