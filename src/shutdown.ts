import { logger } from "./logger";
import { TaskQueue } from "./services/taskQueue";

export interface ShutdownDeps {
  server: { close(): Promise<unknown> };
  queue: TaskQueue;
  closeStore?: () => Promise<void>;
}

/**
 * Stops taking requests, waits for queued and running jobs to reach a terminal
 * status, then releases the store.
 */
export async function shutdownGracefully(deps: ShutdownDeps) {
  await deps.server.close();
  logger.info(
    { running: deps.queue.runningCount, pending: deps.queue.pendingCount },
    "Waiting for analysis jobs to finish",
  );
  await deps.queue.onIdle();
  await deps.closeStore?.();
}
