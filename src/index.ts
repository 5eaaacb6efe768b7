#!/usr/bin/env node
import { buildApplication } from "./composition/container";
import { initializeLogging } from "./runtime/logging";
import { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
import { LOG_FILE, LOG_LEVEL } from "./env";
import { describeError } from "./shared/errors";

async function main() {
  const loggingHandle = initializeLogging(LOG_FILE);
  const log = new ConsoleLogger(LOG_LEVEL);
  if (loggingHandle.logPath) {
    log.info("Logging output", { path: loggingHandle.logPath });
  }

  process.on("unhandledRejection", (reason) => {
    log.error("Unhandled promise rejection", { error: describeError(reason) });
  });

  const app = buildApplication({ logger: log });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Received shutdown request", { signal });
    void app
      .shutdown()
      .catch((err: unknown) => {
        log.error("Shutdown failed", { error: describeError(err) });
      })
      .finally(() => {
        loggingHandle.shutdown();
        process.exit(0);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.stdin.on("close", () => shutdown("stdin closed"));

  await app.start();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
