"use strict";

import logger from "../config/logger";

interface ShutdownManagerOptions {
  exitOnComplete?: boolean;
  /** Called once with a one-line description of how far the batch got. */
  describeProgress?: () => string;
}

// 128 + SIGINT, as shells report it
const INTERRUPTED_EXIT_CODE = 130;
const CRASHED_EXIT_CODE = 1;

function createShutdownManager({
  exitOnComplete = true,
  describeProgress,
}: ShutdownManagerOptions = {}) {
  let shuttingDown = false;

  function shutdown(reason: string, exitCode: number = INTERRUPTED_EXIT_CODE): void {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.warn(
      { signal: reason, progress: describeProgress ? describeProgress() : undefined },
      "Batch interrupted; messages already scheduled stay scheduled"
    );

    if (exitOnComplete) {
      process.exit(exitCode);
    }
  }

  function register(): void {
    process.on("SIGINT", (signal) => shutdown(signal));
    process.on("SIGTERM", (signal) => shutdown(signal));
    process.on("unhandledRejection", (reason) => {
      logger.error({ err: reason }, "Unhandled promise rejection");
    });
    process.on("uncaughtException", handleUncaughtException);
  }

  function handleUncaughtException(error: Error): void {
    logger.fatal({ err: error }, "Uncaught exception");
    shutdown("uncaughtException", CRASHED_EXIT_CODE);
  }

  return {
    register,
    shutdown,
    handleUncaughtException,
  };
}

export { createShutdownManager, INTERRUPTED_EXIT_CODE, CRASHED_EXIT_CODE };
