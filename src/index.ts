import { createLogger } from "./logger";
import { startMonitorService } from "./monitorService";
import { errorMessage } from "./utils";

const logger = createLogger("main");

const main = async (): Promise<void> => {
  const service = await startMonitorService();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    service
      .stop()
      .then(() => {
        process.exitCode = 0;
      })
      .catch((error: unknown) => {
        logger.error("Shutdown failed", {
          error: errorMessage(error),
        });
        process.exitCode = 1;
      });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

main().catch((error: unknown) => {
  logger.error("Monitor failed to start", {
    error: error instanceof Error ? error.stack ?? error.message : String(error),
  });
  process.exitCode = 1;
});
