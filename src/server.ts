import { Server } from "http";
import { createApp } from "./app";
import { config } from "./config/config";
import { SyncScheduler } from "./schedulers/sync-scheduler.service";
import { SyncRunnerService } from "./services/sync-runner.service";
import logger from "./utils/logger";

let server: Server | undefined;
let scheduler: SyncScheduler | undefined;

const startServer = async () => {
  try {
    const runner = new SyncRunnerService();
    const app = await createApp(runner);

    if (config.SYNC_SCHEDULE) {
      scheduler = new SyncScheduler(runner, config.SYNC_TIMEZONE);
      scheduler.scheduleSync(config.SYNC_SCHEDULE);
    }

    server = app.listen(config.PORT, () => {
      logger.info(`Server started successfully`, {
        port: config.PORT,
        environment: config.NODE_ENV,
        nodeVersion: process.version,
        schedule: config.SYNC_SCHEDULE ?? "disabled",
      });
    });

    server.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        logger.error(`Port ${config.PORT} is already in use`);
      } else {
        logger.error("Server error", { error: error.message });
      }
      process.exit(1);
    });
  } catch (error) {
    logger.error("Failed to start server", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
};

const gracefulShutdown = (signal: string) => {
  logger.info(`${signal} received, starting graceful shutdown`);

  scheduler?.stop();

  if (server) {
    server.close(() => {
      logger.info("HTTP server closed");
      logger.info("Graceful shutdown completed");
      process.exit(0);
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error("Forced shutdown after timeout");
      process.exit(1);
    }, 30000).unref();
  } else {
    process.exit(0);
  }
};

// Handle shutdown signals
process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.error("Uncaught Exception", { error: error.message, stack: error.stack });
  gracefulShutdown("UNCAUGHT_EXCEPTION");
});

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Rejection", { reason });
  gracefulShutdown("UNHANDLED_REJECTION");
});

void startServer();
