import express, { Application } from "express";
import helmet from "helmet";
import compression from "compression";
import cors from "cors";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import { config } from "./config/config";

import healthRoutes from "./routes/health.routes";

import { errorHandler, notFoundHandler } from "./middleware/error.middleware";
import { SyncRunnerService } from "./services/sync-runner.service";
import logger from "./utils/logger";

import { createRoutes } from "./routes";

export const createApp = async (
  runner: SyncRunnerService = new SyncRunnerService(),
): Promise<Application> => {
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: process.env.CORS_ORIGIN || "*",
      credentials: true,
    }),
  );

  // Compression
  app.use(compression());

  // Body parsing
  app.use(express.json({ limit: "1mb" }));

  // Request logging
  const morganFormat = config.NODE_ENV === "production" ? "combined" : "dev";
  app.use(
    morgan(morganFormat, {
      stream: {
        write: (message) => logger.info(message.trim()),
      },
    }),
  );

  app.use((req, res, next) => {
    const requestId = req.get("x-request-id") || uuidv4();
    res.locals.requestId = requestId;
    res.setHeader("X-Request-ID", requestId);
    next();
  });

  // Routes
  app.use("/", healthRoutes);
  app.use("/api/v1", createRoutes(runner));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
};
