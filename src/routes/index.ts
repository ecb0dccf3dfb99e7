import { Router } from "express";
import { createSyncRouter } from "./sync.routes";
import { SyncRunnerService } from "../services/sync-runner.service";

export const createRoutes = (runner: SyncRunnerService): Router => {
  const router = Router();

  router.use("/sync", createSyncRouter(runner));

  return router;
};
