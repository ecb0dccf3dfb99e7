import { Router, Request, Response } from "express";
import { asyncHandler } from "../middleware/error.middleware";
import { validate } from "../middleware/validation.middleware";
import { SyncRequest, syncRequestSchema } from "../schemas/request.schemas";
import { SyncRunnerService } from "../services/sync-runner.service";

export const createSyncRouter = (runner: SyncRunnerService): Router => {
  const router = Router();

  /**
   * POST /api/v1/sync
   * Runs every sync set, or only `syncSet`, and returns the run report.
   */
  router.post(
    "/",
    validate(syncRequestSchema),
    asyncHandler(async (req: Request, res: Response) => {
      const request: SyncRequest = req.body;
      const report = await runner.run(request);
      res.status(200).json(report);
    }),
  );

  /**
   * GET /api/v1/sync/last
   */
  router.get("/last", (_req, res) => {
    const report = runner.getLastRun();
    if (!report) {
      res.status(404).json({ error: "No sync run has completed yet" });
      return;
    }
    res.status(200).json({ running: runner.isRunning, report });
  });

  return router;
};
