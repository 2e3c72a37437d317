import { Router } from "express";
import { asyncHandler } from "./asyncHandler";

export type HealthCheck = () => Promise<void>;

export const buildHealthRoutes = (liveness: HealthCheck, readiness: HealthCheck): Router => {
  const router = Router();
  router.get(
    "/health",
    asyncHandler(async (_req, res) => {
      await liveness();
      res.status(200).json({ status: "ok" });
    })
  );
  router.get(
    "/ready",
    asyncHandler(async (_req, res) => {
      await readiness();
      res.status(200).json({ status: "ok" });
    })
  );
  return router;
};
