import { Router } from "express";
import { asyncHandler } from "./asyncHandler";

export type HealthCheck = () => Promise<void>;

export const buildHealthRoutes = (
  liveness: HealthCheck,
  readiness: Record<string, HealthCheck>
): Router => {
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
      const entries = Object.entries(readiness);
      const results = await Promise.allSettled(entries.map(([, check]) => check()));
      const checks: Record<string, "ok" | "failed"> = {};
      entries.forEach(([name], index) => {
        checks[name] = results[index].status === "fulfilled" ? "ok" : "failed";
      });
      const ready = Object.values(checks).every((status) => status === "ok");
      res.status(ready ? 200 : 503).json({ status: ready ? "ok" : "unavailable", checks });
    })
  );
  return router;
};
