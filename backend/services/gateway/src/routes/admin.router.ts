// backend/services/gateway/src/routes/admin.router.ts
import { Router } from "express";
import type { RouteReconciler } from "../routing/RouteReconciler";
import type { RouteDefinitionStore } from "../routing/types";

/**
 * Gateway-owned operational endpoints (mounted under /__gateway, behind auth):
 *   GET  /routes   installed definitions + reconciler state
 *   POST /refresh  run a reconciliation now; responds with its report
 */
export function createAdminRouter(deps: {
  reconciler: RouteReconciler;
  store: RouteDefinitionStore;
}): Router {
  const r = Router();

  r.get("/routes", async (_req, res, next) => {
    try {
      const routes = await deps.store.list();
      res.json({
        state: deps.reconciler.state(),
        registered: deps.reconciler.registeredServices(),
        routes,
      });
    } catch (err) {
      next(err);
    }
  });

  r.post("/refresh", async (_req, res, next) => {
    try {
      const report = await deps.reconciler.trigger("admin");
      res.status(report.skipped && report.skipReason === "notReady" ? 409 : 200);
      res.json(report);
    } catch (err) {
      next(err);
    }
  });

  return r;
}
