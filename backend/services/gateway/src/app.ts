// backend/services/gateway/src/app.ts
/**
 * Assembly (ordered stages, see middleware/stages.ts):
 *   httpLogger → problemJson → cookieParser
 *   → authGate (open endpoints bypass; identity header stripped/overwritten)
 *   → /__gateway: health (open via "/health"), admin
 *   → routeProxy (live route table)
 *   → 404 → error
 */

import express, { type Express } from "express";
import cookieParser from "cookie-parser";
import { makeHttpLogger } from "@edge/shared/src/middleware/httpLogger";
import {
  errorHandler,
  notFoundHandler,
  problemJsonMiddleware,
} from "@edge/shared/src/middleware/problemJson";
import { createHealthRouter } from "@edge/shared/src/health";
import { getLogger } from "@edge/shared/src/utils/logger";
import type { GatewayConfig } from "./config";
import { authGate } from "./middleware/authGate";
import { routeProxy } from "./middleware/routeProxy";
import { STAGE_ORDER, mountStages } from "./middleware/stages";
import { createAdminRouter } from "./routes/admin.router";
import type { ICredentialVerifier } from "./security/CredentialVerifier";
import type { RouteLocator } from "./routing/RouteLocator";
import type { RouteReconciler } from "./routing/RouteReconciler";
import type {
  RouteDefinitionStore,
  ServiceInstanceResolver,
} from "./routing/types";

export const CONTROL_PREFIX = "/__gateway";

export type GatewayDeps = {
  config: GatewayConfig;
  verifier: ICredentialVerifier;
  reconciler: RouteReconciler;
  store: RouteDefinitionStore;
  locator: RouteLocator;
  resolver: ServiceInstanceResolver;
};

export function buildGatewayApp(deps: GatewayDeps): Express {
  const { config, reconciler } = deps;
  const app = express();
  app.disable("x-powered-by");

  const health = createHealthRouter({
    service: config.serviceName,
    readiness: () => {
      if (!reconciler.isReady()) {
        throw new Error(`routes not initialized (state=${reconciler.state()})`);
      }
      return {
        state: reconciler.state(),
        routes: reconciler.registeredServices().length,
      };
    },
  });

  const mounted = mountStages(app, [
    {
      name: "telemetry",
      order: STAGE_ORDER.telemetry,
      handlers: [
        makeHttpLogger(config.serviceName),
        problemJsonMiddleware(),
        cookieParser(),
      ],
    },
    {
      name: "auth",
      order: STAGE_ORDER.auth,
      handlers: [
        authGate({
          verifier: deps.verifier,
          credentialSource: config.auth.credentialSource,
          cookieName: config.auth.cookieName,
          identityHeader: config.auth.identityHeader,
          openEndpoints: config.auth.openEndpoints,
        }),
      ],
    },
    {
      name: "control",
      order: STAGE_ORDER.control,
      path: CONTROL_PREFIX,
      handlers: [health, createAdminRouter({ reconciler, store: deps.store })],
    },
    {
      name: "routing",
      order: STAGE_ORDER.routing,
      handlers: [
        routeProxy({
          locator: deps.locator,
          resolver: deps.resolver,
          timeoutMs: config.proxy.timeoutMs,
        }),
      ],
    },
  ]);

  app.use(notFoundHandler());
  app.use(errorHandler());

  getLogger().debug({ stages: mounted }, "gateway stages mounted");
  return app;
}
