// backend/services/gateway/src/runtime.ts
import type { Express } from "express";
import { getLogger } from "@edge/shared/src/utils/logger";
import { buildGatewayApp } from "./app";
import type { GatewayConfig } from "./config";
import { HttpRegistryClient } from "./registry/HttpRegistryClient";
import type { MembershipNotifier } from "./registry/MembershipNotifier";
import { RedisMembershipNotifier } from "./registry/RedisMembershipNotifier";
import { ExclusionPolicy } from "./routing/ExclusionPolicy";
import { InMemoryRouteDefinitionStore } from "./routing/InMemoryRouteDefinitionStore";
import { RouteLocator } from "./routing/RouteLocator";
import { RouteReconciler } from "./routing/RouteReconciler";
import { RouteRefreshBus } from "./routing/RouteRefreshBus";
import { CredentialVerifier } from "./security/CredentialVerifier";

export type GatewayRuntime = {
  app: Express;
  reconciler: RouteReconciler;
  /** Stop timers and subscriptions; in-flight passes finish on their own. */
  close(): Promise<void>;
};

/**
 * Compose the gateway from config. Redis is optional: when it can't be
 * reached the fallback timer alone drives route convergence.
 */
export async function createGatewayRuntime(
  config: GatewayConfig
): Promise<GatewayRuntime> {
  const log = getLogger();

  let notifier: MembershipNotifier | undefined;
  if (config.registry.redisUrl) {
    const redis = new RedisMembershipNotifier(
      config.registry.redisUrl,
      config.registry.channel
    );
    redis.start();
    notifier = redis;
  } else {
    log.info(
      { fallbackIntervalMs: config.routes.fallbackIntervalMs },
      "no REDIS_URL; relying on fallback polling"
    );
  }

  const registry = new HttpRegistryClient({
    baseUrl: config.registry.baseUrl,
    servicesPath: config.registry.servicesPath,
    timeoutMs: config.registry.timeoutMs,
    notifier,
  });
  const store = new InMemoryRouteDefinitionStore();
  const bus = new RouteRefreshBus();
  const locator = new RouteLocator(store, bus);
  await locator.start();

  const reconciler = new RouteReconciler({
    registry,
    store,
    publisher: bus,
    exclusions: new ExclusionPolicy(config.routes.excludedServices),
    initialDelayMs: config.routes.initialDelayMs,
    fallbackIntervalMs: config.routes.fallbackIntervalMs,
  });

  const verifier = new CredentialVerifier({
    key: config.jwt.key,
    identityClaim: config.jwt.identityClaim,
    issuer: config.jwt.issuer,
    audience: config.jwt.audience,
    clockToleranceSec: config.jwt.clockToleranceSec,
  });

  const app = buildGatewayApp({
    config,
    verifier,
    reconciler,
    store,
    locator,
    resolver: registry,
  });

  return {
    app,
    reconciler,
    async close() {
      reconciler.stop();
      locator.stop();
      if (notifier) await notifier.close();
    },
  };
}
