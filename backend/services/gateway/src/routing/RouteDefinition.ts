// backend/services/gateway/src/routing/RouteDefinition.ts
import type { RouteDefinition, ServiceIdentifier } from "./types";

export const ROUTE_ID_SUFFIX = "_route";
export const LB_SCHEME = "lb://";

export function routeIdFor(serviceId: ServiceIdentifier): string {
  return `${serviceId}${ROUTE_ID_SUFFIX}`;
}

/** Deterministic: the same service id always yields the same definition. */
export function buildRouteDefinition(serviceId: ServiceIdentifier): RouteDefinition {
  return {
    serviceId,
    routeId: routeIdFor(serviceId),
    pathPattern: `/${serviceId.toLowerCase()}/**`,
    target: `${LB_SCHEME}${serviceId}`,
  };
}

/** "lb://ORDERS" → "ORDERS"; undefined for any other scheme. */
export function serviceIdFromTarget(target: string): ServiceIdentifier | undefined {
  if (!target.startsWith(LB_SCHEME)) return undefined;
  const id = target.slice(LB_SCHEME.length);
  return id || undefined;
}
