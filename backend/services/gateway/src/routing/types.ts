// backend/services/gateway/src/routing/types.ts
/**
 * Seams between the reconciler and its collaborators. The reconciler depends
 * only on these; the runtime binds them to the HTTP registry, the in-memory
 * store and the refresh bus.
 */

export type ServiceIdentifier = string;

export type RouteDefinition = {
  serviceId: ServiceIdentifier;
  routeId: string;
  /** e.g. "/orders/**" */
  pathPattern: string;
  /** Indirection URI resolved at dispatch time, e.g. "lb://ORDERS". */
  target: string;
};

export type Unsubscribe = () => void;

/** Live registry membership, on demand and by notification. */
export interface RegistrySnapshotSource {
  listServices(): Promise<Set<ServiceIdentifier>>;
  onMembershipChanged(cb: () => void): Unsubscribe;
}

/** Resolves the `lb://<serviceId>` indirection to a concrete base URL. */
export interface ServiceInstanceResolver {
  resolve(serviceId: ServiceIdentifier): string | undefined;
}

export type DeleteOutcome = "deleted" | "notFound";

/**
 * Idempotent route sink. `delete` of a missing id resolves "notFound";
 * any other failure rejects.
 */
export interface RouteDefinitionStore {
  delete(routeId: string): Promise<DeleteOutcome>;
  insert(def: RouteDefinition): Promise<void>;
  list(): Promise<RouteDefinition[]>;
}

/** Fire-and-forget "routes changed" signal to the live runtime. */
export interface RefreshPublisher {
  publishRefresh(): void;
}
