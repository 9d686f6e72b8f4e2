// backend/services/gateway/src/routing/InMemoryRouteDefinitionStore.ts
import type {
  DeleteOutcome,
  RouteDefinition,
  RouteDefinitionStore,
} from "./types";

/**
 * Route definitions keyed by routeId. Insert overwrites; the reconciler always
 * deletes first, so an overwrite only happens if something else raced it.
 */
export class InMemoryRouteDefinitionStore implements RouteDefinitionStore {
  private readonly byId = new Map<string, RouteDefinition>();

  public async delete(routeId: string): Promise<DeleteOutcome> {
    return this.byId.delete(routeId) ? "deleted" : "notFound";
  }

  public async insert(def: RouteDefinition): Promise<void> {
    this.byId.set(def.routeId, { ...def });
  }

  public async list(): Promise<RouteDefinition[]> {
    return [...this.byId.values()]
      .map((d) => ({ ...d }))
      .sort((a, b) => a.routeId.localeCompare(b.routeId));
  }
}
