// backend/services/gateway/test/helpers/fakes.ts
import { InMemoryRouteDefinitionStore } from "../../src/routing/InMemoryRouteDefinitionStore";
import type {
  DeleteOutcome,
  RefreshPublisher,
  RegistrySnapshotSource,
  RouteDefinition,
  ServiceInstanceResolver,
  Unsubscribe,
} from "../../src/routing/types";

/** Registry stand-in: mutable membership, scripted failures, manual change events. */
export class FakeRegistry implements RegistrySnapshotSource, ServiceInstanceResolver {
  public members = new Set<string>();
  public instances = new Map<string, string>();
  public listCalls = 0;
  public failNext = 0;
  private readonly listeners = new Set<() => void>();
  private gate?: Promise<void>;

  public set(...ids: string[]): this {
    this.members = new Set(ids);
    return this;
  }

  /** Park the next listServices() calls until the returned release runs. */
  public hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => {
      this.gate = undefined;
      release();
    };
  }

  public async listServices(): Promise<Set<string>> {
    this.listCalls++;
    if (this.gate) await this.gate;
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error("registry down");
    }
    return new Set(this.members);
  }

  public onMembershipChanged(cb: () => void): Unsubscribe {
    this.listeners.add(cb);
    return () => {
      this.listeners.delete(cb);
    };
  }

  public emit(): void {
    for (const cb of [...this.listeners]) cb();
  }

  public listenerCount(): number {
    return this.listeners.size;
  }

  public resolve(serviceId: string): string | undefined {
    return this.instances.get(serviceId);
  }
}

/** In-memory store that records every call and can refuse chosen route ids. */
export class RecordingStore extends InMemoryRouteDefinitionStore {
  public ops: string[] = [];
  public failDelete = new Set<string>();
  public failInsert = new Set<string>();

  public override async delete(routeId: string): Promise<DeleteOutcome> {
    this.ops.push(`delete:${routeId}`);
    if (this.failDelete.has(routeId)) throw new Error(`delete refused: ${routeId}`);
    return super.delete(routeId);
  }

  public override async insert(def: RouteDefinition): Promise<void> {
    this.ops.push(`insert:${def.routeId}`);
    if (this.failInsert.has(def.routeId)) throw new Error(`insert refused: ${def.routeId}`);
    return super.insert(def);
  }
}

export class CountingPublisher implements RefreshPublisher {
  public count = 0;
  public throwOnPublish = false;

  public publishRefresh(): void {
    this.count++;
    if (this.throwOnPublish) throw new Error("bus offline");
  }
}
