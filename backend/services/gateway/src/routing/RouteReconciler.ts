// backend/services/gateway/src/routing/RouteReconciler.ts

/**
 * Keeps the route store in step with registry membership.
 *
 * Lifecycle: constructed → initializing → ready, or initializing → initFailed
 * when the first registry fetch fails. A trigger while constructed/initializing
 * is dropped; in initFailed it re-attempts initialization; in ready it runs a
 * checked pass (no store traffic when membership equals the registered set).
 *
 * Passes never overlap. Triggers that arrive during a pass collapse into one
 * follow-up pass, and every caller of that window shares its report.
 *
 * Pass: removals (concurrent) → full-membership install (concurrent,
 * delete-then-insert) → exactly one refresh. A failing service keeps its
 * previous state; the next trigger heals it.
 */

import { getLogger } from "@edge/shared/src/utils/logger";
import type { ExclusionPolicy } from "./ExclusionPolicy";
import { buildRouteDefinition, routeIdFor } from "./RouteDefinition";
import type {
  RefreshPublisher,
  RegistrySnapshotSource,
  RouteDefinitionStore,
  ServiceIdentifier,
  Unsubscribe,
} from "./types";

export type ReconcilerState =
  | "constructed"
  | "initializing"
  | "ready"
  | "initFailed";

export type ReconcileFailure = {
  serviceId: ServiceIdentifier;
  routeId: string;
  op: "remove" | "delete" | "insert";
  error: string;
};

export type ReconcileReport = {
  reason: string;
  /** True when the pass made no store calls. */
  skipped: boolean;
  skipReason?: "notReady" | "unchanged" | "registryUnavailable";
  removed: ServiceIdentifier[];
  installed: ServiceIdentifier[];
  failures: ReconcileFailure[];
  /** RegisteredRouteSet after the pass, sorted. */
  registered: ServiceIdentifier[];
  error?: string;
};

export type RouteReconcilerOptions = {
  registry: RegistrySnapshotSource;
  store: RouteDefinitionStore;
  publisher: RefreshPublisher;
  exclusions: ExclusionPolicy;
  initialDelayMs: number;
  /** 0 disables the fallback timer. */
  fallbackIntervalMs: number;
};

type PassKind = "init" | "checked";

function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sameMembers(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const v of a) if (!b.has(v)) return false;
  return true;
}

/** Carries which half of delete-then-insert failed. */
class InstallError extends Error {
  constructor(
    public readonly op: "delete" | "insert",
    public readonly underlying: unknown
  ) {
    super(`${op} failed: ${errMessage(underlying)}`);
    this.name = "InstallError";
  }
}

export class RouteReconciler {
  private readonly log = getLogger().child({ component: "RouteReconciler" });
  private current: ReconcilerState = "constructed";
  private readonly registered = new Set<ServiceIdentifier>();

  private inFlight?: Promise<ReconcileReport>;
  private queued?: Promise<ReconcileReport>;

  private initTimer?: NodeJS.Timeout;
  private fallbackTimer?: NodeJS.Timeout;
  private unsubscribe?: Unsubscribe;

  constructor(private readonly opts: RouteReconcilerOptions) {}

  public state(): ReconcilerState {
    return this.current;
  }

  public isReady(): boolean {
    return this.current === "ready";
  }

  /** Copy of RegisteredRouteSet, sorted. */
  public registeredServices(): ServiceIdentifier[] {
    return [...this.registered].sort();
  }

  /**
   * Schedule the deferred first pass, subscribe to membership changes, and
   * start the fallback timer.
   */
  public start(): void {
    if (this.initTimer || this.unsubscribe) return;

    this.initTimer = setTimeout(() => {
      this.initTimer = undefined;
      this.settle(this.initialize());
    }, this.opts.initialDelayMs);

    this.unsubscribe = this.opts.registry.onMembershipChanged(() => {
      this.settle(this.trigger("membershipChanged"));
    });

    if (this.opts.fallbackIntervalMs > 0) {
      this.fallbackTimer = setInterval(() => {
        this.settle(this.trigger("fallback"));
      }, this.opts.fallbackIntervalMs);
    }

    this.log.info(
      {
        initialDelayMs: this.opts.initialDelayMs,
        fallbackIntervalMs: this.opts.fallbackIntervalMs,
        excluded: this.opts.exclusions.list(),
      },
      "route reconciler scheduled"
    );
  }

  /** Cancel timers and the subscription. An in-flight pass runs to completion. */
  public stop(): void {
    if (this.initTimer) clearTimeout(this.initTimer);
    if (this.fallbackTimer) clearInterval(this.fallbackTimer);
    this.unsubscribe?.();
    this.initTimer = undefined;
    this.fallbackTimer = undefined;
    this.unsubscribe = undefined;
  }

  /** Run the first pass now. Only legal from constructed or initFailed. */
  public initialize(): Promise<ReconcileReport> {
    if (this.current === "ready" || this.current === "initializing") {
      return Promise.resolve(this.dropped("initialize"));
    }
    return this.schedule("initialize");
  }

  /**
   * External change signal (notification, fallback tick, admin refresh).
   * Resolves with the report of the pass that served it.
   */
  public trigger(reason: string): Promise<ReconcileReport> {
    if (this.current === "constructed" || this.current === "initializing") {
      this.log.debug({ reason, state: this.current }, "trigger dropped");
      return Promise.resolve(this.dropped(reason));
    }
    return this.schedule(reason);
  }

  private settle(p: Promise<ReconcileReport>): void {
    p.catch((err: unknown) => {
      this.log.error({ err }, "reconciliation pass rejected");
    });
  }

  private schedule(reason: string): Promise<ReconcileReport> {
    if (!this.inFlight) {
      this.inFlight = this.execute(reason).finally(() => {
        this.inFlight = undefined;
      });
      return this.inFlight;
    }
    if (!this.queued) {
      this.log.debug({ reason }, "pass in flight; coalescing trigger");
      // Runs after the in-flight pass whether it fulfilled or rejected.
      const followUp = (): Promise<ReconcileReport> => {
        this.queued = undefined;
        return this.schedule(reason);
      };
      this.queued = this.inFlight.then(followUp, followUp);
    }
    return this.queued;
  }

  private async execute(reason: string): Promise<ReconcileReport> {
    const kind: PassKind = this.current === "ready" ? "checked" : "init";

    if (kind === "init") this.current = "initializing";

    let membership: Set<ServiceIdentifier>;
    try {
      const listed = await this.opts.registry.listServices();
      membership = this.opts.exclusions.filter(listed);
    } catch (err) {
      const error = errMessage(err);
      if (kind === "init") {
        this.current = "initFailed";
        this.log.error({ err, reason }, "initial route pass failed; awaiting next trigger");
      } else {
        this.log.warn({ err, reason }, "registry unavailable; keeping current routes");
      }
      return {
        ...this.emptyReport(reason),
        skipped: true,
        skipReason: "registryUnavailable",
        error,
      };
    }

    if (kind === "checked" && sameMembers(membership, this.registered)) {
      this.log.debug({ reason }, "membership unchanged");
      return { ...this.emptyReport(reason), skipped: true, skipReason: "unchanged" };
    }

    const report = await this.apply(reason, membership);

    if (kind === "init") {
      this.current = "ready";
      this.log.info({ registered: report.registered }, "route reconciler ready");
    }
    return report;
  }

  private async apply(
    reason: string,
    membership: ReadonlySet<ServiceIdentifier>
  ): Promise<ReconcileReport> {
    const { store, exclusions } = this.opts;
    const failures: ReconcileFailure[] = [];
    const removed: ServiceIdentifier[] = [];
    const installed: ServiceIdentifier[] = [];

    const toRemove = [...this.registered].filter((id) => !membership.has(id));
    const removals = await Promise.allSettled(
      toRemove.map((id) => store.delete(routeIdFor(id)))
    );
    removals.forEach((r, i) => {
      const serviceId = toRemove[i];
      if (r.status === "fulfilled") {
        this.registered.delete(serviceId);
        removed.push(serviceId);
      } else {
        failures.push(this.failure(serviceId, "remove", r.reason));
      }
    });

    const toAdd = [...membership].filter((id) => !exclusions.isExcluded(id));
    const adds = await Promise.allSettled(toAdd.map((id) => this.install(id)));
    adds.forEach((r, i) => {
      const serviceId = toAdd[i];
      if (r.status === "fulfilled") {
        this.registered.add(serviceId);
        installed.push(serviceId);
      } else if (r.reason instanceof InstallError) {
        failures.push(this.failure(serviceId, r.reason.op, r.reason.underlying));
      } else {
        failures.push(this.failure(serviceId, "insert", r.reason));
      }
    });

    this.publish(reason);

    const report: ReconcileReport = {
      reason,
      skipped: false,
      removed: removed.sort(),
      installed: installed.sort(),
      failures,
      registered: this.registeredServices(),
    };
    this.log.info(
      {
        reason,
        removed: report.removed,
        installed: report.installed,
        failures: failures.length,
      },
      "route pass complete"
    );
    return report;
  }

  private async install(serviceId: ServiceIdentifier): Promise<void> {
    const def = buildRouteDefinition(serviceId);
    try {
      await this.opts.store.delete(def.routeId);
    } catch (err) {
      throw new InstallError("delete", err);
    }
    try {
      await this.opts.store.insert(def);
    } catch (err) {
      throw new InstallError("insert", err);
    }
  }

  private publish(reason: string): void {
    try {
      this.opts.publisher.publishRefresh();
    } catch (err) {
      this.log.error({ err, reason }, "route refresh publish failed");
    }
  }

  private failure(
    serviceId: ServiceIdentifier,
    op: ReconcileFailure["op"],
    cause: unknown
  ): ReconcileFailure {
    const routeId = routeIdFor(serviceId);
    const error = errMessage(cause);
    this.log.error({ serviceId, routeId, op, error }, "route operation failed");
    return { serviceId, routeId, op, error };
  }

  private emptyReport(reason: string): ReconcileReport {
    return {
      reason,
      skipped: false,
      removed: [],
      installed: [],
      failures: [],
      registered: this.registeredServices(),
    };
  }

  private dropped(reason: string): ReconcileReport {
    return { ...this.emptyReport(reason), skipped: true, skipReason: "notReady" };
  }
}
