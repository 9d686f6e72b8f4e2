// backend/services/gateway/src/registry/HttpRegistryClient.ts
/**
 * Registry adapter over HTTP.
 *
 * - GET {baseUrl}{servicesPath} → RegistrySnapshot, validated with zod.
 * - The last good snapshot backs `resolve()` for the proxy's lb:// lookups.
 * - Change notifications come from an optional push notifier (Redis);
 *   without one, only the reconciler's fallback timer drives convergence.
 */

import axios from "axios";
import {
  RegistrySnapshotSchema,
  type RegistrySnapshot,
} from "@edge/shared/src/contracts/registry.contract";
import { getLogger } from "@edge/shared/src/utils/logger";
import type {
  RegistrySnapshotSource,
  ServiceIdentifier,
  ServiceInstanceResolver,
  Unsubscribe,
} from "../routing/types";
import type { MembershipNotifier } from "./MembershipNotifier";

export type HttpGet = (
  url: string,
  config: { timeout: number; validateStatus: (status: number) => boolean }
) => Promise<{ status: number; data: unknown }>;

export type HttpRegistryClientOptions = {
  baseUrl: string;
  servicesPath: string;
  timeoutMs: number;
  notifier?: MembershipNotifier;
  http?: HttpGet;
};

function joinBasePath(base: string, p: string): string {
  const b = base.replace(/\/+$/, "");
  return p.startsWith("/") ? `${b}${p}` : `${b}/${p}`;
}

export class HttpRegistryClient
  implements RegistrySnapshotSource, ServiceInstanceResolver
{
  private readonly log = getLogger().child({ component: "HttpRegistryClient" });
  private readonly url: string;
  private readonly http: HttpGet;
  private last?: RegistrySnapshot;

  constructor(private readonly opts: HttpRegistryClientOptions) {
    this.url = joinBasePath(opts.baseUrl, opts.servicesPath);
    this.http = opts.http ?? ((url, config) => axios.get<unknown>(url, config));
  }

  public async fetchSnapshot(): Promise<RegistrySnapshot> {
    const { status, data } = await this.http(this.url, {
      timeout: this.opts.timeoutMs,
      validateStatus: () => true,
    });
    if (status < 200 || status >= 300) {
      throw new Error(`registry fetch failed (${status}) @ ${this.url}`);
    }
    const parsed = RegistrySnapshotSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
        .join("; ");
      throw new Error(`registry snapshot invalid @ ${this.url}: ${issues}`);
    }
    this.last = parsed.data;
    return parsed.data;
  }

  public async listServices(): Promise<Set<ServiceIdentifier>> {
    const snapshot = await this.fetchSnapshot();
    return new Set(snapshot.services.map((s) => s.serviceId));
  }

  public onMembershipChanged(cb: () => void): Unsubscribe {
    if (!this.opts.notifier) return () => undefined;
    return this.opts.notifier.subscribe(cb);
  }

  /** First healthy instance of the service in the last snapshot. */
  public resolve(serviceId: ServiceIdentifier): string | undefined {
    const services = this.last?.services ?? [];
    const wanted = serviceId.toLowerCase();
    const svc =
      services.find((s) => s.serviceId === serviceId) ??
      services.find((s) => s.serviceId.toLowerCase() === wanted);
    const inst = svc?.instances.find((i) => i.healthy);
    if (!inst) {
      this.log.debug({ serviceId }, "no healthy instance");
      return undefined;
    }
    return inst.baseUrl.replace(/\/+$/, "");
  }
}
