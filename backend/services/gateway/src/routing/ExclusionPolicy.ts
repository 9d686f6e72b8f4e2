// backend/services/gateway/src/routing/ExclusionPolicy.ts
import type { ServiceIdentifier } from "./types";

/**
 * Services that must never become routes (the gateway itself, the registry,
 * infrastructure). Case-insensitive, fixed for the process lifetime.
 */
export class ExclusionPolicy {
  private readonly excluded: ReadonlySet<string>;

  constructor(serviceIds: Iterable<string>) {
    const out = new Set<string>();
    for (const id of serviceIds) {
      const s = id.trim().toLowerCase();
      if (s) out.add(s);
    }
    this.excluded = out;
  }

  public isExcluded(serviceId: ServiceIdentifier): boolean {
    return this.excluded.has(serviceId.toLowerCase());
  }

  public filter(serviceIds: Iterable<ServiceIdentifier>): Set<ServiceIdentifier> {
    const out = new Set<ServiceIdentifier>();
    for (const id of serviceIds) {
      if (!this.isExcluded(id)) out.add(id);
    }
    return out;
  }

  public list(): string[] {
    return [...this.excluded].sort();
  }
}
