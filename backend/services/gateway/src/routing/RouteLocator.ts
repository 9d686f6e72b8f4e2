// backend/services/gateway/src/routing/RouteLocator.ts
import { getLogger } from "@edge/shared/src/utils/logger";
import type { RouteDefinition, RouteDefinitionStore } from "./types";
import type { RouteRefreshBus } from "./RouteRefreshBus";

/**
 * Live route table used by the proxy. Rebuilt from the store on every refresh
 * signal; requests between refreshes see the previous table.
 */

type CompiledRoute = {
  def: RouteDefinition;
  /** Lowercased prefix without the trailing "/**", e.g. "/orders". */
  prefix: string;
};

/** "/orders/**" → "/orders"; undefined for patterns this locator can't serve. */
export function prefixOf(pattern: string): string | undefined {
  if (!pattern.startsWith("/") || !pattern.endsWith("/**")) return undefined;
  const prefix = pattern.slice(0, -3);
  return prefix.length > 1 ? prefix.toLowerCase() : undefined;
}

export class RouteLocator {
  private table: CompiledRoute[] = [];
  private unsubscribe?: () => void;

  constructor(
    private readonly store: RouteDefinitionStore,
    private readonly bus: RouteRefreshBus
  ) {}

  /** Subscribe to refresh signals and load the current table. */
  public async start(): Promise<void> {
    this.unsubscribe = this.bus.onRefresh(() => {
      this.reload().catch((err: unknown) => {
        getLogger().error({ err }, "route table reload failed");
      });
    });
    await this.reload();
  }

  public stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }

  public async reload(): Promise<void> {
    const defs = await this.store.list();
    const compiled: CompiledRoute[] = [];
    for (const def of defs) {
      const prefix = prefixOf(def.pathPattern);
      if (!prefix) {
        getLogger().warn(
          { routeId: def.routeId, pathPattern: def.pathPattern },
          "skipping unsupported path pattern"
        );
        continue;
      }
      compiled.push({ def, prefix });
    }
    // Longest prefix first so nested paths win.
    compiled.sort((a, b) => b.prefix.length - a.prefix.length);
    this.table = compiled;
    getLogger().debug({ routes: compiled.length }, "route table reloaded");
  }

  /** First route whose prefix equals the path or is a segment-prefix of it. */
  public match(path: string): RouteDefinition | undefined {
    const p = path.toLowerCase();
    for (const r of this.table) {
      if (p === r.prefix || p.startsWith(r.prefix + "/")) return r.def;
    }
    return undefined;
  }
}
