// backend/services/gateway/test/routing.spec.ts
import { describe, expect, it, vi } from "vitest";
import { ExclusionPolicy } from "../src/routing/ExclusionPolicy";
import { InMemoryRouteDefinitionStore } from "../src/routing/InMemoryRouteDefinitionStore";
import {
  buildRouteDefinition,
  routeIdFor,
  serviceIdFromTarget,
} from "../src/routing/RouteDefinition";
import { RouteLocator, prefixOf } from "../src/routing/RouteLocator";
import { RouteRefreshBus } from "../src/routing/RouteRefreshBus";

describe("route definitions", () => {
  it("derive id, lowercase path and lb target from the service id", () => {
    expect(buildRouteDefinition("ORDERS")).toEqual({
      serviceId: "ORDERS",
      routeId: "ORDERS_route",
      pathPattern: "/orders/**",
      target: "lb://ORDERS",
    });
    expect(routeIdFor("payments")).toBe("payments_route");
  });

  it("parse lb targets only", () => {
    expect(serviceIdFromTarget("lb://ORDERS")).toBe("ORDERS");
    expect(serviceIdFromTarget("http://orders:8080")).toBeUndefined();
    expect(serviceIdFromTarget("lb://")).toBeUndefined();
  });
});

describe("ExclusionPolicy", () => {
  it("compares case-insensitively and ignores blanks", () => {
    const policy = new ExclusionPolicy(["Gateway", " registry ", ""]);
    expect(policy.isExcluded("GATEWAY")).toBe(true);
    expect(policy.isExcluded("Registry")).toBe(true);
    expect(policy.isExcluded("orders")).toBe(false);
    expect([...policy.filter(["orders", "gateway", "REGISTRY"])]).toEqual(["orders"]);
    expect(policy.list()).toEqual(["gateway", "registry"]);
  });
});

describe("InMemoryRouteDefinitionStore", () => {
  it("reports notFound for unknown ids", async () => {
    const store = new InMemoryRouteDefinitionStore();
    expect(await store.delete("nope_route")).toBe("notFound");
    await store.insert(buildRouteDefinition("a"));
    expect(await store.delete("a_route")).toBe("deleted");
    expect(await store.list()).toEqual([]);
  });
});

describe("RouteLocator", () => {
  it("compiles only /<prefix>/** patterns", () => {
    expect(prefixOf("/orders/**")).toBe("/orders");
    expect(prefixOf("/Orders/v1/**")).toBe("/orders/v1");
    expect(prefixOf("/**")).toBeUndefined();
    expect(prefixOf("orders/**")).toBeUndefined();
    expect(prefixOf("/orders/*")).toBeUndefined();
  });

  it("matches on whole path segments, longest prefix first", async () => {
    const store = new InMemoryRouteDefinitionStore();
    const bus = new RouteRefreshBus();
    await store.insert(buildRouteDefinition("ORDERS"));
    await store.insert({
      serviceId: "ARCHIVE",
      routeId: "ARCHIVE_route",
      pathPattern: "/orders/archive/**",
      target: "lb://ARCHIVE",
    });
    const locator = new RouteLocator(store, bus);
    await locator.start();

    expect(locator.match("/orders")?.serviceId).toBe("ORDERS");
    expect(locator.match("/Orders/42")?.serviceId).toBe("ORDERS");
    expect(locator.match("/orders/archive/7")?.serviceId).toBe("ARCHIVE");
    expect(locator.match("/ordersx/1")).toBeUndefined();
    expect(locator.match("/")).toBeUndefined();
    locator.stop();
  });

  it("reloads when a refresh is published", async () => {
    const store = new InMemoryRouteDefinitionStore();
    const bus = new RouteRefreshBus();
    const locator = new RouteLocator(store, bus);
    await locator.start();
    expect(locator.match("/payments/1")).toBeUndefined();

    await store.insert(buildRouteDefinition("payments"));
    bus.publishRefresh();

    await vi.waitFor(() =>
      expect(locator.match("/payments/1")?.routeId).toBe("payments_route")
    );
    expect(bus.publishedCount()).toBe(1);

    locator.stop();
    await store.delete("payments_route");
    bus.publishRefresh();
    await new Promise((resolve) => setImmediate(resolve));
    expect(locator.match("/payments/1")?.routeId).toBe("payments_route");
  });
});
