// backend/services/gateway/test/runtime.spec.ts
import http from "node:http";
import request from "supertest";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

// Redis that accepts the connection attempt and never answers.
const redis = vi.hoisted(() => {
  const state = { created: 0, open: false, disconnects: 0 };
  const client = {
    get isOpen() {
      return state.open;
    },
    get isReady() {
      return false;
    },
    on: (_event: string, _cb: (err: unknown) => void) => undefined,
    connect: (): Promise<void> => {
      state.open = true;
      return new Promise<void>(() => undefined);
    },
    subscribe: async () => undefined,
    quit: async () => undefined,
    disconnect: async () => {
      state.disconnects++;
      state.open = false;
    },
  };
  return { state, client };
});

vi.mock("redis", () => ({
  createClient: () => {
    redis.state.created++;
    return redis.client;
  },
}));

import { loadGatewayConfig } from "../src/config";
import { createGatewayRuntime, type GatewayRuntime } from "../src/runtime";
import { signToken, testEnv } from "./helpers/fixtures";

function listen(server: http.Server): Promise<string> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      if (!addr || typeof addr === "string") {
        reject(new Error("server did not bind"));
        return;
      }
      resolve(`http://127.0.0.1:${addr.port}`);
    });
  });
}

function shut(server: http.Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve) => server.close(() => resolve()));
}

let members: string[] = [];
let upstreamBase = "";
let registryBase = "";

const upstream = http.createServer((req, res) => {
  res.writeHead(200, { "content-type": "application/json" });
  res.end(JSON.stringify({ url: req.url, user: req.headers["x-user"] ?? null }));
});

const registryServer = http.createServer((req, res) => {
  if (req.url !== "/services") {
    res.writeHead(404).end();
    return;
  }
  res.writeHead(200, { "content-type": "application/json" });
  res.end(
    JSON.stringify({
      services: members.map((serviceId) => ({
        serviceId,
        instances: [{ baseUrl: upstreamBase, healthy: true }],
      })),
    })
  );
});

beforeAll(async () => {
  upstreamBase = await listen(upstream);
  registryBase = await listen(registryServer);
});

afterAll(async () => {
  await shut(upstream);
  await shut(registryServer);
});

const bearer = `Bearer ${signToken({ sub: "alice" })}`;

describe("createGatewayRuntime", () => {
  let runtime: GatewayRuntime | undefined;

  beforeEach(() => {
    members = ["orders", "gateway"];
    redis.state.created = 0;
    redis.state.open = false;
    redis.state.disconnects = 0;
  });

  afterEach(async () => {
    await runtime?.close();
    runtime = undefined;
  });

  it("comes up while Redis never answers and converges from polling", async () => {
    const config = loadGatewayConfig(
      testEnv({
        REGISTRY_BASE_URL: registryBase,
        REDIS_URL: "redis://cache.test:6379",
        ROUTES_INITIAL_DELAY_MS: "0",
        ROUTES_FALLBACK_INTERVAL_MS: "20",
      })
    );

    runtime = await createGatewayRuntime(config);
    expect(redis.state.created).toBe(1);

    const rt = runtime;
    rt.reconciler.start();
    await vi.waitFor(() => expect(rt.reconciler.state()).toBe("ready"));
    expect(rt.reconciler.registeredServices()).toEqual(["orders"]);

    await vi.waitFor(async () => {
      const res = await request(rt.app).get("/orders/1").set("Authorization", bearer);
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ url: "/orders/1", user: "alice" });
    });

    members = ["orders", "payments"];
    await vi.waitFor(() =>
      expect(rt.reconciler.registeredServices()).toEqual(["orders", "payments"])
    );
    await vi.waitFor(async () => {
      const res = await request(rt.app).get("/payments/2").set("Authorization", bearer);
      expect(res.status).toBe(200);
    });

    await rt.close();
    runtime = undefined;
    expect(redis.state.disconnects).toBe(1);
  });

  it("runs without Redis when none is configured", async () => {
    runtime = await createGatewayRuntime(
      loadGatewayConfig(
        testEnv({ REGISTRY_BASE_URL: registryBase, ROUTES_INITIAL_DELAY_MS: "0" })
      )
    );
    const rt = runtime;

    rt.reconciler.start();
    await vi.waitFor(() => expect(rt.reconciler.state()).toBe("ready"));

    expect(redis.state.created).toBe(0);
    const ready = await request(rt.app).get("/__gateway/health/ready");
    expect(ready.status).toBe(200);
  });
});
