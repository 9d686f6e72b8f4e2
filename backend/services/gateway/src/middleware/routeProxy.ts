// backend/services/gateway/src/middleware/routeProxy.ts
import type { Request, RequestHandler } from "express";
import httpProxy from "http-proxy";
import { sendProblem } from "@edge/shared/src/middleware/problemJson";
import { getLogger } from "@edge/shared/src/utils/logger";
import type { RouteLocator } from "../routing/RouteLocator";
import { serviceIdFromTarget } from "../routing/RouteDefinition";
import type { ServiceInstanceResolver } from "../routing/types";

/**
 * Reverse proxy over the live route table.
 * - Matches the request path against installed `/<svc>/**` routes.
 * - Resolves `lb://<svc>` to an instance base URL at dispatch time.
 * - Forwards the full path (no prefix strip), querystring, method and body.
 * - No route falls through to the 404 tail; 502 no instance / upstream failure, 504 upstream timeout.
 */

export type RouteProxyOptions = {
  locator: RouteLocator;
  resolver: ServiceInstanceResolver;
  timeoutMs: number;
};

class UpstreamTimeoutError extends Error {
  constructor(ms: number) {
    super(`upstream timed out after ${ms}ms`);
    this.name = "UpstreamTimeoutError";
  }
}

function errorCode(err: Error): string {
  const code: unknown = Reflect.get(err, "code");
  return typeof code === "string" ? code : "";
}

function requestIdOf(req: Request): string {
  if (req.id !== undefined) return String(req.id);
  const h = req.headers["x-request-id"];
  return (Array.isArray(h) ? h[0] : h) || "";
}

export function routeProxy(opts: RouteProxyOptions): RequestHandler {
  const log = getLogger().child({ component: "routeProxy" });
  const proxy = httpProxy.createProxyServer({ changeOrigin: true, xfwd: true });

  // Idle upstream past timeoutMs → destroy with a typed error so the handler answers 504.
  proxy.on("proxyReq", (proxyReq) => {
    proxyReq.setTimeout(opts.timeoutMs, () => {
      proxyReq.destroy(new UpstreamTimeoutError(opts.timeoutMs));
    });
  });

  proxy.on("proxyRes", (proxyRes, req) => {
    log.debug({ upstreamStatus: proxyRes.statusCode, url: req.url }, "proxy exit");
  });

  return (req, res, next) => {
    const requestId = requestIdOf(req);
    const route = opts.locator.match(req.path);
    if (!route) {
      next();
      return;
    }

    const serviceId = serviceIdFromTarget(route.target);
    const base = serviceId ? opts.resolver.resolve(serviceId) : undefined;
    if (!base) {
      log.warn(
        { requestId, routeId: route.routeId, target: route.target },
        "no instance available"
      );
      sendProblem(req, res, 502, "Bad Gateway", "No instance available");
      return;
    }

    // Full inbound path against the instance base; mount points don't strip it.
    const target = base.replace(/\/+$/, "") + (req.originalUrl || req.url);
    log.debug(
      { requestId, routeId: route.routeId, target, method: req.method },
      "proxy enter"
    );

    proxy.web(
      req,
      res,
      {
        target,
        ignorePath: true,
        headers: requestId ? { "x-request-id": requestId } : {},
      },
      (err) => {
        const timedOut =
          err instanceof UpstreamTimeoutError || errorCode(err) === "ETIMEDOUT";

        log.error(
          { requestId, routeId: route.routeId, target, err },
          "proxy error"
        );
        if (res.headersSent) {
          res.destroy(err);
          return;
        }
        sendProblem(
          req,
          res,
          timedOut ? 504 : 502,
          timedOut ? "Gateway Timeout" : "Bad Gateway",
          timedOut ? "Upstream timed out" : "Upstream unavailable"
        );
      }
    );
  };
}
