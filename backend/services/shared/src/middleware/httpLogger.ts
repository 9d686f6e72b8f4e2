// backend/services/shared/src/middleware/httpLogger.ts

/**
 * Why:
 * - Consistent, structured request logs across services so ops can aggregate
 *   by `service` and correlate by `reqId` end-to-end.
 * - Telemetry only. Not to be conflated with SECURITY logs (gate denials).
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Reuse an inbound request id if present; mint a UUID only if missing.
 *   Always echo `x-request-id`.
 * - Health probes are not logged.
 */

import pinoHttp, { type HttpLogger } from "pino-http";
import { randomUUID } from "crypto";
import type { IncomingMessage, ServerResponse } from "http";
import { getLogger } from "../utils/logger";

function firstHeader(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

export function makeHttpLogger(
  serviceName: string,
  opts: { quietPathFragments?: string[] } = {}
): HttpLogger {
  const logger = getLogger().child({ service: serviceName });
  const quiet = opts.quietPathFragments ?? ["/health", "/favicon.ico"];

  return pinoHttp({
    logger,

    genReqId: (req, res) => {
      const id =
        firstHeader(req.headers["x-request-id"]) ||
        firstHeader(req.headers["x-correlation-id"]) ||
        randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => {
        const url = req.url || "";
        return quiet.some((q) => url.includes(q));
      },
    },

    serializers: {
      req(req: { id?: unknown; method?: string; url?: string }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: { statusCode?: number }) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
