// backend/services/shared/src/middleware/problemJson.ts
/**
 * RFC 7807 problem+json for every service.
 *  1) `res.problem(status, body)` for handlers that emit errors.
 *  2) 404 tail handler with the same envelope.
 *  3) Global error handler: logs 5xx with a trimmed stack, returns a sanitized body.
 *
 * Guardrail denials (auth) log through `logSecurity` themselves; this file only
 * shapes client-facing errors.
 */

import type { Request, RequestHandler, ErrorRequestHandler } from "express";
import { getLogger } from "../utils/logger";

export type ProblemBody = {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance?: string;
};

/* eslint-disable @typescript-eslint/no-namespace */
declare global {
  namespace Express {
    interface Response {
      problem?: (status: number, body: ProblemBody) => void;
    }
  }
}
/* eslint-enable @typescript-eslint/no-namespace */

/** Request id set by pino-http, or the inbound correlation header. */
export function ridOf(req: Request): string | undefined {
  if (req.id !== undefined) return String(req.id);
  const hdr = req.headers["x-request-id"];
  return Array.isArray(hdr) ? hdr[0] : hdr;
}

export function problem(
  status: number,
  title: string,
  detail: string,
  req?: Request
): ProblemBody {
  return {
    type: "about:blank",
    title,
    status,
    detail,
    instance: req ? ridOf(req) : undefined,
  };
}

/** Send problem+json whether or not the helper middleware ran. */
export function sendProblem(
  req: Request,
  res: Parameters<RequestHandler>[1],
  status: number,
  title: string,
  detail: string
): void {
  const body = problem(status, title, detail, req);
  if (res.problem) {
    res.problem(status, body);
    return;
  }
  res.status(status);
  res.type("application/problem+json");
  res.json(body);
}

export const problemJsonMiddleware = (): RequestHandler => {
  return (_req, res, next) => {
    res.problem = (status: number, body: ProblemBody) => {
      res.status(status);
      res.type("application/problem+json");
      res.json(body);
    };
    next();
  };
};

export const notFoundHandler = (): RequestHandler => {
  return (req, res) => {
    sendProblem(req, res, 404, "Not Found", "Route not found");
  };
};

type HttpishError = {
  status?: unknown;
  statusCode?: unknown;
  message?: unknown;
  name?: unknown;
  stack?: unknown;
};

function asHttpish(err: unknown): HttpishError {
  return err !== null && typeof err === "object" ? err : {};
}

export const errorHandler = (): ErrorRequestHandler => {
  const log = getLogger().child({ component: "errorHandler" });

  return (err: unknown, req, res, _next) => {
    const e = asHttpish(err);
    const raw = Number(e.status ?? e.statusCode ?? 500);
    const status = Number.isFinite(raw) && raw >= 400 && raw < 600 ? raw : 500;

    if (res.headersSent) {
      log.debug(
        { rid: ridOf(req), url: req.originalUrl, status },
        "error after headers sent"
      );
      return;
    }

    if (status >= 500) {
      log.error(
        {
          rid: ridOf(req),
          method: req.method,
          url: req.originalUrl,
          status,
          name: e.name,
          message: e.message,
          stack: String(e.stack || "")
            .split("\n")
            .slice(0, 8),
        },
        "unhandled error"
      );
    }

    sendProblem(
      req,
      res,
      status,
      status >= 500 ? "Internal Server Error" : "Error",
      status >= 500
        ? "Unexpected error"
        : typeof e.message === "string"
        ? e.message
        : "Request failed"
    );
  };
};
