// backend/services/gateway/src/middleware/authGate.ts
import type { Request, RequestHandler } from "express";
import { sendProblem } from "@edge/shared/src/middleware/problemJson";
import { logSecurity, maskSecret } from "@edge/shared/src/utils/securityLog";
import { getLogger } from "@edge/shared/src/utils/logger";
import type { ICredentialVerifier } from "../security/CredentialVerifier";
import type { CredentialSource } from "../config";

/**
 * Auth strategy (fail-closed, local verify only):
 * - Path contains any open-endpoint fragment → forward, no credential read.
 * - Otherwise read the credential from ONE configured source:
 *     header: `Authorization: Bearer <jwt>`
 *     cookie: `<cookieName>=<jwt>` (requires cookie-parser upstream)
 * - Verify locally; on success overwrite the trusted identity header and forward.
 * - Every failure is a uniform 401 problem+json; the failure kind only reaches
 *   the security log, with the credential masked.
 *
 * The trusted identity header is stripped from every inbound request, bypassed
 * or not: the gate is its only writer at the edge.
 */

export type AuthGateOptions = {
  verifier: ICredentialVerifier;
  credentialSource: CredentialSource;
  cookieName: string;
  identityHeader: string;
  openEndpoints: string[];
};

type Extraction =
  | { kind: "found"; token: string }
  | { kind: "missing" }
  | { kind: "badFormat" };

const BEARER = /^bearer\s+(.*)$/i;

export function isOpenEndpoint(path: string, openEndpoints: string[]): boolean {
  return openEndpoints.some((frag) => frag && path.includes(frag));
}

function fromHeader(req: Request): Extraction {
  const raw = req.headers["authorization"];
  if (typeof raw !== "string" || !raw.trim()) return { kind: "missing" };
  const m = BEARER.exec(raw.trim());
  if (!m) return { kind: "badFormat" };
  const token = m[1].trim();
  return token ? { kind: "found", token } : { kind: "badFormat" };
}

function fromCookie(req: Request, cookieName: string): Extraction {
  const jar: unknown = req.cookies;
  if (!jar || typeof jar !== "object") return { kind: "missing" };
  const value: unknown = Reflect.get(jar, cookieName);
  if (typeof value !== "string" || !value.trim()) return { kind: "missing" };
  return { kind: "found", token: value.trim() };
}

export function authGate(opts: AuthGateOptions): RequestHandler {
  const log = getLogger().child({ component: "authGate" });
  const identityHeader = opts.identityHeader.toLowerCase();

  const reject = (
    req: Request,
    res: Parameters<RequestHandler>[1],
    reason: string,
    details: Record<string, unknown> = {}
  ) => {
    logSecurity(req, {
      kind: "auth_failed",
      reason,
      decision: "blocked",
      status: 401,
      details,
    });
    sendProblem(req, res, 401, "Unauthorized", "Authentication required");
  };

  return (req, res, next) => {
    const path = req.path || "/";

    delete req.headers[identityHeader];

    if (isOpenEndpoint(path, opts.openEndpoints)) {
      logSecurity(req, {
        kind: "auth_bypassed",
        reason: "open_endpoint",
        decision: "allowed",
      });
      return next();
    }

    const extracted =
      opts.credentialSource === "cookie"
        ? fromCookie(req, opts.cookieName)
        : fromHeader(req);

    if (extracted.kind === "missing") {
      return reject(req, res, "missing_credential", {
        source: opts.credentialSource,
      });
    }
    if (extracted.kind === "badFormat") {
      return reject(req, res, "bad_scheme", { source: "header" });
    }

    const token = extracted.token;
    try {
      const result = opts.verifier.verify(token);
      if (!result.ok) {
        return reject(req, res, `verification_${result.error}`, {
          token: maskSecret(token),
          message: result.message,
        });
      }

      req.headers[identityHeader] = result.identity;
      logSecurity(req, {
        kind: "auth_passed",
        reason: "verified",
        decision: "allowed",
        details: { identity: result.identity, token: maskSecret(token) },
      });
      return next();
    } catch (err) {
      log.error(
        { err, token: maskSecret(token), path },
        "credential verification faulted"
      );
      return reject(req, res, "verification_fault", {
        token: maskSecret(token),
      });
    }
  };
}
