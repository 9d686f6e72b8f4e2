// backend/services/shared/src/utils/securityLog.ts

/**
 * Why:
 * - Guardrail denials and anomalous edge decisions belong to SECURITY telemetry,
 *   not access logs. Credentials never appear here unmasked.
 */
import type { Request } from "express";
import { getLogger } from "./logger";

type SecurityKind = "auth_failed" | "auth_bypassed" | "auth_passed";

export interface SecurityEvent {
  kind: SecurityKind;
  reason: string;
  decision: "blocked" | "allowed";
  status?: number;
  details?: Record<string, unknown>;
}

/** Show only a short prefix/suffix of a secret; short values are fully hidden. */
export function maskSecret(value: string | undefined | null): string {
  if (!value) return "<none>";
  if (value.length <= 12) return "****";
  return `${value.slice(0, 4)}…${value.slice(-4)}`;
}

export function logSecurity(req: Request, ev: SecurityEvent): void {
  const secLogger = getLogger().child({ channel: "security" });
  const payload = {
    ...ev,
    requestId: req.id !== undefined ? String(req.id) : undefined,
    method: req.method,
    path: req.originalUrl || req.url,
  };
  const msg = `[SECURITY] ${req.method} ${req.path} → ${ev.decision} (${ev.reason})`;

  if (ev.decision === "blocked") secLogger.warn(payload, msg);
  else secLogger.debug(payload, msg);
}
