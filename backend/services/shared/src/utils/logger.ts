// backend/services/shared/src/utils/logger.ts
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * Each service calls `initLogger(SERVICE_NAME)` at bootstrap, BEFORE
 * creating request loggers (pino-http) or long-lived component children.
 *
 * Usage:
 *   import { initLogger, getLogger } from "@edge/shared/src/utils/logger";
 *   initLogger("gateway");
 *   const log = getLogger().child({ component: "RouteReconciler" });
 *
 * Env:
 *   LOG_LEVEL = fatal | error | warn | info | debug | trace | silent  (default info)
 */

const validLevels: ReadonlySet<string> = new Set<LevelWithSilent>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

function resolveLevel(): LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "info").trim().toLowerCase();
  if (!isLevel(raw)) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return raw;
}

// NOTE: no "service" in base until initLogger() runs.
function buildOptions(base: Record<string, unknown>): LoggerOptions {
  return {
    level: resolveLevel(),
    base,
    timestamp: stdTimeFunctions.isoTime,
    redact: {
      remove: true,
      paths: ["req.headers.authorization", "req.headers.cookie"],
    },
  };
}

let ROOT: Logger = pino(buildOptions({}));

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): void {
  const service = String(serviceName || "").trim();
  if (!service) throw new Error("initLogger requires serviceName");
  ROOT = pino(buildOptions({ service }));
}

/** Current root logger. Resolve at construction time, not at module import. */
export function getLogger(): Logger {
  return ROOT;
}

export type { Logger };
