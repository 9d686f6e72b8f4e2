// backend/services/gateway/src/config.ts

/**
 * Why:
 * - Centralize explicit env parsing with hard assertions; field names match the
 *   components that consume them 1:1.
 * - Pure over its input so tests build configs without touching process.env.
 *
 * Env:
 *   GATEWAY_PORT=4000
 *   JWT_SECRET=<base64 HMAC key, ≥ 256 bits decoded>
 *   JWT_IDENTITY_CLAIM=sub            JWT_ISSUER / JWT_AUDIENCE (optional)
 *   JWT_CLOCK_SKEW_SEC=0
 *   AUTH_CREDENTIAL_SOURCE=header|cookie   AUTH_COOKIE_NAME=token
 *   AUTH_IDENTITY_HEADER=x-user
 *   AUTH_OPEN_ENDPOINTS=/health|/auth/login|/auth/register   (substring match)
 *   REGISTRY_BASE_URL=http://127.0.0.1:8761   REGISTRY_SERVICES_PATH=/services
 *   REGISTRY_TIMEOUT_MS=3000
 *   REDIS_URL (optional)   REGISTRY_CHANNEL=registry:changed
 *   ROUTES_EXCLUDED_SERVICES=registry|config-server
 *   ROUTES_INITIAL_DELAY_MS=2000   ROUTES_FALLBACK_INTERVAL_MS=30000 (0 = off)
 *   PROXY_TIMEOUT_MS=15000
 */

import {
  type EnvSource,
  optionalEnv,
  optionalNumber,
  requireEnum,
  requireEnv,
  requireNumber,
  toList,
} from "@edge/shared/src/env";

export const SERVICE_NAME = "gateway" as const;

export type CredentialSource = "header" | "cookie";

export type GatewayConfig = {
  serviceName: string;
  port: number;
  jwt: {
    key: Buffer;
    identityClaim: string;
    issuer?: string;
    audience?: string;
    clockToleranceSec: number;
  };
  auth: {
    credentialSource: CredentialSource;
    cookieName: string;
    identityHeader: string;
    openEndpoints: string[];
  };
  registry: {
    baseUrl: string;
    servicesPath: string;
    timeoutMs: number;
    redisUrl?: string;
    channel: string;
  };
  routes: {
    excludedServices: string[];
    initialDelayMs: number;
    fallbackIntervalMs: number;
  };
  proxy: {
    timeoutMs: number;
  };
};

const MIN_KEY_BYTES = 32;

/** Decode the base64 HMAC key; reject anything under 256 bits. */
export function decodeSigningKey(b64: string): Buffer {
  const normalized = b64.trim();
  if (!/^[A-Za-z0-9+/_-]+={0,2}$/.test(normalized)) {
    throw new Error("JWT_SECRET must be base64-encoded");
  }
  const key = Buffer.from(normalized, "base64");
  if (key.length < MIN_KEY_BYTES) {
    throw new Error(
      `JWT_SECRET decodes to ${key.length * 8} bits; at least ${
        MIN_KEY_BYTES * 8
      } bits are required`
    );
  }
  return key;
}

function optional(name: string, env: EnvSource): string | undefined {
  const v = env[name];
  return v && v.trim() ? v.trim() : undefined;
}

export function loadGatewayConfig(env: EnvSource = process.env): GatewayConfig {
  const excluded = toList(env.ROUTES_EXCLUDED_SERVICES);
  // The gateway never routes to itself.
  if (!excluded.some((s) => s.toLowerCase() === SERVICE_NAME)) {
    excluded.push(SERVICE_NAME);
  }

  const identityHeader = optionalEnv("AUTH_IDENTITY_HEADER", "x-user", env);
  if (!/^[A-Za-z0-9-]+$/.test(identityHeader)) {
    throw new Error(`AUTH_IDENTITY_HEADER is not a valid header name`);
  }

  return {
    serviceName: SERVICE_NAME,
    port: requireNumber("GATEWAY_PORT", env),
    jwt: {
      key: decodeSigningKey(requireEnv("JWT_SECRET", env)),
      identityClaim: optionalEnv("JWT_IDENTITY_CLAIM", "sub", env),
      issuer: optional("JWT_ISSUER", env),
      audience: optional("JWT_AUDIENCE", env),
      clockToleranceSec: optionalNumber("JWT_CLOCK_SKEW_SEC", 0, env),
    },
    auth: {
      credentialSource: env.AUTH_CREDENTIAL_SOURCE
        ? requireEnum("AUTH_CREDENTIAL_SOURCE", ["header", "cookie"], env)
        : "header",
      cookieName: optionalEnv("AUTH_COOKIE_NAME", "token", env),
      identityHeader: identityHeader.toLowerCase(),
      openEndpoints: env.AUTH_OPEN_ENDPOINTS
        ? toList(env.AUTH_OPEN_ENDPOINTS)
        : ["/health"],
    },
    registry: {
      baseUrl: requireEnv("REGISTRY_BASE_URL", env).replace(/\/+$/, ""),
      servicesPath: optionalEnv("REGISTRY_SERVICES_PATH", "/services", env),
      timeoutMs: optionalNumber("REGISTRY_TIMEOUT_MS", 3000, env),
      redisUrl: optional("REDIS_URL", env),
      channel: optionalEnv("REGISTRY_CHANNEL", "registry:changed", env),
    },
    routes: {
      excludedServices: excluded,
      initialDelayMs: optionalNumber("ROUTES_INITIAL_DELAY_MS", 2000, env),
      fallbackIntervalMs: optionalNumber(
        "ROUTES_FALLBACK_INTERVAL_MS",
        30_000,
        env
      ),
    },
    proxy: {
      timeoutMs: optionalNumber("PROXY_TIMEOUT_MS", 15_000, env),
    },
  };
}
