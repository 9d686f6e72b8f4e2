// backend/services/gateway/test/helpers/fixtures.ts
import jwt, { type SignOptions } from "jsonwebtoken";
import type { EnvSource } from "@edge/shared/src/env";

/** Placeholder HMAC key, 280 bits once decoded. */
export const TEST_SECRET_B64 = Buffer.from(
  "test-secret-test-secret-test-secret"
).toString("base64");
export const TEST_KEY = Buffer.from(TEST_SECRET_B64, "base64");

export const OTHER_KEY = Buffer.from("other-secret-other-secret-other-secret");

export function signToken(
  claims: Record<string, unknown>,
  key: Buffer = TEST_KEY,
  opts: SignOptions = {}
): string {
  return jwt.sign(claims, key, { algorithm: "HS256", ...opts });
}

export function nowSec(): number {
  return Math.floor(Date.now() / 1000);
}

export function testEnv(overrides: EnvSource = {}): EnvSource {
  return {
    GATEWAY_PORT: "4000",
    JWT_SECRET: TEST_SECRET_B64,
    REGISTRY_BASE_URL: "http://registry.test/",
    ...overrides,
  };
}
