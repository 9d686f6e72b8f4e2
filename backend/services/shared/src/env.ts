// backend/services/shared/src/env.ts

/**
 * Why:
 * - Deterministic environment loading for every service with strict precedence:
 *   repo root → service family → service root. Later wins.
 * - Per NODE_ENV, try these at each layer:
 *   dev:        .env.dev → .env
 *   test:       .env.test → .env
 *   production: .env (optional; prefer injected env)
 * - Typed accessors fail fast with the offending key in the message.
 *
 * Notes:
 * - Only env cascade + validators live here. Boot policy is in each service's bootstrap.
 * - dotenv-expand so `${VAR}` references work across files.
 */

import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { expand } from "dotenv-expand";

export type EnvSource = Record<string, string | undefined>;

/** Find the first directory upward from `start` that contains any of the markers. */
function findRootWithMarkers(start: string, markers: string[]): string | null {
  let dir = path.resolve(start);
  for (;;) {
    for (const m of markers) {
      if (fs.existsSync(path.join(dir, m))) return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/** Load a single env file if it exists; expand vars; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = dotenv.config({ path: absPath });
  if (parsed.error) {
    throw new Error(
      `Failed to load env file: ${absPath} — ${String(parsed.error)}`
    );
  }
  expand(parsed);
  return true;
}

/**
 * Cascading loader for a service.
 *
 * Order (always): repoRoot → serviceFamilyDir → serviceRoot.
 * Returns the list of files actually loaded (for the boot log).
 */
export function loadEnvCascadeForService(
  serviceRootAbs: string,
  opts: { allowMissingInProd?: boolean } = {}
): string[] {
  const mode = (process.env.NODE_ENV || "dev").trim();

  const serviceRoot = path.resolve(serviceRootAbs);
  const serviceFamilyDir = path.dirname(serviceRoot);
  const repoRoot =
    findRootWithMarkers(path.dirname(serviceFamilyDir), [
      ".git",
      "package.json",
    ]) || path.resolve(serviceRoot, "..", "..", "..");

  const modeFiles =
    mode === "dev"
      ? [".env.dev", ".env"]
      : mode === "test"
      ? [".env.test", ".env"]
      : [".env"];

  const layers = [repoRoot, serviceFamilyDir, serviceRoot];
  const candidates: string[] = [];
  for (const dir of layers) {
    for (const name of modeFiles) candidates.push(path.join(dir, name));
  }

  // dotenv never overwrites, so load the most specific layer first.
  const loaded: string[] = [];
  for (const p of [...candidates].reverse()) {
    if (loadIfExists(p)) loaded.push(p);
  }

  const allowMissing =
    mode === "production" && (opts.allowMissingInProd ?? true);
  if (loaded.length === 0 && !allowMissing) {
    throw new Error(
      `No env files found for mode="${mode}". Looked in:\n` +
        candidates.map((p) => `  - ${p}`).join("\n")
    );
  }
  return loaded;
}

// ── Assertions / getters ─────────────────────────────────────────────────────

export function assertEnv(keys: string[], env: EnvSource = process.env): void {
  const missing = keys.filter((k) => !env[k] || String(env[k]).trim() === "");
  if (missing.length) {
    throw new Error(`Missing required env vars: ${missing.join(", ")}`);
  }
}

export function requireEnv(name: string, env: EnvSource = process.env): string {
  const v = env[name];
  if (!v || v.trim() === "") {
    throw new Error(`Missing required env var: ${name}`);
  }
  return v.trim();
}

export function optionalEnv(
  name: string,
  dflt: string,
  env: EnvSource = process.env
): string {
  const v = env[name];
  return typeof v === "string" && v.trim() !== "" ? v.trim() : dflt;
}

export function requireNumber(name: string, env: EnvSource = process.env): number {
  const raw = requireEnv(name, env);
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Env var ${name} must be a number (got "${raw}")`);
  }
  return n;
}

export function optionalNumber(
  name: string,
  dflt: number,
  env: EnvSource = process.env
): number {
  const v = env[name];
  if (v === undefined || v.trim() === "") return dflt;
  const n = Number(v);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`Env var ${name} must be a non-negative number (got "${v}")`);
  }
  return n;
}

export function requireEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env
): T {
  const raw = requireEnv(name, env);
  const hit = allowed.find((a) => a === raw);
  if (!hit) {
    throw new Error(
      `Env var ${name} must be one of ${allowed.join("|")} (got "${raw}")`
    );
  }
  return hit;
}

/** Pipe- or comma-delimited list; blanks dropped, order kept. */
export function toList(v?: string): string[] {
  return String(v || "")
    .split(/[|,]/)
    .map((s) => s.trim())
    .filter(Boolean);
}
