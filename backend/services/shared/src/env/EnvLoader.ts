// backend/services/shared/src/env/EnvLoader.ts
/**
 * Deterministic env loading plus strict, typed accessors.
 *
 * Load order & precedence:
 *   1) <root>/.env, <root>/.env.<mode>   (never override the real environment)
 *   2) ENV_FILE (if provided)            (overrides earlier files, not the real environment)
 *
 * Accessors take the env record explicitly so config stays a pure function.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

export type EnvRecord = Record<string, string | undefined>;

/** Uppercase-with-underscores guard; we don’t set weird keys. */
const VALID_KEY = /^[A-Z0-9_]+$/;

export type ApplyStats = {
  file: string;
  newKeys: number;
  overrides: number;
  totalKeys: number;
};

function applyEnvFromFile(
  file: string,
  protectedKeys: ReadonlySet<string>,
  target: EnvRecord
): ApplyStats {
  const kv = dotenv.parse(fs.readFileSync(file, "utf8"));
  let newKeys = 0;
  let overrides = 0;
  for (const [k, v] of Object.entries(kv)) {
    if (!VALID_KEY.test(k) || protectedKeys.has(k)) continue;
    if (target[k] === undefined) newKeys++;
    else if (target[k] !== v) overrides++;
    target[k] = v;
  }
  return { file, newKeys, overrides, totalKeys: Object.keys(kv).length };
}

export type LoadEnvOptions = {
  /** Directory holding the .env files. Defaults to process.cwd(). */
  root?: string;
  mode?: string;
  target?: EnvRecord;
};

export function loadEnvFiles(opts: LoadEnvOptions = {}): ApplyStats[] {
  const target = opts.target ?? process.env;
  const root = opts.root ?? process.cwd();
  const mode = (opts.mode ?? target.NODE_ENV ?? "development").trim();

  // Keys present before loading belong to the real environment.
  const protectedKeys = new Set(
    Object.keys(target).filter((k) => target[k] !== undefined)
  );

  const files = [path.join(root, ".env"), path.join(root, `.env.${mode}`)];
  const explicit = target.ENV_FILE?.trim();
  if (explicit) {
    files.push(path.isAbsolute(explicit) ? explicit : path.join(root, explicit));
  }

  const seen = new Set<string>();
  const stats: ApplyStats[] = [];
  for (const f of files) {
    const abs = path.resolve(f);
    if (seen.has(abs) || !fs.existsSync(abs)) continue;
    seen.add(abs);
    stats.push(applyEnvFromFile(abs, protectedKeys, target));
  }
  return stats;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Strict, typed accessors
 * ──────────────────────────────────────────────────────────────────────────── */

function present(env: EnvRecord, name: string): string | undefined {
  const v = env[name];
  if (v == null || v.trim() === "") return undefined;
  return v.trim();
}

export function envString(env: EnvRecord, name: string, fallback: string): string {
  return present(env, name) ?? fallback;
}

export function envInt(
  env: EnvRecord,
  name: string,
  fallback: number,
  opts?: { min?: number; max?: number }
): number {
  const v = present(env, name);
  if (v === undefined) return fallback;
  const n = Number(v);
  if (!Number.isInteger(n)) {
    throw new Error(`ENV: ${name} must be an integer (got: "${v}").`);
  }
  if (opts?.min != null && n < opts.min) {
    throw new Error(`ENV: ${name} must be >= ${opts.min} (got: ${n}).`);
  }
  if (opts?.max != null && n > opts.max) {
    throw new Error(`ENV: ${name} must be <= ${opts.max} (got: ${n}).`);
  }
  return n;
}

export function envOneOf<T extends string>(
  env: EnvRecord,
  name: string,
  allowed: readonly T[],
  fallback: T
): T {
  const v = present(env, name);
  if (v === undefined) return fallback;
  const hit = allowed.find((a) => a === v);
  if (hit === undefined) {
    throw new Error(
      `ENV: ${name} must be one of ${allowed.join(", ")} (got: "${v}").`
    );
  }
  return hit;
}
