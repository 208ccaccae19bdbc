import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { createLogger } from "../logging";

const log = createLogger({ component: "config" });

const ENV_FILES = [".env", ".env.local"] as const;

function hasWorkspaces(pkgPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
    return typeof pkg === "object" && pkg !== null && "workspaces" in pkg;
  } catch (err) {
    log.debug({ pkgPath, err: err instanceof Error ? err.message : String(err) }, "Unreadable package.json");
    return false;
  }
}

/**
 * Walk up from `startDir` to the first directory holding a .env file or the
 * workspaces package.json. Falls back to `startDir`.
 */
export function findProjectRoot(startDir: string): string {
  let dir = startDir;
  for (;;) {
    if (existsSync(resolve(dir, ".env"))) return dir;
    const pkgPath = resolve(dir, "package.json");
    if (existsSync(pkgPath) && hasWorkspaces(pkgPath)) return dir;
    const parent = dirname(dir);
    if (parent === dir) return startDir;
    dir = parent;
  }
}

function unquote(raw: string): string {
  const quote = raw[0];
  let out = "";
  let escaped = false;
  for (let i = 1; i < raw.length; i += 1) {
    const ch = raw.charAt(i);
    if (escaped) {
      out += ch;
      escaped = false;
    } else if (ch === "\\") {
      escaped = true;
    } else if (ch === quote) {
      return out;
    } else {
      out += ch;
    }
  }
  // Unclosed quote: keep the raw text minus the opening quote.
  return raw.slice(1);
}

function parseValue(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed.startsWith('"') || trimmed.startsWith("'")) return unquote(trimmed);
  // " # ..." starts a comment; a bare "#" inside a value (e.g. a password) does not.
  const comment = trimmed.search(/\s#/);
  return comment >= 0 ? trimmed.slice(0, comment).trimEnd() : trimmed;
}

/**
 * Parse dotenv-style text. Supports `export KEY=value`, quoted values and
 * trailing comments.
 */
export function parseDotEnv(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const body = trimmed.startsWith("export ") ? trimmed.slice(7) : trimmed;
    const idx = body.indexOf("=");
    if (idx <= 0) continue;
    out[body.slice(0, idx).trim()] = parseValue(body.slice(idx + 1));
  }
  return out;
}

/**
 * Load .env then .env.local from the project root into `env` without
 * overriding variables that are already set. Returns the files that were read.
 */
export function loadDotEnvIfPresent(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const root = findProjectRoot(cwd);
  const loaded: string[] = [];
  for (const filename of ENV_FILES) {
    const fullPath = resolve(root, filename);
    if (!existsSync(fullPath)) continue;
    let raw: string;
    try {
      raw = readFileSync(fullPath, "utf8");
    } catch (err) {
      log.warn({ filename, err: err instanceof Error ? err.message : String(err) }, "Failed to read env file");
      continue;
    }
    for (const [key, value] of Object.entries(parseDotEnv(raw))) {
      if (env[key] === undefined) env[key] = value;
    }
    loaded.push(fullPath);
  }
  return loaded;
}
