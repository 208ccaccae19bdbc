import type { SearchSort } from "@threadloom/connectors";
import { parseUtcDate, splitList } from "@threadloom/shared";

export const DEFAULT_POST_LIMIT = 100;

export interface CliArgs {
  positional: string[];
  auth: boolean;
  /** null = everything the seed returns ("--limit all") */
  limit: number | null;
  lang: string | null;
  since: Date | null;
  until: Date | null;
  out: string;
  ndjson: boolean;
  concurrency: number | null;
  maxComments: number | null;
  maxDepth: number | null;
  metrics: boolean;
  exclude: string[];
  sort: SearchSort | null;
}

const VALUE_FLAGS = new Set([
  "--limit",
  "--lang",
  "--since",
  "--until",
  "--out",
  "--concurrency",
  "--max-comments",
  "--max-depth",
  "--exclude",
  "--sort",
]);

function parseCount(flag: string, raw: string, min: number): number {
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== raw.trim() || parsed < min) {
    throw new Error(`Invalid ${flag} (expected an integer >= ${min})`);
  }
  return parsed;
}

function parseDateFlag(flag: string, raw: string, endOfDay: boolean): Date {
  const parsed = parseUtcDate(raw, { endOfDay });
  if (!parsed) throw new Error(`Invalid ${flag} (expected YYYY-MM-DD or "YYYY-MM-DD HH:MM[:SS]")`);
  return parsed;
}

/**
 * Parse shared crawl options. Accepts `--flag value` and `--flag=value`.
 * Throws Error("help") for -h/--help.
 */
export function parseCliArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    positional: [],
    auth: false,
    limit: DEFAULT_POST_LIMIT,
    lang: null,
    since: null,
    until: null,
    out: "output",
    ndjson: false,
    concurrency: null,
    maxComments: null,
    maxDepth: null,
    metrics: false,
    exclude: [],
    sort: null,
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? "";
    if (arg === "--help" || arg === "-h") throw new Error("help");
    if (arg === "--auth") {
      parsed.auth = true;
      continue;
    }
    if (arg === "--ndjson") {
      parsed.ndjson = true;
      continue;
    }
    if (arg === "--metrics") {
      parsed.metrics = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      parsed.positional.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    if (!VALUE_FLAGS.has(flag)) throw new Error(`Unknown option: ${flag}`);
    let value: string;
    if (eq > 0) {
      value = arg.slice(eq + 1);
    } else {
      const next = args[i + 1];
      if (next === undefined || next.trim().length === 0) throw new Error(`Missing ${flag} value`);
      value = next;
      i += 1;
    }

    switch (flag) {
      case "--limit":
        parsed.limit = value === "all" ? null : parseCount(flag, value, 1);
        break;
      case "--lang":
        parsed.lang = value.trim().toLowerCase();
        break;
      case "--since":
        parsed.since = parseDateFlag(flag, value, false);
        break;
      case "--until":
        parsed.until = parseDateFlag(flag, value, true);
        break;
      case "--out":
        parsed.out = value;
        break;
      case "--concurrency":
        parsed.concurrency = parseCount(flag, value, 1);
        break;
      case "--max-comments":
        parsed.maxComments = parseCount(flag, value, 0);
        break;
      case "--max-depth":
        parsed.maxDepth = parseCount(flag, value, 0);
        break;
      case "--exclude":
        parsed.exclude.push(...splitList(value));
        break;
      case "--sort":
        if (value !== "top" && value !== "latest") throw new Error("Invalid --sort (expected top or latest)");
        parsed.sort = value;
        break;
    }
  }

  if (parsed.since && parsed.until && parsed.since.getTime() > parsed.until.getTime()) {
    throw new Error("--since must not be after --until");
  }
  return parsed;
}
