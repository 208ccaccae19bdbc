import { CrawlError, cleanInput, parseUtcDate, splitList } from "@threadloom/shared";

export type SearchSort = "top" | "latest";

export interface SearchSeedConfig {
  terms: string;
  exclude: string[];
  sort: SearchSort;
  lang: string | null;
  /** ISO timestamps passed through to the search endpoint. */
  since: string | null;
  until: string | null;
}

export interface AuthorSeedConfig {
  actor: string;
  since: Date | null;
  until: Date | null;
}

export interface FeedSeedConfig {
  feed: string;
}

function asText(value: unknown): string {
  return typeof value === "string" ? cleanInput(value) : "";
}

function asList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string").flatMap((v) => splitList(v));
  }
  return typeof value === "string" ? splitList(value) : [];
}

function asDate(name: string, value: unknown, endOfDay: boolean): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  const text = asText(value);
  if (!text) return null;
  const parsed = parseUtcDate(text, { endOfDay }) ?? (Number.isNaN(Date.parse(text)) ? null : new Date(text));
  if (!parsed) {
    throw new CrawlError("ConfigError", `Invalid ${name} date: ${text} (expected YYYY-MM-DD or YYYY-MM-DD HH:MM)`);
  }
  return parsed;
}

function checkWindow(since: Date | null, until: Date | null): void {
  if (since && until && since.getTime() > until.getTime()) {
    throw new CrawlError("ConfigError", "since must not be after until");
  }
}

export function parseSearchSeedConfig(config: Record<string, unknown>): SearchSeedConfig {
  const terms = asText(config.terms ?? config.query);
  const exclude = asList(config.exclude);
  if (!terms && exclude.length === 0) {
    throw new CrawlError("ConfigError", 'Search seed config must include non-empty "terms"');
  }
  const sort = config.sort === "top" ? "top" : "latest";
  const since = asDate("since", config.since, false);
  const until = asDate("until", config.until, true);
  checkWindow(since, until);
  return {
    terms,
    exclude,
    sort,
    lang: asText(config.lang).toLowerCase() || null,
    since: since?.toISOString() ?? null,
    until: until?.toISOString() ?? null,
  };
}

export function parseAuthorSeedConfig(config: Record<string, unknown>): AuthorSeedConfig {
  const actor = asText(config.actor ?? config.handle).replace(/^@/, "");
  if (!actor) {
    throw new CrawlError("ConfigError", 'Author seed config must include non-empty "actor"');
  }
  const since = asDate("since", config.since, false);
  const until = asDate("until", config.until, true);
  checkWindow(since, until);
  return { actor, since, until };
}

export function parseFeedSeedConfig(config: Record<string, unknown>): FeedSeedConfig {
  const feed = asText(config.feed);
  if (!feed) {
    throw new CrawlError("ConfigError", 'Feed seed config must include a feed URI or URL');
  }
  return { feed };
}
