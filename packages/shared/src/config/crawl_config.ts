import { CrawlError } from "../errors";
import type { AuthMode } from "../types/ports";

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  maxRetries: number;
  /** Fraction (0..1) of each delay that is randomized away. */
  jitter: number;
}

export interface Credentials {
  identifier: string;
  password: string;
}

export interface CrawlConfig {
  authMode: AuthMode;
  concurrency: number;
  queueCapacity: number;

  maxTopLevelComments: number;
  maxDepth: number;
  /** null = keep every reply the API returns */
  maxRepliesPerComment: number | null;
  /** null = follow cursors until the server stops returning one */
  pageLimit: number | null;
  pageDelayMs: number;

  requestTimeoutMs: number;
  backoff: BackoffPolicy;

  /** Escalate an anonymous discovery that hits AuthRequired to the session transport. */
  authFallback: boolean;

  publicServiceUrl: string;
  authServiceUrl: string;
  credentials: Credentials | null;
}

export const DEFAULT_MAX_TOP_LEVEL_COMMENTS = 150;
export const DEFAULT_CONCURRENCY = 10;
export const DEFAULT_PUBLIC_SERVICE_URL = "https://public.api.bsky.app";
export const DEFAULT_AUTH_SERVICE_URL = "https://bsky.social";

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseDelayMs: 500,
  maxDelayMs: 30_000,
  maxRetries: 3,
  jitter: 0.5,
};

export type CrawlConfigOverrides = Partial<Omit<CrawlConfig, "backoff">> & {
  backoff?: Partial<BackoffPolicy>;
};

function configError(message: string): CrawlError {
  return new CrawlError("ConfigError", message);
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseIntEnv(name: string, value: string | undefined, fallback: number): number {
  const raw = nonEmpty(value);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw configError(`Invalid integer env var: ${name}=${raw}`);
  }
  return parsed;
}

function parseOptionalIntEnv(name: string, value: string | undefined): number | null {
  const raw = nonEmpty(value);
  if (raw === undefined || raw === "none" || raw === "unlimited") return null;
  return parseIntEnv(name, raw, 0);
}

function parseFloatEnv(name: string, value: string | undefined, fallback: number): number {
  const raw = nonEmpty(value);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw configError(`Invalid number env var: ${name}=${raw}`);
  }
  return parsed;
}

function parseBoolEnv(value: string | undefined, fallback: boolean): boolean {
  const raw = nonEmpty(value)?.toLowerCase();
  if (raw === undefined) return fallback;
  return raw === "1" || raw === "true" || raw === "yes" || raw === "on";
}

function parseAuthMode(value: string | undefined): AuthMode {
  const raw = nonEmpty(value)?.toLowerCase() ?? "anonymous";
  if (raw === "anonymous" || raw === "public") return "anonymous";
  if (raw === "authenticated" || raw === "session") return "authenticated";
  throw configError(`Invalid CRAWL_AUTH_MODE: ${raw} (expected anonymous|authenticated)`);
}

function normalizeServiceUrl(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Range and consistency checks. Throws ConfigError on the first violation.
 * `externalCredentials` skips the credential check for callers that supply
 * their own credential source.
 */
export function validateCrawlConfig(
  config: CrawlConfig,
  options: { externalCredentials?: boolean } = {},
): CrawlConfig {
  if (config.concurrency < 1) throw configError("concurrency must be >= 1");
  if (config.queueCapacity < 1) throw configError("queueCapacity must be >= 1");
  if (config.maxTopLevelComments < 0) throw configError("maxTopLevelComments must be >= 0");
  if (config.maxDepth < 0) throw configError("maxDepth must be >= 0");
  if (config.maxRepliesPerComment !== null && config.maxRepliesPerComment < 0) {
    throw configError("maxRepliesPerComment must be >= 0");
  }
  if (config.pageLimit !== null && config.pageLimit < 1) throw configError("pageLimit must be >= 1");
  if (config.pageDelayMs < 0) throw configError("pageDelayMs must be >= 0");
  if (config.requestTimeoutMs < 1) throw configError("requestTimeoutMs must be >= 1");
  if (config.backoff.baseDelayMs < 0 || config.backoff.maxDelayMs < 0) {
    throw configError("backoff delays must be >= 0");
  }
  if (config.backoff.maxRetries < 0) throw configError("backoff.maxRetries must be >= 0");
  if (config.backoff.jitter < 0 || config.backoff.jitter > 1) {
    throw configError("backoff.jitter must be between 0 and 1");
  }
  if (config.authMode === "authenticated" && !config.credentials && !options.externalCredentials) {
    throw configError(
      "Authenticated mode requires credentials. Set BSKY_USERNAME and BSKY_PASSWORD (an app password).",
    );
  }
  return config;
}

/**
 * Build the crawl configuration from env vars, then apply explicit overrides
 * (CLI flags, tests). Call loadDotEnvIfPresent() first when .env files should apply.
 */
export function loadCrawlConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: CrawlConfigOverrides = {},
): CrawlConfig {
  const concurrency = parseIntEnv("CRAWL_CONCURRENCY", env.CRAWL_CONCURRENCY, DEFAULT_CONCURRENCY);
  const identifier = nonEmpty(env.BSKY_USERNAME);
  const password = nonEmpty(env.BSKY_PASSWORD);

  const fromEnv: CrawlConfig = {
    authMode: parseAuthMode(env.CRAWL_AUTH_MODE),
    concurrency,
    queueCapacity: parseIntEnv("CRAWL_QUEUE_CAPACITY", env.CRAWL_QUEUE_CAPACITY, concurrency * 2),
    maxTopLevelComments: parseIntEnv(
      "CRAWL_MAX_TOP_LEVEL_COMMENTS",
      env.CRAWL_MAX_TOP_LEVEL_COMMENTS,
      DEFAULT_MAX_TOP_LEVEL_COMMENTS,
    ),
    maxDepth: parseIntEnv("CRAWL_MAX_DEPTH", env.CRAWL_MAX_DEPTH, 1),
    maxRepliesPerComment: parseOptionalIntEnv(
      "CRAWL_MAX_REPLIES_PER_COMMENT",
      env.CRAWL_MAX_REPLIES_PER_COMMENT,
    ),
    pageLimit: parseOptionalIntEnv("CRAWL_PAGE_LIMIT", env.CRAWL_PAGE_LIMIT),
    pageDelayMs: parseIntEnv("CRAWL_PAGE_DELAY_MS", env.CRAWL_PAGE_DELAY_MS, 500),
    requestTimeoutMs: parseIntEnv("CRAWL_REQUEST_TIMEOUT_MS", env.CRAWL_REQUEST_TIMEOUT_MS, 20_000),
    backoff: {
      baseDelayMs: parseIntEnv("CRAWL_BACKOFF_BASE_MS", env.CRAWL_BACKOFF_BASE_MS, DEFAULT_BACKOFF.baseDelayMs),
      maxDelayMs: parseIntEnv("CRAWL_BACKOFF_MAX_MS", env.CRAWL_BACKOFF_MAX_MS, DEFAULT_BACKOFF.maxDelayMs),
      maxRetries: parseIntEnv("CRAWL_BACKOFF_RETRIES", env.CRAWL_BACKOFF_RETRIES, DEFAULT_BACKOFF.maxRetries),
      jitter: parseFloatEnv("CRAWL_BACKOFF_JITTER", env.CRAWL_BACKOFF_JITTER, DEFAULT_BACKOFF.jitter),
    },
    authFallback: parseBoolEnv(env.CRAWL_AUTH_FALLBACK, false),
    publicServiceUrl: normalizeServiceUrl(nonEmpty(env.BSKY_PUBLIC_SERVICE) ?? DEFAULT_PUBLIC_SERVICE_URL),
    authServiceUrl: normalizeServiceUrl(nonEmpty(env.BSKY_SERVICE) ?? DEFAULT_AUTH_SERVICE_URL),
    credentials: identifier && password ? { identifier, password } : null,
  };

  const { backoff, ...rest } = overrides;
  const pick = <K extends keyof Omit<CrawlConfig, "backoff">>(key: K): CrawlConfig[K] => {
    const value: Partial<Omit<CrawlConfig, "backoff">>[K] = rest[key];
    return value === undefined ? fromEnv[key] : value;
  };

  return validateCrawlConfig({
    authMode: pick("authMode"),
    concurrency: pick("concurrency"),
    queueCapacity:
      rest.queueCapacity ??
      (rest.concurrency !== undefined && env.CRAWL_QUEUE_CAPACITY === undefined
        ? rest.concurrency * 2
        : fromEnv.queueCapacity),
    maxTopLevelComments: pick("maxTopLevelComments"),
    maxDepth: pick("maxDepth"),
    maxRepliesPerComment: pick("maxRepliesPerComment"),
    pageLimit: pick("pageLimit"),
    pageDelayMs: pick("pageDelayMs"),
    requestTimeoutMs: pick("requestTimeoutMs"),
    backoff: { ...fromEnv.backoff, ...backoff },
    authFallback: pick("authFallback"),
    publicServiceUrl: pick("publicServiceUrl"),
    authServiceUrl: pick("authServiceUrl"),
    credentials: pick("credentials"),
  });
}
