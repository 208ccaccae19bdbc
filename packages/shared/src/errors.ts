/**
 * Error taxonomy shared by the transport, paginator, fetcher and scheduler.
 *
 * - AuthRequired: anonymous call rejected with a 403-class status; switch transport, do not retry
 * - AuthUnavailable: no usable session could be obtained from the credential source
 * - CursorRejected: server refused an oversized cursor (414); switch transport or truncate
 * - RateLimited / Transient: retried by the paginator, surfaced once retries run out
 * - NotFound / ApiError: non-retryable API responses
 * - PostUnavailable: the post is deleted, blocked or missing; terminal for one task
 * - Cancelled: the run was aborted before the task started
 * - ConfigError: invalid configuration, fatal at startup
 */
export type CrawlErrorKind =
  | "AuthRequired"
  | "AuthUnavailable"
  | "CursorRejected"
  | "RateLimited"
  | "Transient"
  | "NotFound"
  | "ApiError"
  | "PostUnavailable"
  | "Cancelled"
  | "ConfigError";

const RETRYABLE_KINDS: ReadonlySet<CrawlErrorKind> = new Set(["RateLimited", "Transient"]);

export interface CrawlErrorOptions {
  status?: number;
  endpoint?: string;
  retryAfterMs?: number;
  cause?: unknown;
}

export class CrawlError extends Error {
  readonly kind: CrawlErrorKind;
  readonly status?: number;
  readonly endpoint?: string;
  readonly retryAfterMs?: number;

  constructor(kind: CrawlErrorKind, message: string, options: CrawlErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "CrawlError";
    this.kind = kind;
    this.status = options.status;
    this.endpoint = options.endpoint;
    this.retryAfterMs = options.retryAfterMs;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      ...(this.status !== undefined && { status: this.status }),
      ...(this.endpoint && { endpoint: this.endpoint }),
      ...(this.retryAfterMs !== undefined && { retryAfterMs: this.retryAfterMs }),
    };
  }
}

export function isCrawlError(error: unknown, kind?: CrawlErrorKind): error is CrawlError {
  if (!(error instanceof CrawlError)) return false;
  return kind === undefined || error.kind === kind;
}

/**
 * Wrap anything thrown into a CrawlError. Unknown failures are treated as transient
 * (network stacks throw plain TypeErrors for resets and DNS failures).
 */
export function toCrawlError(error: unknown, fallbackKind: CrawlErrorKind = "Transient"): CrawlError {
  if (error instanceof CrawlError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CrawlError(fallbackKind, message, { cause: error });
}

export function errorKindOf(error: unknown): CrawlErrorKind {
  return error instanceof CrawlError ? error.kind : "Transient";
}
