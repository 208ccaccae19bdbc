import { CrawlError, type AuthMode } from "@threadloom/shared";

import { asString, isRecord, snippet } from "./json";

export type QueryValue = string | number | boolean | string[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

export interface XrpcResponse {
  status: number;
  data: unknown;
  headers: Headers;
}

export interface XrpcCallParams {
  fetchImpl: typeof fetch;
  url: string;
  endpoint: string;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

export const DEFAULT_USER_AGENT = "threadloom/0.1 (+comment-tree crawler)";

/**
 * `{service}/xrpc/{endpoint}?…`. Array params repeat the key; null and
 * undefined are dropped. The cursor is passed through untouched.
 */
export function buildXrpcUrl(
  serviceUrl: string,
  endpoint: string,
  params: QueryParams = {},
  cursor?: string | null,
): string {
  const url = new URL(`${serviceUrl.replace(/\/+$/, "")}/xrpc/${endpoint}`);
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    if (Array.isArray(value)) {
      for (const entry of value) url.searchParams.append(key, entry);
    } else {
      url.searchParams.set(key, String(value));
    }
  }
  if (cursor) url.searchParams.set("cursor", cursor);
  return url.toString();
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (text.length === 0) return null;
  const contentType = res.headers.get("content-type") ?? "";
  if (!contentType.includes("json")) return text;
  try {
    return JSON.parse(text);
  } catch (err) {
    if (res.ok) {
      throw new CrawlError("ApiError", `Malformed JSON body (${res.status})`, { status: res.status, cause: err });
    }
    return text;
  }
}

/**
 * One HTTP round trip with a hard timeout. Network failures and timeouts become
 * Transient; HTTP statuses are returned to the caller untouched.
 */
export async function performXrpcCall(params: XrpcCallParams): Promise<XrpcResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), params.timeoutMs);
  const headers: Record<string, string> = {
    accept: "application/json",
    "user-agent": DEFAULT_USER_AGENT,
    ...params.headers,
  };
  let body: string | undefined;
  if (params.body !== undefined) {
    headers["content-type"] = "application/json";
    body = JSON.stringify(params.body);
  }

  try {
    const res = await params.fetchImpl(params.url, {
      method: params.method ?? "GET",
      headers,
      body,
      signal: controller.signal,
    });
    return { status: res.status, data: await readBody(res), headers: res.headers };
  } catch (err) {
    if (err instanceof CrawlError) throw err;
    if (controller.signal.aborted) {
      throw new CrawlError("Transient", `${params.endpoint} timed out after ${params.timeoutMs}ms`, {
        endpoint: params.endpoint,
        cause: err,
      });
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new CrawlError("Transient", `${params.endpoint} network error: ${message}`, {
      endpoint: params.endpoint,
      cause: err,
    });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Delay requested by the server, from `retry-after` (seconds or HTTP date) or
 * `ratelimit-reset` (epoch seconds).
 */
export function parseRetryAfterMs(headers: Headers, now: number = Date.now()): number | undefined {
  const retryAfter = headers.get("retry-after");
  if (retryAfter) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000);
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) return Math.max(0, date - now);
  }
  const reset = Number(headers.get("ratelimit-reset") ?? "");
  if (Number.isFinite(reset) && reset > 0) return Math.max(0, reset * 1000 - now);
  return undefined;
}

export function xrpcErrorName(data: unknown): string | null {
  return isRecord(data) ? asString(data.error) : null;
}

function xrpcErrorMessage(data: unknown): string {
  if (isRecord(data)) {
    const message = asString(data.message) ?? asString(data.error);
    if (message) return message;
  }
  return snippet(data);
}

/**
 * Map a non-2xx XRPC response onto the crawl error taxonomy.
 */
export function mapXrpcError(endpoint: string, response: XrpcResponse, mode: AuthMode): CrawlError {
  const { status, data, headers } = response;
  const name = xrpcErrorName(data);
  const message = `${endpoint} failed (${status}${name ? ` ${name}` : ""}): ${xrpcErrorMessage(data)}`;
  const base = { status, endpoint };

  if (status === 401 || status === 403) {
    if (mode === "anonymous") return new CrawlError("AuthRequired", message, base);
    return new CrawlError(status === 401 ? "AuthUnavailable" : "ApiError", message, base);
  }
  if (status === 414) return new CrawlError("CursorRejected", message, base);
  if (status === 429) {
    return new CrawlError("RateLimited", message, { ...base, retryAfterMs: parseRetryAfterMs(headers) });
  }
  if (status === 408 || status >= 500) return new CrawlError("Transient", message, base);
  if (status === 404 || (status === 400 && name !== null && /NotFound$/.test(name))) {
    return new CrawlError("NotFound", message, base);
  }
  return new CrawlError("ApiError", message, base);
}
