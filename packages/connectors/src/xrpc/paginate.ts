import {
  DEFAULT_BACKOFF,
  CrawlError,
  createLogger,
  toCrawlError,
  type BackoffPolicy,
  type Logger,
} from "@threadloom/shared";

import { computeBackoffDelay, sleep as defaultSleep, type Sleep } from "./backoff";
import type { QueryParams, XrpcResponse } from "./http";
import type { Transport } from "./transport";

export const DEFAULT_PAGE_SIZE = 100;

export interface Page<T> {
  items: T[];
  cursor: string | null;
}

export interface PageSpec<T> {
  endpoint: string;
  params?: QueryParams;
  /** Name of the page-size parameter; null when the endpoint takes none. */
  limitParam?: string | null;
  pageSize?: number;
  extract(data: unknown): Page<T>;
}

export interface PaginateOptions {
  maxItems?: number | null;
  maxPages?: number | null;
  backoff?: BackoffPolicy;
  /** Polite pause between page requests. */
  pageDelayMs?: number;
  sleep?: Sleep;
  random?: () => number;
  signal?: AbortSignal;
  logger?: Logger;
}

export type StopReason = "exhausted" | "item_limit" | "page_limit" | "empty_page";

export interface PaginationSummary {
  pages: number;
  items: number;
  retries: number;
  stopReason: StopReason | null;
  /** The server had more to give when iteration stopped. */
  hasMore: boolean;
}

function emptySummary(): PaginationSummary {
  return { pages: 0, items: 0, retries: 0, stopReason: null, hasMore: false };
}

/**
 * Lazy cursor-following iterator over one endpoint. Each iteration starts from
 * the first page; the cursor is handed back to the server verbatim.
 *
 * RateLimited and Transient failures are retried on the same cursor with
 * exponential backoff; any other failure ends the sequence by throwing, as does
 * a retry-after longer than `backoff.maxDelayMs`.
 */
export class Paginator<T> implements AsyncIterable<T> {
  private state: PaginationSummary = emptySummary();
  private readonly log: Logger;

  constructor(
    private readonly transport: Transport,
    private readonly spec: PageSpec<T>,
    private readonly options: PaginateOptions = {},
  ) {
    this.log = options.logger ?? createLogger({ component: "paginator" });
  }

  get summary(): PaginationSummary {
    return { ...this.state };
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    const state = emptySummary();
    this.state = state;

    const maxItems = this.options.maxItems ?? null;
    const maxPages = this.options.maxPages ?? null;
    const pageSize = this.spec.pageSize ?? DEFAULT_PAGE_SIZE;
    const limitParam = this.spec.limitParam === undefined ? "limit" : this.spec.limitParam;
    const wait = this.options.sleep ?? defaultSleep;
    let cursor: string | null = null;

    if (maxItems !== null && maxItems <= 0) {
      state.stopReason = "item_limit";
      state.hasMore = true;
      return;
    }

    for (;;) {
      if (maxPages !== null && state.pages >= maxPages) {
        state.stopReason = "page_limit";
        state.hasMore = true;
        return;
      }
      if (state.pages > 0 && this.options.pageDelayMs) {
        await wait(this.options.pageDelayMs, this.options.signal);
      }

      const params: QueryParams = { ...this.spec.params };
      if (limitParam) {
        params[limitParam] = maxItems === null ? pageSize : Math.min(pageSize, maxItems - state.items);
      }
      const response = await this.fetchPage(params, cursor, state, wait);
      state.pages += 1;

      const page = this.spec.extract(response.data);
      if (page.items.length === 0) {
        state.stopReason = page.cursor ? "empty_page" : "exhausted";
        return;
      }

      for (const item of page.items) {
        if (maxItems !== null && state.items >= maxItems) {
          state.stopReason = "item_limit";
          state.hasMore = true;
          return;
        }
        state.items += 1;
        yield item;
      }

      if (!page.cursor) {
        state.stopReason = "exhausted";
        return;
      }
      if (maxItems !== null && state.items >= maxItems) {
        state.stopReason = "item_limit";
        state.hasMore = true;
        return;
      }
      cursor = page.cursor;
    }
  }

  private async fetchPage(
    params: QueryParams,
    cursor: string | null,
    state: PaginationSummary,
    wait: Sleep,
  ): Promise<XrpcResponse> {
    const backoff = this.options.backoff ?? DEFAULT_BACKOFF;
    for (let attempt = 0; ; attempt += 1) {
      if (this.options.signal?.aborted) {
        throw new CrawlError("Cancelled", `${this.spec.endpoint} pagination aborted`, {
          endpoint: this.spec.endpoint,
        });
      }
      try {
        return await this.transport.send({ endpoint: this.spec.endpoint, params, cursor });
      } catch (err) {
        const error = toCrawlError(err);
        if (!error.retryable || attempt >= backoff.maxRetries) throw error;
        // The server wants a longer pause than a retry may wait.
        if (error.retryAfterMs !== undefined && error.retryAfterMs > backoff.maxDelayMs) throw error;
        const delayMs = computeBackoffDelay(attempt, backoff, error.retryAfterMs, this.options.random);
        state.retries += 1;
        this.log.warn(
          { endpoint: this.spec.endpoint, kind: error.kind, attempt: attempt + 1, delayMs },
          "Retrying page request",
        );
        await wait(delayMs, this.options.signal);
      }
    }
  }
}

/**
 * Drain an async iterable into an array.
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}
