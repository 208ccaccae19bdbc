import { randomUUID } from "node:crypto";

import {
  getSeedProvider,
  TransportFactory,
  type PaginateOptions,
  type SeedMode,
  type SeedProvider,
  type Sleep,
  type Transport,
} from "@threadloom/connectors";
import {
  CrawlError,
  createRunLogger,
  isCrawlError,
  validateCrawlConfig,
  type AuthMode,
  type CrawlConfig,
  type CredentialSource,
  type CrawlErrorKind,
  type Logger,
  type PostRecord,
  type PostStub,
  type Sink,
} from "@threadloom/shared";

import { CommentTreeFetcher } from "../comment_tree/fetch";
import { recordFetchTask, recordSeedPosts, recordXrpcRequest } from "../metrics";
import { filterStubs, type PostFilter } from "../stages/filter";
import { runBatch, type ConcurrencyGate, type TaskResult } from "./worker_pool";

export interface CrawlRequest {
  mode: SeedMode;
  /** Provider config, e.g. `{ terms, sort }` for search or `{ actor }` for author. */
  seed: Record<string, unknown>;
  maxPosts: number | null;
  filter?: PostFilter;
}

export interface CrawlDeps {
  config: CrawlConfig;
  sink: Sink;
  fetchImpl?: typeof fetch;
  credentialSource?: CredentialSource;
  signal?: AbortSignal;
  sleep?: Sleep;
  /** Defaults to the registry lookup by mode. */
  provider?: SeedProvider;
  runId?: string;
  /**
   * Transports shared with other crawls, so they share one session. When set,
   * `fetchImpl` and `credentialSource` are not used.
   */
  transports?: TransportFactory;
  /** Caps comment-tree fetches across every crawl holding the same gate. */
  fetchGate?: ConcurrencyGate;
}

export type CrawlResult = TaskResult<PostStub, PostRecord>;

export interface CrawlSummary {
  runId: string;
  mode: SeedMode;
  /** Transport the fetch phase ran on. */
  authMode: AuthMode;
  escalated: boolean;
  discovered: number;
  /** Discovery ended early because the server rejected a cursor. */
  discoveryTruncated: boolean;
  droppedByLanguage: number;
  droppedByDate: number;
  /** One entry per dispatched stub, in discovery order. */
  results: CrawlResult[];
  completed: number;
  partial: number;
  failed: number;
  failures: Partial<Record<CrawlErrorKind, number>>;
  discoveryMs: number;
  fetchMs: number;
}

interface Discovery {
  stubs: PostStub[];
  truncated: boolean;
}

async function discover(
  provider: SeedProvider,
  request: CrawlRequest,
  transport: Transport,
  pagination: Omit<PaginateOptions, "maxItems">,
  log: Logger,
): Promise<Discovery> {
  const seen = new Set<string>();
  const stubs: PostStub[] = [];
  let truncated = false;
  try {
    for await (const stub of provider.discover({ config: request.seed, maxPosts: request.maxPosts }, { transport, pagination })) {
      if (seen.has(stub.id)) continue;
      seen.add(stub.id);
      stubs.push(stub);
      if (request.maxPosts !== null && stubs.length >= request.maxPosts) break;
    }
  } catch (err) {
    if (!isCrawlError(err, "CursorRejected")) throw err;
    truncated = true;
    log.warn(
      { kept: stubs.length, transport: transport.mode, err: err.message },
      "Server rejected the discovery cursor; continuing with the posts found so far",
    );
  }
  return { stubs, truncated };
}

function countFailures(results: CrawlResult[]): Partial<Record<CrawlErrorKind, number>> {
  const failures: Partial<Record<CrawlErrorKind, number>> = {};
  for (const { result } of results) {
    if (!result.ok) failures[result.error.kind] = (failures[result.error.kind] ?? 0) + 1;
  }
  return failures;
}

/**
 * One crawl: discover seeds, filter them, fetch every comment tree with
 * bounded concurrency and write records to the sink as they complete.
 *
 * Setup failures (configuration, session, discovery) throw before anything is
 * dispatched. Per-post failures only show up in the summary.
 */
export async function runCrawl(request: CrawlRequest, deps: CrawlDeps): Promise<CrawlSummary> {
  const config = validateCrawlConfig(deps.config, {
    externalCredentials: deps.credentialSource !== undefined || deps.transports !== undefined,
  });
  const runId = deps.runId ?? randomUUID();
  const log = createRunLogger(runId);
  const provider = deps.provider ?? getSeedProvider(request.mode);
  if (!provider) throw new CrawlError("ConfigError", `Unknown discovery mode: ${request.mode}`);

  const transports =
    deps.transports ??
    new TransportFactory(config, {
      fetchImpl: deps.fetchImpl,
      credentialSource: deps.credentialSource,
      onResponse: recordXrpcRequest,
    });
  const pagination: Omit<PaginateOptions, "maxItems"> = {
    backoff: config.backoff,
    pageDelayMs: config.pageDelayMs,
    maxPages: config.pageLimit,
    sleep: deps.sleep,
    signal: deps.signal,
  };

  let transport = transports.get(config.authMode);
  await transport.prepare();
  log.info({ mode: request.mode, authMode: transport.mode }, "Crawl started");

  const discoveryStartedAt = Date.now();
  let escalated = false;
  let discovery: Discovery;
  try {
    discovery = await discover(provider, request, transport, pagination, log);
  } catch (err) {
    if (!isCrawlError(err, "AuthRequired") || transport.mode !== "anonymous") throw err;
    if (!config.authFallback || !transports.canAuthenticate) {
      throw new CrawlError(
        "AuthRequired",
        `${request.mode} discovery needs an authenticated session; rerun with credentials (--auth) or enable CRAWL_AUTH_FALLBACK`,
        { status: err.status, endpoint: err.endpoint, cause: err },
      );
    }
    log.warn({ endpoint: err.endpoint }, "Anonymous discovery rejected; switching to the authenticated transport");
    transport = transports.get("authenticated");
    await transport.prepare();
    escalated = true;
    discovery = await discover(provider, request, transport, pagination, log);
  }
  const discoveryMs = Date.now() - discoveryStartedAt;
  recordSeedPosts(request.mode, discovery.stubs.length);

  const { kept, droppedByLanguage, droppedByDate } = filterStubs(discovery.stubs, request.filter);
  log.info(
    { discovered: discovery.stubs.length, kept: kept.length, droppedByLanguage, droppedByDate, discoveryMs },
    "Discovery finished",
  );

  const fetcher = new CommentTreeFetcher(transport, {
    maxTopLevel: config.maxTopLevelComments,
    maxDepth: config.maxDepth,
    maxRepliesPerComment: config.maxRepliesPerComment,
    pagination: { backoff: config.backoff, sleep: deps.sleep, signal: deps.signal },
    logger: log,
  });

  const gate = deps.fetchGate;
  const fetchOne = (stub: PostStub): Promise<PostRecord> =>
    gate ? gate.run(() => fetcher.fetch(stub), deps.signal) : fetcher.fetch(stub);

  const fetchStartedAt = Date.now();
  let results: CrawlResult[];
  try {
    results = await runBatch(kept, fetchOne, {
      concurrency: config.concurrency,
      queueCapacity: config.queueCapacity,
      signal: deps.signal,
      logger: log,
      onResult: async ({ result, durationMs }) => {
        const durationSec = durationMs / 1000;
        if (!result.ok) {
          recordFetchTask({ status: "failed", errorKind: result.error.kind, durationSec });
          return;
        }
        const record = result.value;
        recordFetchTask({
          status: record.meta.truncated ? "partial" : "completed",
          durationSec,
          nodes: record.meta.nodesFetched,
        });
        await deps.sink.write(record);
      },
    });
  } finally {
    await deps.sink.close?.();
  }
  const fetchMs = Date.now() - fetchStartedAt;

  const ordered = [...results].sort((a, b) => a.index - b.index);
  const completed = ordered.filter((r) => r.result.ok).length;
  const partial = ordered.filter((r) => r.result.ok && r.result.value.meta.truncated).length;
  const summary: CrawlSummary = {
    runId,
    mode: request.mode,
    authMode: transport.mode,
    escalated,
    discovered: discovery.stubs.length,
    discoveryTruncated: discovery.truncated,
    droppedByLanguage,
    droppedByDate,
    results: ordered,
    completed,
    partial,
    failed: ordered.length - completed,
    failures: countFailures(ordered),
    discoveryMs,
    fetchMs,
  };
  log.info(
    { completed, partial, failed: summary.failed, failures: summary.failures, fetchMs },
    "Crawl finished",
  );
  return summary;
}
