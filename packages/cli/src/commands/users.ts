import { TransportFactory } from "@threadloom/connectors";
import {
  ConcurrencyGate,
  JsonFileSink,
  recordXrpcRequest,
  runBatch,
  runCrawl,
  type CrawlSummary,
  type TaskResult,
} from "@threadloom/pipeline";
import { splitList, type CrawlConfig } from "@threadloom/shared";

import type { CliArgs } from "../args";
import { printLines, renderSummary } from "../ui/render";
import { CRAWL_USAGE, planCrawl } from "./crawl";
import { configFromArgs, parseOrUsage, printMetricsIfRequested, reportFailure, withInterrupt } from "./common";

/** Users discovered at once. Comment-tree fetches share one `concurrency` limit. */
const USER_CONCURRENCY = 3;

export interface UserCrawl {
  summary: CrawlSummary;
  path: string;
}

export interface CrawlUsersOptions {
  config: CrawlConfig;
  fetchImpl?: typeof fetch;
  signal?: AbortSignal;
}

export function parseHandles(values: string[]): string[] {
  return [...new Set(values.flatMap((value) => splitList(value)).map((h) => h.replace(/^@/, "")))];
}

/**
 * One crawl and one output file per handle. Every crawl shares the same
 * transports (and so one session) and one fetch limit of `config.concurrency`.
 */
export async function crawlUsers(
  handles: string[],
  args: CliArgs,
  options: CrawlUsersOptions,
): Promise<TaskResult<string, UserCrawl>[]> {
  const { config, signal } = options;
  const transports = new TransportFactory(config, { fetchImpl: options.fetchImpl, onResponse: recordXrpcRequest });
  await transports.get(config.authMode).prepare();
  const fetchGate = new ConcurrencyGate(config.concurrency);

  return runBatch(
    handles,
    async (handle): Promise<UserCrawl> => {
      const plan = planCrawl("user", { ...args, positional: [handle] });
      const sink = new JsonFileSink({
        dir: args.out,
        mode: "user",
        label: plan.label,
        format: args.ndjson ? "ndjson" : "json",
      });
      const summary = await runCrawl(plan.request, { config, sink, signal, transports, fetchGate });
      return { summary, path: sink.path };
    },
    { concurrency: Math.min(USER_CONCURRENCY, handles.length), signal },
  );
}

export async function usersCommand(argv: string[]): Promise<void> {
  const usage = [CRAWL_USAGE.user.replace("user <handle>", "users <handle1,handle2,...>")];
  const args = parseOrUsage(argv, usage);
  if (!args) return;

  const handles = parseHandles(args.positional);
  if (handles.length === 0) {
    console.error("Missing user handles");
    process.exitCode = 1;
    return;
  }

  try {
    const config = configFromArgs(args);
    const results = await withInterrupt((signal) => crawlUsers(handles, args, { config, signal }));

    let failed = 0;
    for (const { input, result } of [...results].sort((a, b) => a.index - b.index)) {
      console.log("");
      console.log(`@${input}`);
      if (result.ok) {
        printLines(renderSummary(result.value.summary, result.value.path));
      } else {
        failed += 1;
        console.log(`Failed: ${result.error.kind}: ${result.error.message}`);
      }
    }
    if (failed > 0) process.exitCode = 1;
    await printMetricsIfRequested(args);
  } catch (err) {
    reportFailure(err);
  }
}
