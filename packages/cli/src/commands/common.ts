import { getMetrics } from "@threadloom/pipeline";
import { isCrawlError, loadCrawlConfig, type CrawlConfig } from "@threadloom/shared";

import { parseCliArgs, type CliArgs } from "../args";

/**
 * Parse args for a command, printing usage on --help or bad input.
 * Returns null when the command should stop.
 */
export function parseOrUsage(args: string[], usage: string[]): CliArgs | null {
  try {
    return parseCliArgs(args);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (message !== "help") {
      console.error(message);
      console.log("");
      process.exitCode = 1;
    }
    printUsage(usage);
    return null;
  }
}

export function printUsage(usage: string[]): void {
  console.log("Usage:");
  for (const line of usage) console.log(`  ${line}`);
}

export function configFromArgs(args: CliArgs, env: NodeJS.ProcessEnv = process.env): CrawlConfig {
  return loadCrawlConfig(env, {
    ...(args.auth && { authMode: "authenticated" as const }),
    ...(args.concurrency !== null && { concurrency: args.concurrency }),
    ...(args.maxComments !== null && { maxTopLevelComments: args.maxComments }),
    ...(args.maxDepth !== null && { maxDepth: args.maxDepth }),
  });
}

/**
 * Run `fn` with a signal that aborts on the first Ctrl-C. A second Ctrl-C
 * falls through to the default handler and kills the process.
 */
export async function withInterrupt<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = (): void => {
    console.error("\nInterrupted: stopping at the next request, skipping queued posts (Ctrl-C again to quit)");
    controller.abort();
    process.off("SIGINT", onSigint);
  };
  process.on("SIGINT", onSigint);
  try {
    return await fn(controller.signal);
  } finally {
    process.off("SIGINT", onSigint);
  }
}

export async function printMetricsIfRequested(args: CliArgs): Promise<void> {
  if (!args.metrics) return;
  console.log("");
  console.log(await getMetrics());
}

/**
 * Print a crawl error without a stack when it is one the user can act on.
 */
export function reportFailure(err: unknown): void {
  if (isCrawlError(err)) {
    console.error(`${err.kind}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
}
