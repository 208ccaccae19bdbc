import type { SeedMode } from "@threadloom/connectors";
import { JsonFileSink, runCrawl, type CrawlRequest } from "@threadloom/pipeline";

import type { CliArgs } from "../args";
import { printLines, renderSummary } from "../ui/render";
import {
  configFromArgs,
  parseOrUsage,
  printMetricsIfRequested,
  printUsage,
  reportFailure,
  withInterrupt,
} from "./common";

export type CrawlCommand = "search" | "user" | "feed" | "trending";

const SHARED_OPTIONS =
  "[--auth] [--limit N|all] [--lang xx] [--since DATE] [--until DATE] [--out DIR] [--ndjson]" +
  " [--concurrency N] [--max-comments N] [--max-depth N] [--metrics]";

export const CRAWL_USAGE: Record<CrawlCommand, string> = {
  search: `search <terms...> [--exclude a,b] [--sort top|latest] ${SHARED_OPTIONS}`,
  user: `user <handle> ${SHARED_OPTIONS}`,
  feed: `feed <at-uri|bsky.app feed url> ${SHARED_OPTIONS}`,
  trending: `trending ${SHARED_OPTIONS}`,
};

export interface CrawlPlan {
  request: CrawlRequest;
  /** Used in the output file name. */
  label: string;
}

const MODES: Record<CrawlCommand, SeedMode> = {
  search: "search",
  user: "author",
  feed: "feed",
  trending: "trending",
};

/**
 * Map a command and its parsed args onto a crawl request. Throws on missing
 * positional input.
 */
export function planCrawl(command: CrawlCommand, args: CliArgs): CrawlPlan {
  const text = args.positional.join(" ").trim();
  const filter = { lang: args.lang, since: args.since, until: args.until };
  const base = { mode: MODES[command], maxPosts: args.limit, filter };

  switch (command) {
    case "search": {
      if (!text && args.exclude.length === 0) throw new Error("Missing search terms");
      return {
        request: {
          ...base,
          seed: {
            terms: text,
            exclude: args.exclude,
            sort: args.sort ?? "latest",
            lang: args.lang,
            since: args.since,
            until: args.until,
          },
        },
        label: text || args.exclude.join(" "),
      };
    }
    case "user": {
      const actor = args.positional[0];
      if (!actor) throw new Error("Missing user handle");
      return { request: { ...base, seed: { actor, since: args.since, until: args.until } }, label: actor };
    }
    case "feed": {
      if (!text) throw new Error("Missing feed URI or URL");
      const rkey = text.split("/").filter((part) => part.length > 0).pop() ?? text;
      return { request: { ...base, seed: { feed: text } }, label: rkey };
    }
    case "trending":
      return { request: { ...base, seed: {} }, label: "whats_hot" };
  }
}

export async function crawlCommand(command: CrawlCommand, argv: string[]): Promise<void> {
  const usage = [CRAWL_USAGE[command]];
  const args = parseOrUsage(argv, usage);
  if (!args) return;

  let plan: CrawlPlan;
  try {
    plan = planCrawl(command, args);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.log("");
    printUsage(usage);
    process.exitCode = 1;
    return;
  }

  const sink = new JsonFileSink({
    dir: args.out,
    mode: command,
    label: plan.label,
    format: args.ndjson ? "ndjson" : "json",
  });
  try {
    const config = configFromArgs(args);
    const summary = await withInterrupt((signal) => runCrawl(plan.request, { config, sink, signal }));
    printLines(renderSummary(summary, sink.path));
    await printMetricsIfRequested(args);
  } catch (err) {
    reportFailure(err);
  }
}
