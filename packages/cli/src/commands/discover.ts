import { listActorFeeds, listPopularFeeds, searchActors, TransportFactory } from "@threadloom/connectors";

import type { CliArgs } from "../args";
import { printLines, renderActors, renderFeeds } from "../ui/render";
import { configFromArgs, parseOrUsage, reportFailure } from "./common";

export type DiscoverCommand = "actors" | "feeds:popular" | "feeds:by";

const USAGE: Record<DiscoverCommand, string> = {
  actors: "actors <query> [--auth]",
  "feeds:popular": "feeds:popular [--auth]",
  "feeds:by": "feeds:by <handle> [--auth]",
};

async function runDiscover(command: DiscoverCommand, args: CliArgs): Promise<string[]> {
  const config = configFromArgs(args);
  const transport = new TransportFactory(config).get(config.authMode);
  await transport.prepare();
  const pagination = { backoff: config.backoff, pageDelayMs: config.pageDelayMs };
  const query = args.positional.join(" ").trim();

  switch (command) {
    case "actors":
      return renderActors(await searchActors(transport, query, pagination));
    case "feeds:popular":
      return renderFeeds(await listPopularFeeds(transport, pagination));
    case "feeds:by":
      return renderFeeds(await listActorFeeds(transport, query, pagination));
  }
}

/**
 * Lookups that help pick a seed: users by keyword, popular feeds, feeds a
 * user publishes.
 */
export async function discoverCommand(command: DiscoverCommand, argv: string[]): Promise<void> {
  const args = parseOrUsage(argv, [USAGE[command]]);
  if (!args) return;
  if (command !== "feeds:popular" && args.positional.join("").trim().length === 0) {
    console.error(command === "actors" ? "Missing search query" : "Missing user handle");
    process.exitCode = 1;
    return;
  }
  try {
    printLines(await runDiscover(command, args));
  } catch (err) {
    reportFailure(err);
  }
}
