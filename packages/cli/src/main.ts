#!/usr/bin/env -S npx tsx
import { loadDotEnvIfPresent } from "@threadloom/shared";

import { CRAWL_USAGE, crawlCommand } from "./commands/crawl";
import { discoverCommand } from "./commands/discover";
import { usersCommand } from "./commands/users";

type CommandResult = void | Promise<void>;

function printHelp(): void {
  console.log("threadloom: archive Bluesky posts with their comment trees");
  console.log("");
  console.log("Commands:");
  console.log(`  ${CRAWL_USAGE.search}`);
  console.log(`  ${CRAWL_USAGE.user}`);
  console.log("  users <handle1,handle2,...> (same options as user)");
  console.log(`  ${CRAWL_USAGE.feed}`);
  console.log(`  ${CRAWL_USAGE.trending}`);
  console.log("  actors <query>");
  console.log("  feeds:popular");
  console.log("  feeds:by <handle>");
  console.log("");
  console.log("Credentials come from BSKY_USERNAME / BSKY_PASSWORD (.env is read if present).");
}

async function main(): Promise<void> {
  loadDotEnvIfPresent();

  let [cmd, ...rest] = process.argv.slice(2);
  // npm run forwards the argument separator through to the script as a literal "--".
  if (cmd === "--") {
    [cmd, ...rest] = rest;
  }

  let result: CommandResult;
  switch (cmd) {
    case "search":
    case "user":
    case "feed":
    case "trending":
      result = crawlCommand(cmd, rest);
      break;
    case "users":
      result = usersCommand(rest);
      break;
    case "actors":
    case "feeds:popular":
    case "feeds:by":
      result = discoverCommand(cmd, rest);
      break;
    default:
      printHelp();
      result = undefined;
      break;
  }

  await result;
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
