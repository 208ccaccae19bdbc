import type { ActorSummary, FeedSummary } from "@threadloom/connectors";
import type { CrawlSummary } from "@threadloom/pipeline";

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

function clampText(value: string, maxChars: number): string {
  const oneLine = value.replace(/\s+/g, " ").trim();
  if (oneLine.length <= maxChars) return oneLine;
  return `${oneLine.slice(0, maxChars - 1)}…`;
}

export function renderSummary(summary: CrawlSummary, outputPath: string | null): string[] {
  const lines = [`=== ${summary.mode} (${summary.authMode}${summary.escalated ? ", escalated" : ""}) ===`];
  lines.push(
    `Discovered ${summary.discovered} posts in ${formatSeconds(summary.discoveryMs)}` +
      (summary.discoveryTruncated ? " (stopped early: cursor rejected)" : ""),
  );
  const dropped = summary.droppedByLanguage + summary.droppedByDate;
  if (dropped > 0) {
    lines.push(`Filtered out ${dropped} (language: ${summary.droppedByLanguage}, date: ${summary.droppedByDate})`);
  }
  lines.push(
    `Fetched ${summary.completed}/${summary.results.length} comment trees in ${formatSeconds(summary.fetchMs)}` +
      ` (${summary.partial} partial, ${summary.failed} failed)`,
  );
  const failures = Object.entries(summary.failures).sort(([a], [b]) => a.localeCompare(b));
  if (failures.length > 0) {
    lines.push(`Failures: ${failures.map(([kind, count]) => `${kind}=${count}`).join(", ")}`);
  }
  if (outputPath) lines.push(`Output: ${outputPath}`);
  return lines;
}

export function renderActors(actors: ActorSummary[]): string[] {
  if (actors.length === 0) return ["No users found."];
  return actors.map((actor, i) => {
    const name = actor.displayName ? ` (${clampText(actor.displayName, 40)})` : "";
    const followers = actor.followersCount !== null ? ` - ${actor.followersCount} followers` : "";
    return `${i + 1}. @${actor.handle}${name}${followers}`;
  });
}

export function renderFeeds(feeds: FeedSummary[]): string[] {
  if (feeds.length === 0) return ["No feeds found."];
  const lines: string[] = [];
  feeds.forEach((feed, i) => {
    const by = feed.creatorHandle ? ` by @${feed.creatorHandle}` : "";
    const likes = feed.likeCount !== null ? ` [${feed.likeCount} likes]` : "";
    lines.push(`${i + 1}. ${clampText(feed.displayName, 60)}${by}${likes}`);
    lines.push(`   ${feed.uri}`);
    if (feed.description) lines.push(`   ${clampText(feed.description, 100)}`);
  });
  return lines;
}

export function printLines(lines: string[]): void {
  for (const line of lines) console.log(line);
}
