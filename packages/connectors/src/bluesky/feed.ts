import { CrawlError, type PostStub } from "@threadloom/shared";

import type { DiscoverParams, SeedContext, SeedProvider } from "../types";
import { asArray, asRecord, asString } from "../xrpc/json";
import { Paginator } from "../xrpc/paginate";
import type { Transport } from "../xrpc/transport";
import { formatAtUri, parseFeedReference } from "./at_uri";
import { parseFeedSeedConfig } from "./config";
import { toPostStub } from "./normalize";
import { resolveHandle } from "./thread_api";

/**
 * Turn a feed reference (URI, URL or text containing a URI) into an at:// URI
 * whose repo is a DID.
 */
export async function resolveFeedUri(transport: Transport, reference: string): Promise<string> {
  const parsed = parseFeedReference(reference);
  if (!parsed) {
    throw new CrawlError("ConfigError", `Not a feed URI or bsky.app feed URL: ${reference}`);
  }
  if (parsed.repo.startsWith("did:")) return formatAtUri(parsed);
  return formatAtUri({ ...parsed, repo: await resolveHandle(transport, parsed.repo) });
}

/**
 * Posts of a feed generator in feed order.
 */
export async function* discoverFeedPosts(
  feedUri: string,
  maxPosts: number | null,
  ctx: SeedContext,
): AsyncGenerator<PostStub> {
  const items = new Paginator(
    ctx.transport,
    {
      endpoint: "app.bsky.feed.getFeed",
      params: { feed: feedUri },
      extract: (data) => {
        const body = asRecord(data);
        return { items: asArray(body.feed), cursor: asString(body.cursor) };
      },
    },
    { ...ctx.pagination, maxItems: maxPosts },
  );
  for await (const item of items) {
    const stub = toPostStub(item);
    if (stub) yield stub;
  }
}

async function* discoverFeed(params: DiscoverParams, ctx: SeedContext): AsyncGenerator<PostStub> {
  const config = parseFeedSeedConfig(params.config);
  const feedUri = await resolveFeedUri(ctx.transport, config.feed);
  yield* discoverFeedPosts(feedUri, params.maxPosts, ctx);
}

export const feedSeedProvider: SeedProvider = {
  mode: "feed",
  discover: discoverFeed,
};
