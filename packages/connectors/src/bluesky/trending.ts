import type { PostStub } from "@threadloom/shared";

import type { DiscoverParams, SeedContext, SeedProvider } from "../types";
import { discoverFeedPosts, resolveFeedUri } from "./feed";

export const WHATS_HOT_FEED_URI = "at://did:plc:z72i7hdynmk6r22z27h6tvur/app.bsky.feed.generator/whats-hot";

async function* discoverTrending(params: DiscoverParams, ctx: SeedContext): AsyncGenerator<PostStub> {
  const override = typeof params.config.feed === "string" ? params.config.feed : null;
  const feedUri = override ? await resolveFeedUri(ctx.transport, override) : WHATS_HOT_FEED_URI;
  yield* discoverFeedPosts(feedUri, params.maxPosts, ctx);
}

export const trendingSeedProvider: SeedProvider = {
  mode: "trending",
  discover: discoverTrending,
};
