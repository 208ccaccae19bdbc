import { parseTimestamp, type PostStub } from "@threadloom/shared";

import type { DiscoverParams, SeedContext, SeedProvider } from "../types";
import { asArray, asRecord, asString } from "../xrpc/json";
import { Paginator } from "../xrpc/paginate";
import { parseAuthorSeedConfig } from "./config";
import { toPostStub } from "./normalize";

/**
 * A user's timeline, newest first. Posts after `until` are skipped and the
 * stream ends at the first post before `since`. Posts without a readable
 * timestamp are skipped.
 */
async function* discoverAuthor(params: DiscoverParams, ctx: SeedContext): AsyncGenerator<PostStub> {
  const config = parseAuthorSeedConfig(params.config);
  const feed = new Paginator(
    ctx.transport,
    {
      endpoint: "app.bsky.feed.getAuthorFeed",
      params: { actor: config.actor },
      extract: (data) => {
        const body = asRecord(data);
        return { items: asArray(body.feed), cursor: asString(body.cursor) };
      },
    },
    ctx.pagination,
  );

  let emitted = 0;
  for await (const item of feed) {
    if (params.maxPosts !== null && emitted >= params.maxPosts) return;
    const stub = toPostStub(item);
    if (!stub) continue;
    const createdAt = parseTimestamp(stub.createdAt);
    if (!createdAt) continue;
    if (config.until && createdAt > config.until) continue;
    if (config.since && createdAt < config.since) return;
    emitted += 1;
    yield stub;
  }
}

export const authorSeedProvider: SeedProvider = {
  mode: "author",
  discover: discoverAuthor,
};
