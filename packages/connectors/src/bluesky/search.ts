import type { PostStub } from "@threadloom/shared";

import type { DiscoverParams, SeedContext, SeedProvider } from "../types";
import { asArray, asRecord, asString } from "../xrpc/json";
import { Paginator } from "../xrpc/paginate";
import { parseSearchSeedConfig } from "./config";
import { toPostStub } from "./normalize";

function quoteIfNeeded(term: string): string {
  return /\s/.test(term) ? `"${term}"` : term;
}

/**
 * Include terms verbatim followed by `-term` for every exclusion.
 */
export function buildSearchQuery(terms: string, exclude: string[] = []): string {
  return [terms.trim(), ...exclude.map((t) => `-${quoteIfNeeded(t.trim())}`)]
    .filter((part) => part.length > 0 && part !== "-")
    .join(" ");
}

async function* discoverSearch(params: DiscoverParams, ctx: SeedContext): AsyncGenerator<PostStub> {
  const config = parseSearchSeedConfig(params.config);
  const posts = new Paginator(
    ctx.transport,
    {
      endpoint: "app.bsky.feed.searchPosts",
      params: {
        q: buildSearchQuery(config.terms, config.exclude),
        sort: config.sort,
        lang: config.lang,
        since: config.since,
        until: config.until,
      },
      extract: (data) => {
        const body = asRecord(data);
        return { items: asArray(body.posts), cursor: asString(body.cursor) };
      },
    },
    { ...ctx.pagination, maxItems: params.maxPosts },
  );
  for await (const view of posts) {
    const stub = toPostStub(view);
    if (stub) yield stub;
  }
}

export const searchSeedProvider: SeedProvider = {
  mode: "search",
  discover: discoverSearch,
};
