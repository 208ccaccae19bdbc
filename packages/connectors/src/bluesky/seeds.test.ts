import { describe, expect, it } from "vitest";

import { getSeedProvider } from "../registry";
import { FakeXrpcServer, postView } from "../testing/fake_xrpc";
import type { SeedContext } from "../types";
import { collect } from "../xrpc/paginate";
import { AnonymousTransport } from "../xrpc/transport";
import { searchActors } from "./discovery";
import { buildSearchQuery } from "./search";
import { WHATS_HOT_FEED_URI } from "./trending";

function context(server: FakeXrpcServer): SeedContext {
  return {
    transport: new AnonymousTransport({ serviceUrl: "https://xrpc.example.test", timeoutMs: 1000, fetchImpl: server.fetch }),
  };
}

function provider(mode: string) {
  const found = getSeedProvider(mode);
  if (!found) throw new Error(`no provider ${mode}`);
  return found;
}

describe("buildSearchQuery", () => {
  it("appends exclusions as negated terms", () => {
    expect(buildSearchQuery("rust async", ["tokio", "hello world"])).toBe('rust async -tokio -"hello world"');
    expect(buildSearchQuery("cats")).toBe("cats");
  });
});

describe("search seed provider", () => {
  it("passes query, sort, language and window to searchPosts", async () => {
    const server = new FakeXrpcServer().on("app.bsky.feed.searchPosts", () => ({
      body: { posts: [postView("at://did:plc:a/app.bsky.feed.post/1"), { notAPost: true }] },
    }));

    const stubs = await collect(
      provider("search").discover(
        {
          config: { terms: "cats", exclude: "dogs", sort: "top", lang: "EN", since: "2025-01-01", until: "2025-01-31" },
          maxPosts: 10,
        },
        context(server),
      ),
    );

    expect(stubs.map((s) => s.id)).toEqual(["at://did:plc:a/app.bsky.feed.post/1"]);
    expect(Object.isFrozen(stubs[0])).toBe(true);
    const params = server.calls[0]?.params;
    expect(params?.get("q")).toBe("cats -dogs");
    expect(params?.get("sort")).toBe("top");
    expect(params?.get("lang")).toBe("en");
    expect(params?.get("since")).toBe("2025-01-01T00:00:00.000Z");
    expect(params?.get("until")).toBe("2025-01-31T23:59:59.999Z");
    expect(params?.get("limit")).toBe("10");
  });

  it("rejects an empty query", async () => {
    const server = new FakeXrpcServer();
    await expect(collect(provider("search").discover({ config: {}, maxPosts: 5 }, context(server)))).rejects.toMatchObject({
      kind: "ConfigError",
    });
  });
});

describe("author seed provider", () => {
  it("skips posts after the window and stops at the first one before it", async () => {
    const at = (n: number, createdAt: string) => ({
      post: postView(`at://did:plc:u/app.bsky.feed.post/${n}`, { createdAt }),
    });
    const server = new FakeXrpcServer().on("app.bsky.feed.getAuthorFeed", (req) =>
      req.params.get("cursor")
        ? { body: { feed: [at(5, "2025-01-01T00:00:00.000Z")] } }
        : {
            body: {
              feed: [
                at(1, "2025-03-10T00:00:00.000Z"),
                at(2, "2025-03-05T12:00:00.000Z"),
                { post: { uri: "at://did:plc:u/app.bsky.feed.post/x", record: {} } },
                at(3, "2025-02-20T00:00:00.000Z"),
                at(4, "2025-02-01T00:00:00.000Z"),
              ],
              cursor: "next",
            },
          },
    );

    const stubs = await collect(
      provider("author").discover(
        { config: { actor: "@tester.example.test", since: "2025-02-15", until: "2025-03-05" }, maxPosts: null },
        context(server),
      ),
    );

    expect(stubs.map((s) => s.id)).toEqual([
      "at://did:plc:u/app.bsky.feed.post/2",
      "at://did:plc:u/app.bsky.feed.post/3",
    ]);
    expect(server.calls).toHaveLength(1);
    expect(server.calls[0]?.params.get("actor")).toBe("tester.example.test");
  });
});

describe("feed seed providers", () => {
  it("resolves a bsky.app feed URL through the handle's DID", async () => {
    const server = new FakeXrpcServer()
      .on("com.atproto.identity.resolveHandle", () => ({ body: { did: "did:plc:feedowner" } }))
      .on("app.bsky.feed.getFeed", () => ({
        body: { feed: [{ post: postView("at://did:plc:b/app.bsky.feed.post/9") }] },
      }));

    const stubs = await collect(
      provider("feed").discover(
        { config: { feed: "https://bsky.app/profile/owner.example.test/feed/cats" }, maxPosts: 5 },
        context(server),
      ),
    );

    expect(stubs.map((s) => s.uri)).toEqual(["at://did:plc:b/app.bsky.feed.post/9"]);
    expect(server.callsTo("com.atproto.identity.resolveHandle")[0]?.params.get("handle")).toBe("owner.example.test");
    expect(server.callsTo("app.bsky.feed.getFeed")[0]?.params.get("feed")).toBe(
      "at://did:plc:feedowner/app.bsky.feed.generator/cats",
    );
  });

  it("reads What's Hot for trending", async () => {
    const server = new FakeXrpcServer().on("app.bsky.feed.getFeed", () => ({ body: { feed: [] } }));

    await collect(provider("trending").discover({ config: {}, maxPosts: 20 }, context(server)));

    expect(server.calls[0]?.params.get("feed")).toBe(WHATS_HOT_FEED_URI);
    expect(server.calls[0]?.params.get("limit")).toBe("20");
  });
});

describe("searchActors", () => {
  it("returns at most 25 actors with a handle and DID", async () => {
    const server = new FakeXrpcServer().on("app.bsky.actor.searchActors", () => ({
      body: {
        actors: [
          { did: "did:plc:1", handle: "one.example.test", displayName: "One", followersCount: 3 },
          { did: "did:plc:2" },
        ],
      },
    }));

    const actors = await searchActors(context(server).transport, " one ");

    expect(actors).toEqual([
      { did: "did:plc:1", handle: "one.example.test", displayName: "One", description: null, followersCount: 3 },
    ]);
    expect(server.calls[0]?.params.get("q")).toBe("one");
    expect(server.calls[0]?.params.get("limit")).toBe("25");
  });
});
