import type { CrawlResult, CrawlSummary } from "@threadloom/pipeline";
import { CrawlError, type PostRecord, type PostStub } from "@threadloom/shared";
import { describe, expect, it } from "vitest";

import { renderActors, renderFeeds, renderSummary } from "./render";

function stub(n: number): PostStub {
  const uri = `at://did:plc:p/app.bsky.feed.post/${n}`;
  return { id: uri, uri, cid: null, authorDid: null, authorHandle: null, createdAt: null, langs: [], text: null, raw: {} };
}

function record(n: number, truncated: boolean): PostRecord {
  return {
    stub: stub(n),
    postUrl: null,
    post: {},
    comments: [],
    meta: {
      topLevelFetched: 0,
      repliesFetched: 0,
      nodesFetched: 0,
      deepestDepth: 0,
      topLevelTruncated: truncated,
      truncatedBranches: 0,
      truncated,
    },
  };
}

describe("renderSummary", () => {
  it("prints counts, filters, failures and the output path", () => {
    const results: CrawlResult[] = [
      { input: stub(0), index: 0, durationMs: 5, result: { ok: true, value: record(0, false) } },
      { input: stub(1), index: 1, durationMs: 5, result: { ok: true, value: record(1, true) } },
      {
        input: stub(2),
        index: 2,
        durationMs: 5,
        result: { ok: false, error: new CrawlError("PostUnavailable", "gone") },
      },
    ];
    const summary: CrawlSummary = {
      runId: "run-1",
      mode: "search",
      authMode: "authenticated",
      escalated: true,
      discovered: 12,
      discoveryTruncated: true,
      droppedByLanguage: 2,
      droppedByDate: 1,
      results,
      completed: 2,
      partial: 1,
      failed: 1,
      failures: { PostUnavailable: 1 },
      discoveryMs: 1500,
      fetchMs: 250,
    };

    expect(renderSummary(summary, "output/search_cats.json")).toEqual([
      "=== search (authenticated, escalated) ===",
      "Discovered 12 posts in 1.50s (stopped early: cursor rejected)",
      "Filtered out 3 (language: 2, date: 1)",
      "Fetched 2/3 comment trees in 0.25s (1 partial, 1 failed)",
      "Failures: PostUnavailable=1",
      "Output: output/search_cats.json",
    ]);
  });
});

describe("renderActors", () => {
  it("numbers actors and skips missing fields", () => {
    expect(
      renderActors([
        { did: "did:plc:a", handle: "alice.example.test", displayName: "Alice", description: null, followersCount: 12 },
        { did: "did:plc:b", handle: "bob.example.test", displayName: null, description: null, followersCount: null },
      ]),
    ).toEqual(["1. @alice.example.test (Alice) - 12 followers", "2. @bob.example.test"]);
    expect(renderActors([])).toEqual(["No users found."]);
  });
});

describe("renderFeeds", () => {
  it("prints the URI under each feed and flattens descriptions", () => {
    expect(
      renderFeeds([
        {
          uri: "at://did:plc:a/app.bsky.feed.generator/cats",
          displayName: "Cats",
          description: "All the\ncats",
          creatorHandle: "alice.example.test",
          likeCount: 5,
        },
      ]),
    ).toEqual(["1. Cats by @alice.example.test [5 likes]", "   at://did:plc:a/app.bsky.feed.generator/cats", "   All the cats"]);
  });
});
