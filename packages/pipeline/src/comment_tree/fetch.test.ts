import { AnonymousTransport, sleep, toPostStub } from "@threadloom/connectors";
import {
  blockedNode,
  FakeXrpcServer,
  notFoundNode,
  postView,
  threadNode,
} from "@threadloom/connectors/testing";
import type { CommentNode, PostStub } from "@threadloom/shared";
import { describe, expect, it } from "vitest";

import { fetchCommentTree } from "./fetch";

const POST = "at://did:plc:author/app.bsky.feed.post/root";

function c(n: number): string {
  return `at://did:plc:c${n}/app.bsky.feed.post/c${n}`;
}

function serve(threads: Record<string, unknown>, failing: Record<string, number> = {}): FakeXrpcServer {
  const post = postView(POST, { handle: "author.example.test", replyCount: 1 });
  return new FakeXrpcServer()
    .on("app.bsky.feed.getPosts", (req) => ({
      body: { posts: req.params.getAll("uris").includes(POST) ? [post] : [] },
    }))
    .on("app.bsky.feed.getPostThread", (req) => {
      const uri = req.params.get("uri") ?? "";
      const status = failing[uri];
      if (status !== undefined) return { status, body: { error: "Failed" } };
      const thread = threads[uri];
      return thread ? { body: { thread } } : { status: 400, body: { error: "NotFound", message: "Post not found" } };
    });
}

function stubFor(uri: string, handle = "author.example.test"): PostStub {
  const stub = toPostStub(postView(uri, { handle }));
  if (!stub) throw new Error("bad fixture");
  return stub;
}

function transport(server: FakeXrpcServer): AnonymousTransport {
  return new AnonymousTransport({ serviceUrl: "https://xrpc.example.test", timeoutMs: 1000, fetchImpl: server.fetch });
}

function maxDepthOf(nodes: readonly CommentNode[]): number {
  return nodes.reduce((max, n) => Math.max(max, n.depth, maxDepthOf(n.replies)), 0);
}

describe("fetchCommentTree", () => {
  it("keeps 150 of 200 top-level comments and marks the record truncated", async () => {
    const roots = Array.from({ length: 200 }, (_, i) => threadNode(c(i), []));
    const server = serve({ [POST]: threadNode(POST, roots) });

    const record = await fetchCommentTree(transport(server), stubFor(POST), { maxTopLevel: 150, maxDepth: 1 });

    expect(record.comments).toHaveLength(150);
    expect(record.comments[0]?.uri).toBe(c(0));
    expect(record.comments[149]?.uri).toBe(c(149));
    expect(record.meta).toEqual({
      topLevelFetched: 150,
      repliesFetched: 0,
      nodesFetched: 150,
      deepestDepth: 0,
      topLevelTruncated: true,
      truncatedBranches: 0,
      truncated: true,
    });
  });

  it("never goes deeper than maxDepth and flags cut branches", async () => {
    const server = serve({
      [POST]: threadNode(POST, [threadNode(c(1), [threadNode(c(2), undefined, { replyCount: 3 }), threadNode(c(3))])]),
    });

    const record = await fetchCommentTree(transport(server), stubFor(POST), { maxDepth: 1 });

    expect(maxDepthOf(record.comments)).toBe(1);
    const root = record.comments[0];
    expect(root?.replies.map((r) => [r.uri, r.depth, r.truncation])).toEqual([
      [c(2), 1, "depth"],
      [c(3), 1, null],
    ]);
    expect(record.meta).toMatchObject({ nodesFetched: 3, repliesFetched: 2, deepestDepth: 1, truncatedBranches: 1 });
    expect(server.callsTo("app.bsky.feed.getPostThread")).toHaveLength(1);
    expect(server.calls[1]?.params.get("depth")).toBe("2");
    expect(server.calls[1]?.params.get("parentHeight")).toBe("0");
  });

  it("fetches replies that were not embedded, up to maxRepliesPerComment", async () => {
    const server = serve({
      [POST]: threadNode(POST, [threadNode(c(1), undefined, { replyCount: 3 })]),
      [c(1)]: threadNode(c(1), [threadNode(c(2), []), notFoundNode(c(9)), threadNode(c(3), []), threadNode(c(4), [])]),
    });

    const record = await fetchCommentTree(transport(server), stubFor(POST), { maxDepth: 2, maxRepliesPerComment: 2 });

    const root = record.comments[0];
    expect(root?.replies.map((r) => r.uri)).toEqual([c(2), c(3)]);
    expect(root?.truncation).toBe("limit");
    expect(server.callsTo("app.bsky.feed.getPostThread")[1]?.params.get("depth")).toBe("2");
    expect(record.meta).toMatchObject({ nodesFetched: 3, truncatedBranches: 1, truncated: true });
  });

  it("caps embedded replies too", async () => {
    const server = serve({
      [POST]: threadNode(POST, [threadNode(c(1), [threadNode(c(2)), threadNode(c(3)), threadNode(c(4))])]),
    });

    const record = await fetchCommentTree(transport(server), stubFor(POST), { maxDepth: 1, maxRepliesPerComment: 1 });

    expect(record.comments[0]?.replies.map((r) => r.uri)).toEqual([c(2)]);
    expect(record.comments[0]?.truncation).toBe("limit");
  });

  it("keeps the parent when its reply branch fails", async () => {
    const server = serve(
      {
        [POST]: threadNode(POST, [threadNode(c(1), undefined, { replyCount: 2 }), threadNode(c(5), [])]),
      },
      { [c(1)]: 414 },
    );

    const record = await fetchCommentTree(transport(server), stubFor(POST), { maxDepth: 2 });

    expect(record.comments.map((n) => [n.uri, n.truncated, n.truncation, n.replies.length])).toEqual([
      [c(1), true, "error", 0],
      [c(5), false, null, 0],
    ]);
    expect(record.meta.truncatedBranches).toBe(1);
  });

  it("fails with Cancelled when the run aborts during a reply branch backoff", async () => {
    const server = serve(
      { [POST]: threadNode(POST, [threadNode(c(1), undefined, { replyCount: 2 })]) },
      { [c(1)]: 503 },
    );
    const controller = new AbortController();

    await expect(
      fetchCommentTree(transport(server), stubFor(POST), {
        maxDepth: 2,
        pagination: {
          backoff: { baseDelayMs: 60_000, maxDelayMs: 60_000, maxRetries: 3, jitter: 0 },
          signal: controller.signal,
          sleep: (ms, signal) => {
            controller.abort();
            return sleep(ms, signal);
          },
        },
      }),
    ).rejects.toMatchObject({ kind: "Cancelled" });
    expect(server.calls.filter((call) => call.params.get("uri") === c(1))).toHaveLength(1);
  });

  it("skips comments that are not found or blocked", async () => {
    const server = serve({
      [POST]: threadNode(POST, [notFoundNode(c(7)), blockedNode(c(8)), threadNode(c(1), [])]),
    });

    const record = await fetchCommentTree(transport(server), stubFor(POST), { maxDepth: 1 });

    expect(record.comments.map((n) => n.uri)).toEqual([c(1)]);
  });

  it("fails with PostUnavailable when the post cannot be resolved", async () => {
    const server = serve({});
    const gone = "at://did:plc:author/app.bsky.feed.post/gone";

    await expect(fetchCommentTree(transport(server), stubFor(gone), { maxDepth: 1 })).rejects.toMatchObject({
      kind: "PostUnavailable",
    });
    expect(server.callsTo("app.bsky.feed.getPostThread")).toHaveLength(0);
  });

  it("returns identical, frozen records for unchanged data", async () => {
    const server = serve({
      [POST]: threadNode(POST, [threadNode(c(1), [threadNode(c(2))]), threadNode(c(3), [])]),
    });
    const stub = stubFor(POST);

    const first = await fetchCommentTree(transport(server), stub, { maxDepth: 1 });
    const second = await fetchCommentTree(transport(server), stub, { maxDepth: 1 });

    expect(second).toEqual(first);
    expect(first.postUrl).toBe("https://bsky.app/profile/author.example.test/post/root");
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.comments[0])).toBe(true);
  });
});
