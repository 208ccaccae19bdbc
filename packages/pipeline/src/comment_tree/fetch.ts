import {
  derivePostUrl,
  getPosts,
  isPostEntry,
  Paginator,
  readPostView,
  readThreadEntry,
  threadRepliesSpec,
  type PaginateOptions,
  type PostThreadEntry,
  type Transport,
} from "@threadloom/connectors";
import {
  CrawlError,
  createLogger,
  DEFAULT_MAX_TOP_LEVEL_COMMENTS,
  isCrawlError,
  type CommentNode,
  type FetchMeta,
  type Logger,
  type PostRecord,
  type PostStub,
  type TruncationReason,
} from "@threadloom/shared";

const moduleLog = createLogger({ component: "comment_tree" });

export interface CommentTreeOptions {
  /** Top-level comments kept per post. */
  maxTopLevel?: number;
  /** Deepest depth kept; top-level comments are depth 0. */
  maxDepth: number;
  /** Children kept per comment; null keeps all. */
  maxRepliesPerComment?: number | null;
  /** Backoff, page delay and abort signal for every paginator the fetch opens. */
  pagination?: Omit<PaginateOptions, "maxItems">;
  logger?: Logger;
}

type DraftNode = Omit<CommentNode, "replies"> & { replies: CommentNode[] };

function unavailable(stub: PostStub, cause?: unknown): CrawlError {
  return new CrawlError("PostUnavailable", `Post ${stub.uri} is deleted, blocked or missing`, { cause });
}

function draftFrom(entry: PostThreadEntry, depth: number): DraftNode {
  const view = entry.view;
  return {
    uri: view.uri,
    cid: view.cid,
    author: view.author,
    text: view.text,
    createdAt: view.createdAt,
    likeCount: view.likeCount,
    replyCount: view.replyCount,
    depth,
    replies: [],
    truncated: false,
    truncation: null,
    raw: entry.post,
  };
}

function finish(draft: DraftNode, truncation: TruncationReason | null): CommentNode {
  return Object.freeze({
    ...draft,
    replies: Object.freeze(draft.replies),
    truncated: truncation !== null,
    truncation,
  });
}

function summarize(roots: CommentNode[], topLevelTruncated: boolean): FetchMeta {
  let nodes = 0;
  let deepest = 0;
  let truncatedBranches = 0;
  const visit = (node: CommentNode): void => {
    nodes += 1;
    deepest = Math.max(deepest, node.depth);
    if (node.truncated) truncatedBranches += 1;
    node.replies.forEach(visit);
  };
  roots.forEach(visit);
  return {
    topLevelFetched: roots.length,
    repliesFetched: nodes - roots.length,
    nodesFetched: nodes,
    deepestDepth: deepest,
    topLevelTruncated,
    truncatedBranches,
    truncated: topLevelTruncated || truncatedBranches > 0,
  };
}

/**
 * Fetches one post and its comment tree down to `maxDepth`.
 *
 * The post itself must resolve or the fetch fails with PostUnavailable.
 * Failures below the top level never fail the fetch: the affected comment is
 * kept with the replies gathered so far and flagged `truncation: "error"`.
 * An abort is the exception and fails the fetch with Cancelled.
 */
export class CommentTreeFetcher {
  private readonly maxTopLevel: number;
  private readonly maxDepth: number;
  private readonly maxReplies: number | null;
  private readonly log: Logger;

  constructor(
    private readonly transport: Transport,
    private readonly options: CommentTreeOptions,
  ) {
    this.maxTopLevel = options.maxTopLevel ?? DEFAULT_MAX_TOP_LEVEL_COMMENTS;
    this.maxDepth = options.maxDepth;
    this.maxReplies = options.maxRepliesPerComment ?? null;
    this.log = options.logger ?? moduleLog;
  }

  async fetch(stub: PostStub): Promise<PostRecord> {
    const post = await this.resolvePost(stub);
    const view = readPostView(post);

    const rootEntries: PostThreadEntry[] = [];
    let topLevelTruncated = false;
    if (this.maxTopLevel > 0) {
      const listing = new Paginator(this.transport, threadRepliesSpec(stub.uri, this.maxDepth + 1), {
        ...this.options.pagination,
        maxItems: this.maxTopLevel,
      });
      try {
        for await (const entry of listing) rootEntries.push(entry);
      } catch (err) {
        if (isCrawlError(err, "NotFound") || isCrawlError(err, "PostUnavailable")) throw unavailable(stub, err);
        throw err;
      }
      topLevelTruncated = listing.summary.hasMore;
    } else {
      topLevelTruncated = (view?.replyCount ?? 0) > 0;
    }

    const comments: CommentNode[] = [];
    for (const entry of rootEntries) comments.push(await this.buildNode(entry, 0));

    const meta = summarize(comments, topLevelTruncated);
    this.log.debug({ uri: stub.uri, ...meta }, "Comment tree fetched");

    return Object.freeze({
      stub,
      postUrl: derivePostUrl({
        uri: stub.uri,
        authorHandle: stub.authorHandle ?? view?.author.handle,
        authorDid: stub.authorDid ?? view?.author.did,
      }),
      post,
      comments: Object.freeze(comments),
      meta: Object.freeze(meta),
    });
  }

  private async resolvePost(stub: PostStub): Promise<unknown> {
    let posts: unknown[];
    try {
      posts = await getPosts(this.transport, [stub.uri]);
    } catch (err) {
      if (isCrawlError(err, "NotFound")) throw unavailable(stub, err);
      throw err;
    }
    const post = posts.find((p) => readPostView(p)?.uri === stub.uri);
    if (post === undefined) throw unavailable(stub);
    return post;
  }

  private async buildNode(entry: PostThreadEntry, depth: number): Promise<CommentNode> {
    const draft = draftFrom(entry, depth);
    const replyCount = entry.view.replyCount ?? 0;

    if (depth >= this.maxDepth) {
      return finish(draft, replyCount > 0 ? "depth" : null);
    }

    let children: PostThreadEntry[] = [];
    let truncation: TruncationReason | null = null;

    if (entry.replies !== null) {
      const visible = entry.replies.map(readThreadEntry).filter(isPostEntry);
      children = this.maxReplies === null ? visible : visible.slice(0, this.maxReplies);
      if (children.length < visible.length) truncation = "limit";
    } else if (replyCount > 0) {
      const replies = new Paginator(this.transport, threadRepliesSpec(entry.view.uri, this.maxDepth - depth), {
        ...this.options.pagination,
        maxItems: this.maxReplies,
      });
      try {
        for await (const child of replies) children.push(child);
        if (replies.summary.hasMore) truncation = "limit";
      } catch (err) {
        if (isCrawlError(err, "Cancelled")) throw err;
        truncation = "error";
        this.log.warn(
          { uri: entry.view.uri, depth, kept: children.length, err: err instanceof Error ? err.message : String(err) },
          "Reply branch failed; keeping partial subtree",
        );
      }
    }

    for (const child of children) draft.replies.push(await this.buildNode(child, depth + 1));
    return finish(draft, truncation);
  }
}

export function fetchCommentTree(
  transport: Transport,
  stub: PostStub,
  options: CommentTreeOptions,
): Promise<PostRecord> {
  return new CommentTreeFetcher(transport, options).fetch(stub);
}
