/**
 * Seed produced by discovery. Immutable once created.
 */
export interface PostStub {
  /** Opaque provider identifier (the post's AT URI for Bluesky). */
  id: string;
  /** Canonical reference used for thread and post lookups. */
  uri: string;
  cid: string | null;
  authorDid: string | null;
  authorHandle: string | null;
  createdAt: string | null; // ISO
  langs: readonly string[];
  text: string | null;
  /** Payload exactly as returned by the discovery endpoint. */
  raw: unknown;
}

export interface AuthorRef {
  did: string | null;
  handle: string | null;
  displayName: string | null;
}

export type TruncationReason = "limit" | "error" | "depth";

export interface CommentNode {
  uri: string;
  cid: string | null;
  author: AuthorRef;
  text: string | null;
  createdAt: string | null; // ISO
  likeCount: number | null;
  replyCount: number | null;
  /** 0 for comments on the post itself, parent depth + 1 for replies. */
  depth: number;
  replies: readonly CommentNode[];
  truncated: boolean;
  truncation: TruncationReason | null;
  raw: unknown;
}

export interface FetchMeta {
  topLevelFetched: number;
  repliesFetched: number;
  nodesFetched: number;
  deepestDepth: number;
  /** More top-level comments existed than maxTopLevel allowed. */
  topLevelTruncated: boolean;
  truncatedBranches: number;
  /** topLevelTruncated or at least one truncated branch. */
  truncated: boolean;
}

export interface PostRecord {
  stub: PostStub;
  postUrl: string | null;
  /** Hydrated post view from the post lookup, when the API returned one. */
  post: unknown;
  comments: readonly CommentNode[];
  meta: FetchMeta;
}
