import type { AuthorRef, PostStub } from "@threadloom/shared";

import { asArray, asNumber, asRecord, asString, asStringArray, isRecord } from "../xrpc/json";

export function toAuthorRef(value: unknown): AuthorRef {
  const author = asRecord(value);
  return {
    did: asString(author.did),
    handle: asString(author.handle),
    displayName: asString(author.displayName),
  };
}

/**
 * Fields read off an `app.bsky.feed.defs#postView`.
 */
export interface PostViewFields {
  uri: string;
  cid: string | null;
  author: AuthorRef;
  text: string | null;
  createdAt: string | null;
  langs: string[];
  likeCount: number | null;
  replyCount: number | null;
}

export function readPostView(value: unknown): PostViewFields | null {
  if (!isRecord(value)) return null;
  const uri = asString(value.uri);
  if (!uri) return null;
  const record = asRecord(value.record);
  return {
    uri,
    cid: asString(value.cid),
    author: toAuthorRef(value.author),
    text: typeof record.text === "string" ? record.text : null,
    createdAt: asString(record.createdAt) ?? asString(value.indexedAt),
    langs: asStringArray(record.langs),
    likeCount: asNumber(value.likeCount),
    replyCount: asNumber(value.replyCount),
  };
}

/**
 * PostStub from a post view, or from a feed item wrapping one under `post`.
 */
export function toPostStub(value: unknown): PostStub | null {
  const item = asRecord(value);
  const view = readPostView(isRecord(item.post) ? item.post : value);
  if (!view) return null;
  return Object.freeze({
    id: view.uri,
    uri: view.uri,
    cid: view.cid,
    authorDid: view.author.did,
    authorHandle: view.author.handle,
    createdAt: view.createdAt,
    langs: Object.freeze([...view.langs]),
    text: view.text,
    raw: value,
  });
}

export type ThreadEntry =
  | { kind: "post"; post: unknown; view: PostViewFields; replies: unknown[] | null }
  | { kind: "hidden"; reason: "notFound" | "blocked" | "unknown" };

export type PostThreadEntry = Extract<ThreadEntry, { kind: "post" }>;

export function isPostEntry(entry: ThreadEntry): entry is PostThreadEntry {
  return entry.kind === "post";
}

/**
 * Classify a node of a getPostThread response. `replies` is null when the
 * server did not embed them.
 */
export function readThreadEntry(value: unknown): ThreadEntry {
  const node = asRecord(value);
  const type = asString(node.$type);
  if (type === "app.bsky.feed.defs#notFoundPost" || node.notFound === true) {
    return { kind: "hidden", reason: "notFound" };
  }
  if (type === "app.bsky.feed.defs#blockedPost" || node.blocked === true) {
    return { kind: "hidden", reason: "blocked" };
  }
  const view = readPostView(node.post);
  if (!view) return { kind: "hidden", reason: "unknown" };
  return {
    kind: "post",
    post: node.post,
    view,
    replies: Array.isArray(node.replies) ? asArray(node.replies) : null,
  };
}
