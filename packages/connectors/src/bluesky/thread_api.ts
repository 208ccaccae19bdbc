import { CrawlError } from "@threadloom/shared";

import { asArray, asRecord } from "../xrpc/json";
import type { PageSpec } from "../xrpc/paginate";
import type { Transport } from "../xrpc/transport";
import { isPostEntry, readThreadEntry, type PostThreadEntry } from "./normalize";

/** Upper bound of `app.bsky.feed.getPosts`. */
export const GET_POSTS_MAX_URIS = 25;

/**
 * Hydrated post views for `uris`, in server order. Missing posts are simply absent.
 */
export async function getPosts(transport: Transport, uris: string[]): Promise<unknown[]> {
  const out: unknown[] = [];
  for (let i = 0; i < uris.length; i += GET_POSTS_MAX_URIS) {
    const chunk = uris.slice(i, i + GET_POSTS_MAX_URIS);
    const res = await transport.send({ endpoint: "app.bsky.feed.getPosts", params: { uris: chunk } });
    out.push(...asArray(asRecord(res.data).posts));
  }
  return out;
}

/**
 * Visible direct replies of `uri` (each with its own embedded replies down to
 * `depth` levels below `uri`) as one page of getPostThread. Not-found and
 * blocked entries are dropped. The endpoint takes no cursor, so the page is
 * also the last one.
 */
export function threadRepliesSpec(uri: string, depth: number): PageSpec<PostThreadEntry> {
  const endpoint = "app.bsky.feed.getPostThread";
  return {
    endpoint,
    params: { uri, depth, parentHeight: 0 },
    limitParam: null,
    extract(data) {
      const thread = asRecord(data).thread;
      const entry = readThreadEntry(thread);
      if (entry.kind === "hidden") {
        throw new CrawlError("PostUnavailable", `${uri} is ${entry.reason === "unknown" ? "unavailable" : entry.reason}`, {
          endpoint,
        });
      }
      const items = (entry.replies ?? []).map(readThreadEntry).filter(isPostEntry);
      return { items, cursor: null };
    },
  };
}

/**
 * Resolve a handle to its DID (`com.atproto.identity.resolveHandle`).
 */
export async function resolveHandle(transport: Transport, handle: string): Promise<string> {
  const res = await transport.send({ endpoint: "com.atproto.identity.resolveHandle", params: { handle } });
  const did = asRecord(res.data).did;
  if (typeof did !== "string" || did.length === 0) {
    throw new CrawlError("NotFound", `Could not resolve handle ${handle}`, {
      endpoint: "com.atproto.identity.resolveHandle",
    });
  }
  return did;
}
