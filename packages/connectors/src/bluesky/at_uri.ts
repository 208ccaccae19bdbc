import { cleanInput } from "@threadloom/shared";

export const POST_COLLECTION = "app.bsky.feed.post";
export const FEED_GENERATOR_COLLECTION = "app.bsky.feed.generator";

export interface AtUri {
  repo: string;
  collection: string | null;
  rkey: string | null;
}

const AT_URI = /^at:\/\/([^/\s]+)(?:\/([^/\s]+)(?:\/([^/\s]+))?)?\/?$/;

export function parseAtUri(uri: string): AtUri | null {
  const match = AT_URI.exec(uri.trim());
  if (!match?.[1]) return null;
  return { repo: match[1], collection: match[2] ?? null, rkey: match[3] ?? null };
}

export function formatAtUri(parts: AtUri): string {
  return ["at:/", parts.repo, parts.collection, parts.rkey].filter((p) => p !== null).join("/");
}

/**
 * First at:// URI found in free text.
 */
export function extractAtUri(text: string | null | undefined): string | null {
  const match = /at:\/\/[^\s"'<>]+/.exec(cleanInput(text));
  return match ? match[0] : null;
}

/**
 * Browser URL of a post. The handle is preferred; the DID (or the URI's repo)
 * is used when the handle is unknown.
 */
export function derivePostUrl(ref: {
  uri: string;
  authorHandle?: string | null;
  authorDid?: string | null;
}): string | null {
  const parsed = parseAtUri(ref.uri);
  if (!parsed?.rkey || parsed.collection !== POST_COLLECTION) return null;
  const actor = ref.authorHandle || ref.authorDid || parsed.repo;
  return `https://bsky.app/profile/${actor}/post/${parsed.rkey}`;
}

const FEED_URL = /https?:\/\/(?:www\.)?bsky\.app\/profile\/([^/\s?#]+)\/feed\/([^/\s?#]+)/;

/**
 * Accept an at:// feed URI, text containing one, or a bsky.app feed URL.
 * The repo of the result may still be a handle.
 */
export function parseFeedReference(input: string): AtUri | null {
  const cleaned = cleanInput(input);
  const url = FEED_URL.exec(cleaned);
  if (url?.[1] && url[2]) {
    return { repo: decodeURIComponent(url[1]), collection: FEED_GENERATOR_COLLECTION, rkey: url[2] };
  }
  const uri = extractAtUri(cleaned);
  if (!uri) return null;
  const parsed = parseAtUri(uri);
  if (!parsed?.rkey || parsed.collection !== FEED_GENERATOR_COLLECTION) return null;
  return parsed;
}
