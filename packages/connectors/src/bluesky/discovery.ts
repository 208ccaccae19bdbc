import { cleanInput } from "@threadloom/shared";

import { asArray, asNumber, asRecord, asString } from "../xrpc/json";
import { collect, Paginator, type PaginateOptions } from "../xrpc/paginate";
import type { Transport } from "../xrpc/transport";

export interface ActorSummary {
  did: string;
  handle: string;
  displayName: string | null;
  description: string | null;
  followersCount: number | null;
}

export interface FeedSummary {
  uri: string;
  displayName: string;
  description: string | null;
  creatorHandle: string | null;
  likeCount: number | null;
}

function toActorSummary(value: unknown): ActorSummary | null {
  const actor = asRecord(value);
  const did = asString(actor.did);
  const handle = asString(actor.handle);
  if (!did || !handle) return null;
  return {
    did,
    handle,
    displayName: asString(actor.displayName),
    description: asString(actor.description),
    followersCount: asNumber(actor.followersCount),
  };
}

function toFeedSummary(value: unknown): FeedSummary | null {
  const feed = asRecord(value);
  const uri = asString(feed.uri);
  if (!uri) return null;
  return {
    uri,
    displayName: asString(feed.displayName) ?? uri,
    description: asString(feed.description),
    creatorHandle: asString(asRecord(feed.creator).handle),
    likeCount: asNumber(feed.likeCount),
  };
}

function keep<T>(values: Array<T | null>): T[] {
  return values.filter((v): v is T => v !== null);
}

export async function searchActors(
  transport: Transport,
  query: string,
  options: PaginateOptions = {},
): Promise<ActorSummary[]> {
  const actors = new Paginator(
    transport,
    {
      endpoint: "app.bsky.actor.searchActors",
      params: { q: cleanInput(query) },
      pageSize: 25,
      extract: (data) => {
        const body = asRecord(data);
        return { items: asArray(body.actors), cursor: asString(body.cursor) };
      },
    },
    { maxItems: 25, ...options },
  );
  return keep((await collect(actors)).map(toActorSummary));
}

export async function listPopularFeeds(transport: Transport, options: PaginateOptions = {}): Promise<FeedSummary[]> {
  const feeds = new Paginator(
    transport,
    {
      endpoint: "app.bsky.unspecced.getPopularFeedGenerators",
      pageSize: 50,
      extract: (data) => {
        const body = asRecord(data);
        return { items: asArray(body.feeds), cursor: asString(body.cursor) };
      },
    },
    { maxItems: 50, ...options },
  );
  return keep((await collect(feeds)).map(toFeedSummary));
}

export async function listActorFeeds(
  transport: Transport,
  actor: string,
  options: PaginateOptions = {},
): Promise<FeedSummary[]> {
  const feeds = new Paginator(
    transport,
    {
      endpoint: "app.bsky.feed.getActorFeeds",
      params: { actor: cleanInput(actor).replace(/^@/, "") },
      pageSize: 50,
      extract: (data) => {
        const body = asRecord(data);
        return { items: asArray(body.feeds), cursor: asString(body.cursor) };
      },
    },
    options,
  );
  return keep((await collect(feeds)).map(toFeedSummary));
}
