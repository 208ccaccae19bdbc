import { describe, expect, it } from "vitest";

import { derivePostUrl, extractAtUri, parseAtUri, parseFeedReference } from "./at_uri";

describe("parseAtUri", () => {
  it("splits repo, collection and rkey", () => {
    expect(parseAtUri("at://did:plc:abc/app.bsky.feed.post/3kabc")).toEqual({
      repo: "did:plc:abc",
      collection: "app.bsky.feed.post",
      rkey: "3kabc",
    });
    expect(parseAtUri("at://did:plc:abc")).toEqual({ repo: "did:plc:abc", collection: null, rkey: null });
    expect(parseAtUri("https://bsky.app")).toBeNull();
  });
});

describe("derivePostUrl", () => {
  const uri = "at://did:plc:abc/app.bsky.feed.post/3kabc";

  it("prefers the handle and falls back to the DID", () => {
    expect(derivePostUrl({ uri, authorHandle: "alice.example.test", authorDid: "did:plc:abc" })).toBe(
      "https://bsky.app/profile/alice.example.test/post/3kabc",
    );
    expect(derivePostUrl({ uri, authorHandle: null, authorDid: "did:plc:abc" })).toBe(
      "https://bsky.app/profile/did:plc:abc/post/3kabc",
    );
  });

  it("returns null for non-post URIs", () => {
    expect(derivePostUrl({ uri: "at://did:plc:abc/app.bsky.feed.generator/hot" })).toBeNull();
  });
});

describe("feed references", () => {
  it("extracts the first at:// URI from text", () => {
    expect(extractAtUri("feed: at://did:plc:abc/app.bsky.feed.generator/cats (nice)")).toBe(
      "at://did:plc:abc/app.bsky.feed.generator/cats",
    );
    expect(extractAtUri("nothing here")).toBeNull();
  });

  it("accepts bsky.app feed URLs", () => {
    expect(parseFeedReference("https://bsky.app/profile/alice.example.test/feed/cats?ref=x")).toEqual({
      repo: "alice.example.test",
      collection: "app.bsky.feed.generator",
      rkey: "cats",
    });
  });

  it("rejects URIs that are not feed generators", () => {
    expect(parseFeedReference("at://did:plc:abc/app.bsky.feed.post/3kabc")).toBeNull();
    expect(parseFeedReference("cats")).toBeNull();
  });
});
