import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { PostRecord } from "@threadloom/shared";
import { afterEach, describe, expect, it } from "vitest";

import { JsonFileSink, outputFileName, sanitizeLabel } from "./json_file";

function record(id: string): PostRecord {
  return {
    stub: {
      id,
      uri: id,
      cid: null,
      authorDid: null,
      authorHandle: null,
      createdAt: null,
      langs: [],
      text: "héllo",
      raw: null,
    },
    postUrl: null,
    post: null,
    comments: [],
    meta: {
      topLevelFetched: 0,
      repliesFetched: 0,
      nodesFetched: 0,
      deepestDepth: 0,
      topLevelTruncated: false,
      truncatedBranches: 0,
      truncated: false,
    },
  };
}

const NOW = new Date("2025-03-04T05:06:07.000Z");

describe("outputFileName", () => {
  it("joins mode, sanitized label and UTC timestamp", () => {
    expect(sanitizeLabel("rust -tokio \"async io\"!")).toBe("rust_tokio_async_io");
    expect(outputFileName({ mode: "search", label: "rust -tokio", now: NOW })).toBe(
      "search_rust_tokio_2025-03-04_05-06-07.json",
    );
    expect(outputFileName({ mode: "trending", format: "ndjson", now: NOW })).toBe(
      "trending_2025-03-04_05-06-07.ndjson",
    );
  });
});

describe("JsonFileSink", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  function tempDir(): string {
    const dir = mkdtempSync(join(tmpdir(), "threadloom-sink-"));
    dirs.push(dir);
    return join(dir, "out");
  }

  it("writes a JSON array on close", async () => {
    const sink = new JsonFileSink({ dir: tempDir(), mode: "user", label: "alice.example.test", now: NOW });
    await sink.write(record("a"));
    await sink.write(record("b"));
    await sink.close();

    const parsed: unknown = JSON.parse(readFileSync(sink.path, "utf8"));
    expect(Array.isArray(parsed)).toBe(true);
    expect(parsed).toEqual([record("a"), record("b")]);
    expect(sink.path.endsWith("user_aliceexampletest_2025-03-04_05-06-07.json")).toBe(true);
  });

  it("appends one line per record as NDJSON", async () => {
    const sink = new JsonFileSink({ dir: tempDir(), mode: "feed", format: "ndjson", now: NOW });
    await sink.write(record("a"));
    await sink.write(record("b"));
    await sink.close();

    const lines = readFileSync(sink.path, "utf8").trimEnd().split("\n");
    expect(lines.map((l) => JSON.parse(l).stub.id)).toEqual(["a", "b"]);
  });
});
