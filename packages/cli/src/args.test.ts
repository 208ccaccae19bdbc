import { describe, expect, it } from "vitest";

import { DEFAULT_POST_LIMIT, parseCliArgs } from "./args";

describe("parseCliArgs", () => {
  it("defaults", () => {
    expect(parseCliArgs([])).toEqual({
      positional: [],
      auth: false,
      limit: DEFAULT_POST_LIMIT,
      lang: null,
      since: null,
      until: null,
      out: "output",
      ndjson: false,
      concurrency: null,
      maxComments: null,
      maxDepth: null,
      metrics: false,
      exclude: [],
      sort: null,
    });
  });

  it("reads flags in both --flag value and --flag=value form", () => {
    const args = parseCliArgs([
      "rust",
      "--limit",
      "20",
      "async",
      "--lang=EN",
      "--exclude",
      "a, b",
      "--exclude=c",
      "--sort",
      "top",
      "--auth",
      "--ndjson",
      "--max-comments",
      "0",
      "--out=archive",
    ]);

    expect(args).toMatchObject({
      positional: ["rust", "async"],
      limit: 20,
      lang: "en",
      exclude: ["a", "b", "c"],
      sort: "top",
      auth: true,
      ndjson: true,
      maxComments: 0,
      out: "archive",
    });
  });

  it("accepts --limit all", () => {
    expect(parseCliArgs(["--limit", "all"]).limit).toBeNull();
  });

  it("widens a date-only --until to the end of the day", () => {
    const args = parseCliArgs(["--since", "2025-01-02", "--until", "2025-01-03"]);
    expect(args.since?.toISOString()).toBe("2025-01-02T00:00:00.000Z");
    expect(args.until?.toISOString()).toBe("2025-01-03T23:59:59.999Z");
  });

  it.each([
    [["--limit", "0"], "Invalid --limit (expected an integer >= 1)"],
    [["--limit", "1.5"], "Invalid --limit (expected an integer >= 1)"],
    [["--max-depth", "-1"], "Invalid --max-depth (expected an integer >= 0)"],
    [["--sort", "new"], "Invalid --sort (expected top or latest)"],
    [["--bogus"], "Unknown option: --bogus"],
    [["--out"], "Missing --out value"],
    [["--since", "yesterday"], 'Invalid --since (expected YYYY-MM-DD or "YYYY-MM-DD HH:MM[:SS]")'],
    [["--since", "2025-02-01", "--until", "2025-01-01"], "--since must not be after --until"],
    [["-h"], "help"],
  ])("rejects %j", (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(message);
  });
});
