import type { PostStub } from "@threadloom/shared";
import { describe, expect, it } from "vitest";

import { filterStubs } from "./filter";

function stub(id: string, createdAt: string | null, langs: string[] = ["en"]): PostStub {
  return {
    id,
    uri: id,
    cid: null,
    authorDid: null,
    authorHandle: null,
    createdAt,
    langs,
    text: null,
    raw: null,
  };
}

const stubs = [
  stub("a", "2025-02-01T10:00:00.000Z", ["en"]),
  stub("b", "2025-02-03T23:59:59.999Z", ["es"]),
  stub("c", "2025-02-04T00:00:00.000Z", ["EN", "de"]),
  stub("d", null, ["en"]),
];

describe("filterStubs", () => {
  it("keeps everything without a filter", () => {
    expect(filterStubs(stubs).kept.map((s) => s.id)).toEqual(["a", "b", "c", "d"]);
  });

  it("filters by declared language, case-insensitively", () => {
    const result = filterStubs(stubs, { lang: " En " });
    expect(result.kept.map((s) => s.id)).toEqual(["a", "c", "d"]);
    expect(result.droppedByLanguage).toBe(1);
  });

  it("applies an inclusive date window and drops undated posts", () => {
    const result = filterStubs(stubs, {
      since: new Date("2025-02-01T10:00:00.000Z"),
      until: new Date("2025-02-03T23:59:59.999Z"),
    });
    expect(result.kept.map((s) => s.id)).toEqual(["a", "b"]);
    expect(result.droppedByDate).toBe(2);
  });
});
