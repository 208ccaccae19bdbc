import { cleanInput, parseTimestamp, type PostStub } from "@threadloom/shared";

export interface PostFilter {
  /** Two-letter language code the post must declare. */
  lang?: string | null;
  since?: Date | null;
  until?: Date | null;
}

export interface FilterResult {
  kept: PostStub[];
  droppedByLanguage: number;
  droppedByDate: number;
}

export function matchesLanguage(stub: PostStub, lang: string): boolean {
  return stub.langs.some((l) => l.toLowerCase() === lang);
}

/**
 * Inclusive on both ends. A post without a readable timestamp never matches.
 */
export function withinWindow(stub: PostStub, since: Date | null, until: Date | null): boolean {
  const createdAt = parseTimestamp(stub.createdAt);
  if (!createdAt) return false;
  if (since && createdAt.getTime() < since.getTime()) return false;
  if (until && createdAt.getTime() > until.getTime()) return false;
  return true;
}

export function filterStubs(stubs: PostStub[], filter: PostFilter = {}): FilterResult {
  const lang = cleanInput(filter.lang).toLowerCase() || null;
  const since = filter.since ?? null;
  const until = filter.until ?? null;
  const hasWindow = since !== null || until !== null;

  const kept: PostStub[] = [];
  let droppedByLanguage = 0;
  let droppedByDate = 0;
  for (const stub of stubs) {
    if (lang && !matchesLanguage(stub, lang)) {
      droppedByLanguage += 1;
    } else if (hasWindow && !withinWindow(stub, since, until)) {
      droppedByDate += 1;
    } else {
      kept.push(stub);
    }
  }
  return { kept, droppedByLanguage, droppedByDate };
}
