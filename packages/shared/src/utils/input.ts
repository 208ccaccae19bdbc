/**
 * Drop control and other non-printable characters from user-supplied input
 * (pasted handles and terms often carry zero-width or terminal escape bytes).
 */
export function cleanInput(value: string | null | undefined): string {
  if (!value) return "";
  return value.replace(/[\p{Cc}\p{Cf}\p{Co}\p{Cn}]/gu, "").trim();
}

/**
 * Split a comma- or whitespace-separated list, dropping empties.
 */
export function splitList(value: string | null | undefined): string[] {
  return cleanInput(value)
    .split(/[\s,]+/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2})?$/;

/**
 * Parse `YYYY-MM-DD` or `YYYY-MM-DD HH:MM[:SS]` as UTC.
 * With `endOfDay`, a date-only value covers the whole day.
 */
export function parseUtcDate(value: string, options: { endOfDay?: boolean } = {}): Date | null {
  const trimmed = cleanInput(value);
  if (DATE_ONLY.test(trimmed)) {
    const suffix = options.endOfDay ? "T23:59:59.999Z" : "T00:00:00.000Z";
    const date = new Date(`${trimmed}${suffix}`);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  if (DATE_TIME.test(trimmed)) {
    const iso = trimmed.replace(" ", "T");
    const date = new Date(iso.length === 16 ? `${iso}:00Z` : `${iso}Z`);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

/**
 * Parse an ISO-ish timestamp as returned by the API. Null when unparseable.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}
