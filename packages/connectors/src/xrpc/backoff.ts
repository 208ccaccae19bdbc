import { CrawlError, type BackoffPolicy } from "@threadloom/shared";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

function cancelled(): CrawlError {
  return new CrawlError("Cancelled", "Aborted while waiting");
}

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelled());
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(cancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * `baseDelayMs * 2^attempt` with up to `jitter` of it randomized away. Never
 * shorter than a server-provided retry-after, never longer than `maxDelayMs`.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  retryAfterMs?: number,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** attempt);
  const jittered = Math.round(exponential * (1 - policy.jitter * random()));
  return Math.min(policy.maxDelayMs, Math.max(jittered, retryAfterMs ?? 0));
}
