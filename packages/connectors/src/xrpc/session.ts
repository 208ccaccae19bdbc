import {
  CrawlError,
  createLogger,
  isCrawlError,
  type CredentialSource,
  type Credentials,
  type SessionTokens,
} from "@threadloom/shared";

import { buildXrpcUrl, mapXrpcError, performXrpcCall, type XrpcResponse } from "./http";
import { asString, isRecord } from "./json";

const log = createLogger({ component: "session" });

const SESSION_TIMEOUT_MS = 15_000;

export type SessionRefresher = (current: SessionTokens) => Promise<SessionTokens>;

function parseSession(data: unknown, previous: SessionTokens | null): SessionTokens {
  const obj = isRecord(data) ? data : {};
  const accessJwt = asString(obj.accessJwt);
  if (!accessJwt) {
    throw new CrawlError("AuthUnavailable", "Session response did not include an access token");
  }
  return {
    accessJwt,
    refreshJwt: asString(obj.refreshJwt) ?? previous?.refreshJwt ?? null,
    did: asString(obj.did) ?? previous?.did ?? null,
    handle: asString(obj.handle) ?? previous?.handle ?? null,
  };
}

function authFailure(endpoint: string, response: XrpcResponse): CrawlError {
  const mapped = mapXrpcError(endpoint, response, "authenticated");
  if (mapped.retryable) return mapped;
  return new CrawlError("AuthUnavailable", mapped.message, { status: response.status, endpoint, cause: mapped });
}

export interface PasswordSessionOptions {
  serviceUrl: string;
  credentials: Credentials;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

/**
 * Creates sessions with an identifier and app password
 * (`com.atproto.server.createSession`).
 */
export class PasswordCredentialSource implements CredentialSource {
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(private readonly options: PasswordSessionOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? SESSION_TIMEOUT_MS;
  }

  async getAuthToken(): Promise<SessionTokens> {
    const endpoint = "com.atproto.server.createSession";
    const response = await performXrpcCall({
      fetchImpl: this.fetchImpl,
      url: buildXrpcUrl(this.options.serviceUrl, endpoint),
      endpoint,
      method: "POST",
      body: {
        identifier: this.options.credentials.identifier,
        password: this.options.credentials.password,
      },
      timeoutMs: this.timeoutMs,
    });
    if (response.status < 200 || response.status >= 300) throw authFailure(endpoint, response);

    const tokens = parseSession(response.data, null);
    log.info({ handle: tokens.handle ?? this.options.credentials.identifier }, "Session created");
    return tokens;
  }
}

/**
 * Exchange a refresh token for a new token pair (`com.atproto.server.refreshSession`).
 */
export function createRefreshSession(params: {
  serviceUrl: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}): SessionRefresher {
  const fetchImpl = params.fetchImpl ?? fetch;
  const endpoint = "com.atproto.server.refreshSession";
  return async (current) => {
    if (!current.refreshJwt) {
      throw new CrawlError("AuthUnavailable", "No refresh token available", { endpoint });
    }
    const response = await performXrpcCall({
      fetchImpl,
      url: buildXrpcUrl(params.serviceUrl, endpoint),
      endpoint,
      method: "POST",
      headers: { authorization: `Bearer ${current.refreshJwt}` },
      timeoutMs: params.timeoutMs ?? SESSION_TIMEOUT_MS,
    });
    if (response.status < 200 || response.status >= 300) throw authFailure(endpoint, response);
    return parseSession(response.data, current);
  };
}

/**
 * Shared by every worker of a run. Acquisition and refresh are single-flight:
 * concurrent callers await the same in-flight request, and a caller holding a
 * token that was already replaced gets the replacement without another refresh.
 */
export class SessionTokenHolder {
  private tokens: SessionTokens | null = null;
  private inflight: Promise<SessionTokens> | null = null;
  private refreshes = 0;

  constructor(
    private readonly source: CredentialSource,
    private readonly refresher?: SessionRefresher,
  ) {}

  get current(): SessionTokens | null {
    return this.tokens;
  }

  /** Number of completed refreshes (re-logins included). */
  get refreshCount(): number {
    return this.refreshes;
  }

  async getAccessToken(): Promise<string> {
    if (this.inflight) return (await this.inflight).accessJwt;
    if (this.tokens) return this.tokens.accessJwt;
    return (await this.exclusive(() => this.acquire())).accessJwt;
  }

  /**
   * Replace `staleToken` after the server rejected it as expired.
   */
  async refresh(staleToken: string): Promise<string> {
    if (this.inflight) return (await this.inflight).accessJwt;
    if (this.tokens && this.tokens.accessJwt !== staleToken) return this.tokens.accessJwt;

    const tokens = await this.exclusive(async () => {
      const next = await this.renew();
      this.refreshes += 1;
      return next;
    });
    return tokens.accessJwt;
  }

  private exclusive(task: () => Promise<SessionTokens>): Promise<SessionTokens> {
    if (!this.inflight) {
      this.inflight = task()
        .then((tokens) => {
          this.tokens = tokens;
          return tokens;
        })
        .finally(() => {
          this.inflight = null;
        });
    }
    return this.inflight;
  }

  private async acquire(): Promise<SessionTokens> {
    try {
      return await this.source.getAuthToken();
    } catch (err) {
      if (isCrawlError(err)) throw err;
      throw new CrawlError("AuthUnavailable", err instanceof Error ? err.message : String(err), { cause: err });
    }
  }

  private async renew(): Promise<SessionTokens> {
    const current = this.tokens;
    if (current && current.refreshJwt && this.refresher) {
      try {
        const renewed = await this.refresher(current);
        log.info("Session refreshed");
        return renewed;
      } catch (err) {
        log.warn({ err: err instanceof Error ? err.message : String(err) }, "Session refresh failed; logging in again");
      }
    }
    return this.acquire();
  }
}
