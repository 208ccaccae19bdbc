import { CrawlError, type AuthMode } from "@threadloom/shared";

import {
  buildXrpcUrl,
  mapXrpcError,
  performXrpcCall,
  xrpcErrorName,
  type QueryParams,
  type XrpcResponse,
} from "./http";
import type { SessionTokenHolder } from "./session";

export interface XrpcRequest {
  /** NSID, e.g. `app.bsky.feed.getPostThread`. */
  endpoint: string;
  params?: QueryParams;
  cursor?: string | null;
}

export interface ResponseInfo {
  endpoint: string;
  mode: AuthMode;
  /** null when the request never got a response (network error, timeout). */
  status: number | null;
  durationMs: number;
}

/**
 * One request/response exchange with the XRPC service. Non-2xx responses are
 * thrown as CrawlError; the only retry is the single post-refresh retry of the
 * authenticated variant.
 */
export interface Transport {
  readonly mode: AuthMode;
  /** Establish whatever the transport needs before the first request. */
  prepare(): Promise<void>;
  send(request: XrpcRequest): Promise<XrpcResponse>;
}

export interface TransportOptions {
  serviceUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  onResponse?: (info: ResponseInfo) => void;
}

function isOk(status: number): boolean {
  return status >= 200 && status < 300;
}

abstract class BaseTransport implements Transport {
  abstract readonly mode: AuthMode;
  protected readonly fetchImpl: typeof fetch;

  constructor(protected readonly options: TransportOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  abstract prepare(): Promise<void>;
  abstract send(request: XrpcRequest): Promise<XrpcResponse>;

  protected async call(request: XrpcRequest, headers: Record<string, string>): Promise<XrpcResponse> {
    const startedAt = Date.now();
    let status: number | null = null;
    try {
      const response = await performXrpcCall({
        fetchImpl: this.fetchImpl,
        url: buildXrpcUrl(this.options.serviceUrl, request.endpoint, request.params, request.cursor),
        endpoint: request.endpoint,
        headers,
        timeoutMs: this.options.timeoutMs,
      });
      status = response.status;
      return response;
    } finally {
      this.options.onResponse?.({
        endpoint: request.endpoint,
        mode: this.mode,
        status,
        durationMs: Date.now() - startedAt,
      });
    }
  }

  protected check(request: XrpcRequest, response: XrpcResponse): XrpcResponse {
    if (isOk(response.status)) return response;
    throw mapXrpcError(request.endpoint, response, this.mode);
  }
}

/**
 * Unauthenticated calls against the public AppView host.
 */
export class AnonymousTransport extends BaseTransport {
  readonly mode = "anonymous" as const;

  async prepare(): Promise<void> {}

  async send(request: XrpcRequest): Promise<XrpcResponse> {
    return this.check(request, await this.call(request, {}));
  }
}

function isExpired(response: XrpcResponse): boolean {
  return response.status === 401 || (response.status === 400 && xrpcErrorName(response.data) === "ExpiredToken");
}

/**
 * Bearer-token calls against the session's service. An expired token is
 * refreshed through the shared holder and the request retried once.
 */
export class AuthenticatedTransport extends BaseTransport {
  readonly mode = "authenticated" as const;

  constructor(
    options: TransportOptions,
    private readonly session: SessionTokenHolder,
  ) {
    super(options);
  }

  async prepare(): Promise<void> {
    await this.session.getAccessToken();
  }

  async send(request: XrpcRequest): Promise<XrpcResponse> {
    const token = await this.session.getAccessToken();
    const first = await this.call(request, { authorization: `Bearer ${token}` });
    if (!isExpired(first)) return this.check(request, first);

    const fresh = await this.session.refresh(token);
    const retry = await this.call(request, { authorization: `Bearer ${fresh}` });
    if (isExpired(retry)) {
      throw new CrawlError("AuthUnavailable", `${request.endpoint} rejected the refreshed session token`, {
        status: retry.status,
        endpoint: request.endpoint,
      });
    }
    return this.check(request, retry);
  }
}
