/**
 * In-process stand-in for an XRPC service, used as the `fetchImpl` of
 * transports and session sources in tests.
 */
export interface FakeRequest {
  endpoint: string;
  method: string;
  url: URL;
  params: URLSearchParams;
  headers: Headers;
  body: unknown;
  signal: AbortSignal | null;
}

export interface FakeReply {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

export type FakeHandler = (req: FakeRequest) => FakeReply | Promise<FakeReply>;

function parseBody(body: RequestInit["body"]): unknown {
  if (typeof body !== "string" || body.length === 0) return undefined;
  return JSON.parse(body);
}

export class FakeXrpcServer {
  readonly calls: FakeRequest[] = [];
  private readonly routes = new Map<string, FakeHandler>();

  on(endpoint: string, handler: FakeHandler): this {
    this.routes.set(endpoint, handler);
    return this;
  }

  callsTo(endpoint: string): FakeRequest[] {
    return this.calls.filter((c) => c.endpoint === endpoint);
  }

  readonly fetch: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const req: FakeRequest = {
      endpoint: url.pathname.replace(/^\/xrpc\//, ""),
      method: init?.method ?? "GET",
      url,
      params: url.searchParams,
      headers: new Headers(init?.headers),
      body: parseBody(init?.body),
      signal: init?.signal ?? null,
    };
    this.calls.push(req);

    const handler = this.routes.get(req.endpoint);
    const reply: FakeReply = handler
      ? await handler(req)
      : { status: 501, body: { error: "MethodNotImplemented", message: `No route for ${req.endpoint}` } };
    const status = reply.status ?? 200;
    return new Response(reply.body === undefined ? null : JSON.stringify(reply.body), {
      status,
      headers: { "content-type": "application/json; charset=utf-8", ...reply.headers },
    });
  };
}

/** Resolves when `signal` aborts; lets a handler hang until the client times out. */
export function untilAborted(signal: AbortSignal | null): Promise<never> {
  return new Promise((_, reject) => {
    signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

let seq = 0;

/** Minimal `app.bsky.feed.defs#postView`. */
export function postView(
  uri: string,
  extra: { handle?: string; did?: string; text?: string; createdAt?: string; langs?: string[]; replyCount?: number } = {},
): Record<string, unknown> {
  seq += 1;
  const did = extra.did ?? uri.replace(/^at:\/\//, "").split("/")[0] ?? "did:plc:unknown";
  return {
    uri,
    cid: `cid-${seq}`,
    author: { did, handle: extra.handle ?? "tester.example.test" },
    record: {
      text: extra.text ?? `text of ${uri}`,
      createdAt: extra.createdAt ?? "2025-01-01T00:00:00.000Z",
      langs: extra.langs ?? ["en"],
    },
    likeCount: 0,
    replyCount: extra.replyCount ?? 0,
    indexedAt: extra.createdAt ?? "2025-01-01T00:00:00.000Z",
  };
}

/** `threadViewPost` node with optional embedded replies. */
export function threadNode(
  uri: string,
  replies?: unknown[],
  extra: { replyCount?: number; handle?: string } = {},
): Record<string, unknown> {
  const node: Record<string, unknown> = {
    $type: "app.bsky.feed.defs#threadViewPost",
    post: postView(uri, { replyCount: extra.replyCount ?? replies?.length ?? 0, handle: extra.handle }),
  };
  if (replies) node.replies = replies;
  return node;
}

export function notFoundNode(uri: string): Record<string, unknown> {
  return { $type: "app.bsky.feed.defs#notFoundPost", uri, notFound: true };
}

export function blockedNode(uri: string): Record<string, unknown> {
  return { $type: "app.bsky.feed.defs#blockedPost", uri, blocked: true };
}
