import type { PostStub } from "@threadloom/shared";

import type { PaginateOptions } from "./xrpc/paginate";
import type { Transport } from "./xrpc/transport";

export type SeedMode = "search" | "author" | "feed" | "trending";

export interface DiscoverParams {
  /** Mode-specific settings, parsed by the provider's config parser. */
  config: Record<string, unknown>;
  /** null = no cap */
  maxPosts: number | null;
}

export interface SeedContext {
  transport: Transport;
  /** Backoff, page delay, page cap and abort signal shared by every page request. */
  pagination?: Omit<PaginateOptions, "maxItems">;
}

export interface SeedProvider {
  mode: SeedMode;
  discover(params: DiscoverParams, ctx: SeedContext): AsyncIterable<PostStub>;
}
