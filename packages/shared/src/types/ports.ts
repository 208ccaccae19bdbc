import type { PostRecord } from "./content";

export type AuthMode = "anonymous" | "authenticated";

export interface SessionTokens {
  accessJwt: string;
  refreshJwt: string | null;
  did: string | null;
  handle: string | null;
}

/**
 * Supplies session tokens for the authenticated transport.
 * Throws CrawlError("AuthUnavailable") when no session can be produced.
 */
export interface CredentialSource {
  getAuthToken(): Promise<SessionTokens>;
}

/**
 * Receives completed records. The pipeline serializes calls, so implementations
 * do not need to guard against concurrent writes.
 */
export interface Sink {
  write(record: PostRecord): Promise<void>;
  close?(): Promise<void>;
}
