import { CrawlError, type AuthMode, type CrawlConfig, type CredentialSource } from "@threadloom/shared";

import { createRefreshSession, PasswordCredentialSource, SessionTokenHolder } from "./session";
import { AnonymousTransport, AuthenticatedTransport, type ResponseInfo, type Transport } from "./transport";

export interface TransportFactoryOptions {
  fetchImpl?: typeof fetch;
  onResponse?: (info: ResponseInfo) => void;
  /** Replaces the password session built from config.credentials. */
  credentialSource?: CredentialSource;
}

/**
 * Builds transports for a run. The authenticated transport, and the token
 * holder behind it, are created once and shared.
 */
export class TransportFactory {
  private anonymous: AnonymousTransport | null = null;
  private authenticated: AuthenticatedTransport | null = null;

  constructor(
    private readonly config: CrawlConfig,
    private readonly options: TransportFactoryOptions = {},
  ) {}

  get canAuthenticate(): boolean {
    return this.options.credentialSource !== undefined || this.config.credentials !== null;
  }

  get(mode: AuthMode): Transport {
    return mode === "anonymous" ? this.getAnonymous() : this.getAuthenticated();
  }

  private getAnonymous(): AnonymousTransport {
    this.anonymous ??= new AnonymousTransport({
      serviceUrl: this.config.publicServiceUrl,
      timeoutMs: this.config.requestTimeoutMs,
      fetchImpl: this.options.fetchImpl,
      onResponse: this.options.onResponse,
    });
    return this.anonymous;
  }

  private getAuthenticated(): AuthenticatedTransport {
    if (this.authenticated) return this.authenticated;
    const source = this.options.credentialSource ?? this.passwordSource();
    const holder = new SessionTokenHolder(
      source,
      createRefreshSession({
        serviceUrl: this.config.authServiceUrl,
        fetchImpl: this.options.fetchImpl,
        timeoutMs: this.config.requestTimeoutMs,
      }),
    );
    this.authenticated = new AuthenticatedTransport(
      {
        serviceUrl: this.config.authServiceUrl,
        timeoutMs: this.config.requestTimeoutMs,
        fetchImpl: this.options.fetchImpl,
        onResponse: this.options.onResponse,
      },
      holder,
    );
    return this.authenticated;
  }

  private passwordSource(): PasswordCredentialSource {
    if (!this.config.credentials) {
      throw new CrawlError(
        "ConfigError",
        "Authenticated mode requires credentials. Set BSKY_USERNAME and BSKY_PASSWORD (an app password).",
      );
    }
    return new PasswordCredentialSource({
      serviceUrl: this.config.authServiceUrl,
      credentials: this.config.credentials,
      fetchImpl: this.options.fetchImpl,
      timeoutMs: this.config.requestTimeoutMs,
    });
  }
}
