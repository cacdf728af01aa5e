import { describeError, NetworkError } from './errors';
import type { Logger } from './types';

export interface SessionTokens {
  accessToken: string;
  refreshToken: string;
}

/**
 * Capability the interceptor needs from whatever holds the caller's tokens.
 */
export interface TokenSession {
  getAccessToken(): string | undefined;
  getRefreshToken(): string | undefined;
  setTokens(accessToken: string, refreshToken: string): void | Promise<void>;
  clearTokens(): void | Promise<void>;
  /** Obtains a new access token for the current refresh token. */
  refreshAccessToken(): Promise<string>;
}

/**
 * Backing store that keeps tokens across process restarts.
 */
export interface SessionStore {
  load(): Promise<SessionTokens | undefined>;
  save(tokens: SessionTokens): Promise<void>;
  clear(): Promise<void>;
}

export type TokenRefresher = (refreshToken: string) => Promise<string>;

export interface SessionOptions {
  store?: SessionStore;
  refresher?: TokenRefresher;
  logger?: Logger;
}

export class MemorySessionStore implements SessionStore {
  private tokens?: SessionTokens;

  constructor(initial?: SessionTokens) {
    this.tokens = initial ? { ...initial } : undefined;
  }

  async load(): Promise<SessionTokens | undefined> {
    return this.tokens ? { ...this.tokens } : undefined;
  }

  async save(tokens: SessionTokens): Promise<void> {
    this.tokens = { ...tokens };
  }

  async clear(): Promise<void> {
    this.tokens = undefined;
  }
}

/**
 * Holds the access and refresh tokens for one composition root.
 *
 * Both tokens are always set or cleared together. The in-memory state changes
 * before the store is written, so a failing store never leaves the session
 * half-updated; the store error still reaches the caller.
 */
export class Session implements TokenSession {
  private tokens?: SessionTokens;
  private readonly store?: SessionStore;
  private readonly refresher?: TokenRefresher;
  private readonly logger?: Logger;

  constructor(options: SessionOptions = {}) {
    this.store = options.store;
    this.refresher = options.refresher;
    this.logger = options.logger;
  }

  /**
   * Creates a session and loads any tokens persisted in `options.store`.
   * An unreadable store is logged and the session starts signed out.
   */
  static async restore(options: SessionOptions = {}): Promise<Session> {
    const session = new Session(options);
    if (!options.store) {
      return session;
    }
    try {
      const tokens = await options.store.load();
      if (tokens) {
        session.tokens = { ...tokens };
      }
    } catch (error) {
      options.logger?.warn('http.session.restore.failed', { error: describeError(error) });
    }
    return session;
  }

  get isAuthenticated(): boolean {
    return this.tokens !== undefined;
  }

  getAccessToken(): string | undefined {
    return this.tokens?.accessToken;
  }

  getRefreshToken(): string | undefined {
    return this.tokens?.refreshToken;
  }

  async setTokens(accessToken: string, refreshToken: string): Promise<void> {
    this.tokens = { accessToken, refreshToken };
    await this.store?.save({ accessToken, refreshToken });
  }

  async clearTokens(): Promise<void> {
    this.tokens = undefined;
    await this.store?.clear();
  }

  /**
   * @throws NetworkError `unauthorized` when there is no refresh token or no refresher
   */
  async refreshAccessToken(): Promise<string> {
    const refreshToken = this.tokens?.refreshToken;
    if (!refreshToken || !this.refresher) {
      throw NetworkError.unauthorized();
    }
    this.logger?.debug('http.session.refresh.start');
    return this.refresher(refreshToken);
  }
}
