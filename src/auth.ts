/**
 * Authentication lifecycle.
 *
 * ```
 * Unauthenticated ─onboard─▶ Onboarded ─authenticate─▶ Authenticated(t)
 *                                 (age > 240 s) ─re-authenticate─▶ Authenticated(t')
 * ```
 *
 * Onboarding is idempotent: an "already onboarded" API error counts as
 * success. Re-authentication replaces the session token in place; there is
 * no separate expired state, callers consult {@link needsRefresh} (or use
 * {@link AuthSession.ensureFresh}) before each privileged call.
 *
 * @module
 */

import { AUTH_REFRESH_INTERVAL_SECS } from "./config.js";
import { AccountStateError, ApiError } from "./errors.js";
import { log } from "./logger.js";
import type { Header } from "./models.js";

/** Millisecond clock; injectable for tests. */
export type Clock = () => number;

/**
 * Whether a token obtained at `authTimestampMs` must be refreshed.
 *
 * Compares whole elapsed seconds with the 240 s refresh interval: exactly
 * 240 s is still fresh, 241 s is not. A timestamp in the future counts as
 * just issued.
 */
export function needsRefresh(authTimestampMs: number, nowMs: number = Date.now()): boolean {
  const elapsedSecs = Math.floor(Math.max(0, nowMs - authTimestampMs) / 1000);
  return elapsedSecs > AUTH_REFRESH_INTERVAL_SECS;
}

/** Whether an error is the API's "account already onboarded" response. */
export function isAlreadyOnboardedError(error: unknown): boolean {
  return error instanceof ApiError && error.status === 400 && /already/i.test(error.message);
}

/** Lifecycle state reported by {@link AuthSession.state}. */
export type AuthState = "unauthenticated" | "onboarded" | "authenticated";

/**
 * Holder of the session (JWT) token and the time it was obtained.
 *
 * Token replacement is the only mutation; concurrent refreshes are
 * coalesced onto a single in-flight request, and signing never waits on it.
 *
 * @example
 * ```ts
 * const token = await account.session.ensureFresh(() =>
 *   api.authenticate(account.authHeaders()),
 * );
 * ```
 */
export class AuthSession {
  private readonly clock: Clock;
  private currentToken: string | undefined;
  private authenticatedAt: number | undefined;
  private onboarded = false;
  private inflight: Promise<string> | null = null;

  constructor(clock: Clock = Date.now) {
    this.clock = clock;
  }

  get state(): AuthState {
    if (this.currentToken !== undefined) return "authenticated";
    return this.onboarded ? "onboarded" : "unauthenticated";
  }

  /** The current token, if authenticated. */
  get token(): string | undefined {
    return this.currentToken;
  }

  /** When the current token was obtained (ms), if authenticated. */
  get authTimestamp(): number | undefined {
    return this.authenticatedAt;
  }

  /**
   * The current token.
   *
   * @throws {AccountStateError} When no token has been obtained yet.
   */
  requireToken(): string {
    if (this.currentToken === undefined) {
      throw new AccountStateError("No session token; authenticate first");
    }
    return this.currentToken;
  }

  /** `Authorization: Bearer <token>` for privileged REST calls. */
  authorizationHeader(): Header {
    return ["Authorization", `Bearer ${this.requireToken()}`];
  }

  /** Store a freshly issued token, stamped with the current time. */
  setToken(token: string): void {
    this.currentToken = token;
    this.authenticatedAt = this.clock();
    log.auth("session token replaced at %d", this.authenticatedAt);
  }

  /** Whether there is no token or the token is older than the refresh interval. */
  needsRefresh(): boolean {
    if (this.authenticatedAt === undefined) return true;
    return needsRefresh(this.authenticatedAt, this.clock());
  }

  /**
   * Return a token that is not due for refresh, calling `authenticate` when
   * needed. Concurrent callers share one `authenticate` call.
   */
  async ensureFresh(authenticate: () => Promise<string>): Promise<string> {
    if (!this.needsRefresh()) return this.requireToken();
    if (this.inflight === null) {
      this.inflight = this.refresh(authenticate);
    }
    return this.inflight;
  }

  private async refresh(authenticate: () => Promise<string>): Promise<string> {
    try {
      log.auth("refreshing session token");
      const token = await authenticate();
      this.setToken(token);
      return token;
    } finally {
      this.inflight = null;
    }
  }

  /**
   * Run an onboarding request, treating "already onboarded" as success.
   * Any other error propagates.
   */
  async onboard(submit: () => Promise<void>): Promise<void> {
    try {
      await submit();
    } catch (error) {
      if (!isAlreadyOnboardedError(error)) throw error;
      log.auth("account already onboarded");
    }
    this.onboarded = true;
  }

  /** Drop the token, e.g. after the API rejects it. */
  clear(): void {
    this.currentToken = undefined;
    this.authenticatedAt = undefined;
  }
}
