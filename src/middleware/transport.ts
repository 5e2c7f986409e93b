/**
 * transport.ts — The seam between FetchEngine and the two retrieval strategies.
 *
 * FetchEngine never inspects which transport it holds; admission, timeouts,
 * error typing and backoff reporting happen above this interface, and the
 * transport only moves bytes and keeps its session state.
 */

import type {
  FieldMap,
  Credentials,
  SessionCookie,
  SessionHandle,
  TransportKind,
  TransportRequest,
  TransportResponse,
  FetchResult,
} from '../core/types';

/** A login form submission prepared by the engine for its transport. */
export interface TransportLogin {
  loginPage: FetchResult;
  fieldMap: FieldMap;
  credentials: Credentials;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface Transport {
  readonly kind: TransportKind;

  /** Create the transport resource and seed it with `cookies`. */
  open(cookies: readonly SessionCookie[]): Promise<void>;

  /** One page retrieval. Must reject promptly once `signal` aborts. */
  retrieve(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse>;

  /** Populate and submit a login form; resolves with the settled response. */
  submitLogin(login: TransportLogin, signal: AbortSignal): Promise<TransportResponse>;

  /** The live session carrier (cookie jar or browser context). */
  session(): SessionHandle;

  /** Drop all session cookies. */
  clearCookies(): Promise<void>;

  /** Release the transport resource. Called at most once by the engine. */
  close(): Promise<void>;
}

/** Key used to compare cookie snapshots. */
export function cookieKey(cookie: SessionCookie): string {
  return `${cookie.domain}|${cookie.path}|${cookie.name}`;
}

/** Cookies in `after` that are new or whose value changed since `before`. */
export function diffCookies(
  before: readonly SessionCookie[],
  after: readonly SessionCookie[],
): SessionCookie[] {
  const previous = new Map(before.map((cookie) => [cookieKey(cookie), cookie.value]));
  return after.filter((cookie) => previous.get(cookieKey(cookie)) !== cookie.value);
}
