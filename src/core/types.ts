/**
 * types.ts — Shared type definitions for the fetch and session layer.
 *
 * Transports, the engine, the negotiator and the credential store all agree
 * on the shapes below; nothing in here has behaviour.
 */

// ─── Transport selection ───────────────────────────────────

/** `light` = got-scraping HTTP client, `browser` = puppeteer page in a persistent context. */
export type TransportKind = 'light' | 'browser';

export type HttpMethod = 'GET' | 'POST';

// ─── Fetch request / result ────────────────────────────────

/** Outcome classification shared by results, errors and rate-controller reports. */
export type FetchStatus =
  | 'success'
  | 'client-error'
  | 'server-error'
  | 'timeout'
  | 'network-error'
  | 'cancelled';

export type FetchOutcome = 'success' | 'failure';

/** A single page-retrieval intent. */
export interface FetchRequest {
  /** Absolute URL, or a path resolved against the engine's base URL. */
  url: string;
  /** Extra query parameters merged into the URL. */
  params?: Record<string, string>;
  /** Must match the engine's transport when given. */
  transport?: TransportKind;
  /** Overrides the engine's default timeout (30 s). */
  timeoutMs?: number;
  method?: HttpMethod;
  /** URL-encoded body for POST requests (light transport). */
  form?: Record<string, string>;
  headers?: Record<string, string>;
}

/** A browser-independent cookie record, used for snapshots, deltas and persistence. */
export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix seconds; omitted for session cookies. */
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
}

export interface FetchResult {
  /** The URL that was requested after normalisation. */
  readonly url: string;
  /** The URL after redirects. */
  readonly finalUrl: string;
  readonly content: string;
  readonly statusCode: number;
  readonly status: FetchStatus;
  readonly transport: TransportKind;
  /** Cookies created or changed by this request. */
  readonly newCookies: readonly SessionCookie[];
  readonly elapsedMs: number;
}

// ─── Transport-level request / response ─────────────────────

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  form?: Record<string, string>;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface TransportResponse {
  finalUrl: string;
  statusCode: number;
  content: string;
  headers: Record<string, string>;
  /**
   * Cookies this response touched: stored from its `Set-Cookie` headers
   * (light) or visible to its page after navigation (browser).
   */
  cookies: SessionCookie[];
}

// ─── Session ───────────────────────────────────────────────

/**
 * Opaque carrier of authenticated state: a cookie jar for the light
 * transport, a persistent browser context for the browser transport.
 */
export interface SessionHandle {
  readonly id: string;
  readonly kind: TransportKind;
  cookies(): Promise<SessionCookie[]>;
  isEmpty(): Promise<boolean>;
}

/** Logical login fields mapped to locators (CSS selectors) in the login page. */
export interface FieldMap {
  username: string;
  password: string;
  /** Submit control; when absent the password field is submitted with Enter. */
  submit?: string;
  /** Explicit form endpoint, overriding the form's own `action`. */
  action?: string;
}

export interface Credentials {
  username: string;
  password: string;
  /** Storage preference: persist after an interactive prompt. */
  save: boolean;
}

export interface LoginSubmission {
  /** The already-fetched login page. */
  loginPage: FetchResult;
  fieldMap: FieldMap;
  credentials: Credentials;
  timeoutMs?: number;
}

// ─── Network options ───────────────────────────────────────

export interface ProxySettings {
  enabled: boolean;
  /** e.g. `http://proxy.internal:3128` */
  server: string;
  username?: string;
  password?: string;
}
