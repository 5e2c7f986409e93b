/**
 * middleware/index.ts — Barrel export for the fetch layer.
 */

// ── Engine ──────────────────────────────────────────────────
export { FetchEngine, DEFAULT_TIMEOUT_MS } from './fetchEngine';
export type { FetchEngineOptions } from './fetchEngine';

// ── Pacing ──────────────────────────────────────────────────
export { RateController, targetOf } from './rateController';
export type { Permit, RateControllerHooks, TargetState } from './rateController';

// ── Transports ──────────────────────────────────────────────
export { cookieKey, diffCookies } from './transport';
export type { Transport, TransportLogin } from './transport';
export { LightTransport, CookieJarSession, lightFetch } from './lightFetcher';
export type { LightFetchOptions, LightFetchResult, LightTransportOptions } from './lightFetcher';
export { BrowserTransport, BrowserContextSession } from './browserFetcher';

// ── Login forms ─────────────────────────────────────────────
export { parseLoginForm, extractCsrfToken } from './formParser';
export type { CsrfToken, ParsedLoginForm } from './formParser';

// ── Compliance ──────────────────────────────────────────────
export { RobotsPolicy, pickUserAgent, classifyStatus, isSuccessStatus } from './compliance';
export type { RobotsLoader } from './compliance';
