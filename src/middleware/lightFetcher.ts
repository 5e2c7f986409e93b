/**
 * lightFetcher.ts — TLS-impersonating HTTP transport for pages that don't need JS.
 *
 * got-scraping generates a Chrome-like TLS Client Hello and a matching header
 * set, so a plain GET looks like a desktop browser. Session state lives in a
 * tough-cookie jar that got reads and writes on every hop, redirects
 * included, which is what keeps a login's `Set-Cookie` on a 302 alive.
 *
 * got-scraping v4 is ESM-only, so it is loaded lazily on first use.
 */

import { randomUUID } from 'crypto';
import { Cookie, CookieJar } from 'tough-cookie';
import { Logger } from '../core/logger';
import { proxyUrlOf } from '../core/config';
import { parseLoginForm } from './formParser';
import { cookieKey, type Transport, type TransportLogin } from './transport';
import type {
  HttpMethod,
  ProxySettings,
  SessionCookie,
  SessionHandle,
  TransportRequest,
  TransportResponse,
} from '../core/types';

const logger = new Logger('LightFetcher');

let gotScrapingModule: typeof import('got-scraping') | null = null;

async function getGotScraping(): Promise<typeof import('got-scraping')> {
  if (!gotScrapingModule) {
    gotScrapingModule = await import('got-scraping');
  }
  return gotScrapingModule;
}

// ─── Single request ─────────────────────────────────────────

export interface LightFetchResult {
  /** URL after redirects. */
  url: string;
  body: string;
  statusCode: number;
  headers: Record<string, string>;
}

/** Shape got expects from a promise-based cookie jar. */
interface PromiseCookieJar {
  getCookieString: (url: string) => Promise<string>;
  setCookie: (rawCookie: string, url: string) => Promise<unknown>;
}

export interface LightFetchOptions {
  method?: HttpMethod;
  headers?: Record<string, string>;
  /** URL-encoded request body. */
  form?: Record<string, string>;
  timeout?: number;
  signal?: AbortSignal;
  cookieJar?: PromiseCookieJar;
  proxyUrl?: string;
}

/**
 * Fetch a URL with got-scraping. Non-2xx statuses are returned, not thrown;
 * the caller decides what they mean.
 */
export async function lightFetch(url: string, options: LightFetchOptions = {}): Promise<LightFetchResult> {
  logger.debug(`Light-fetching ${url}…`);

  const { gotScraping } = await getGotScraping();

  const response = await gotScraping({
    url,
    method: options.method ?? 'GET',
    headers: { ...options.headers },
    form: options.form,
    timeout: { request: options.timeout ?? 30_000 },
    signal: options.signal,
    cookieJar: options.cookieJar,
    proxyUrl: options.proxyUrl,
    followRedirect: true,
    throwHttpErrors: false,
    headerGeneratorOptions: {
      browsers: [{ name: 'chrome', minVersion: 130 }],
      devices: ['desktop'],
      operatingSystems: ['macos', 'windows'],
    },
  });

  const statusCode = response.statusCode ?? 0;
  logger.debug(`Light-fetch complete — HTTP ${statusCode} for ${url}`);

  return {
    url: response.url || url,
    body: String(response.body),
    statusCode,
    headers: flattenHeaders(response.headers),
  };
}

function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    flat[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
}

// ─── Session carrier ────────────────────────────────────────

/** Per-request view of the session jar. */
export interface CookieRecorder {
  jar: PromiseCookieJar;
  /** Cookies stored through `jar` so far, last write per cookie. */
  stored(): SessionCookie[];
}

/** Session handle of the light transport: a tough-cookie jar. */
export class CookieJarSession implements SessionHandle {
  readonly kind = 'light' as const;
  readonly id = randomUUID();
  readonly jar = new CookieJar();

  /** A got adapter over this jar that records the cookies one request stores. */
  recorder(): CookieRecorder {
    const stored = new Map<string, SessionCookie>();
    return {
      jar: {
        getCookieString: (url) => this.jar.getCookieString(url),
        setCookie: async (rawCookie, url) => {
          const cookie = await this.jar.setCookie(rawCookie, url, { ignoreError: true });
          if (cookie) {
            const record = toSessionCookie(cookie);
            stored.set(cookieKey(record), record);
          }
          return cookie;
        },
      },
      stored: () => [...stored.values()],
    };
  }

  async cookies(): Promise<SessionCookie[]> {
    const all = await this.jar.store.getAllCookies();
    return all.map(toSessionCookie);
  }

  async isEmpty(): Promise<boolean> {
    return (await this.cookies()).length === 0;
  }

  /** Put cookies straight into the store, skipping URL/domain validation. */
  async restore(cookies: readonly SessionCookie[]): Promise<void> {
    for (const cookie of cookies) {
      await this.jar.store.putCookie(fromSessionCookie(cookie));
    }
  }

  async clear(): Promise<void> {
    await this.jar.removeAllCookies();
  }
}

function toSessionCookie(cookie: Cookie): SessionCookie {
  return {
    name: cookie.key,
    value: cookie.value,
    domain: cookie.domain ?? '',
    path: cookie.path ?? '/',
    expires: cookie.expires instanceof Date ? Math.floor(cookie.expires.getTime() / 1000) : undefined,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
  };
}

function fromSessionCookie(cookie: SessionCookie): Cookie {
  return new Cookie({
    key: cookie.name,
    value: cookie.value,
    domain: cookie.domain.replace(/^\./, ''),
    path: cookie.path || '/',
    expires: cookie.expires === undefined ? 'Infinity' : new Date(cookie.expires * 1000),
    httpOnly: cookie.httpOnly ?? false,
    secure: cookie.secure ?? false,
  });
}

// ─── Transport ──────────────────────────────────────────────

export interface LightTransportOptions {
  proxy?: ProxySettings;
}

export class LightTransport implements Transport {
  readonly kind = 'light' as const;
  private readonly handle = new CookieJarSession();
  private readonly proxyUrl?: string;

  constructor(options: LightTransportOptions = {}) {
    this.proxyUrl = options.proxy?.enabled ? proxyUrlOf(options.proxy) : undefined;
  }

  async open(cookies: readonly SessionCookie[]): Promise<void> {
    await getGotScraping();
    await this.handle.restore(cookies);
    if (cookies.length > 0) {
      logger.info(`Restored ${cookies.length} cookie(s) into the HTTP session`);
    }
  }

  async retrieve(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse> {
    const recorder = this.handle.recorder();
    const result = await lightFetch(request.url, {
      method: request.method,
      headers: request.headers,
      form: request.form,
      timeout: request.timeoutMs,
      signal,
      cookieJar: recorder.jar,
      proxyUrl: this.proxyUrl,
    });
    return toResponse(result, recorder.stored());
  }

  async submitLogin(login: TransportLogin, signal: AbortSignal): Promise<TransportResponse> {
    const page = login.loginPage;
    const form = parseLoginForm(page.content, page.finalUrl, login.fieldMap, login.credentials);

    logger.info(
      `Submitting login form to ${form.action} (${Object.keys(form.fields).length} field(s)` +
        `${form.csrf ? ', CSRF token attached' : ''})`,
    );

    const headers = { ...login.headers, ...form.headers, referer: page.finalUrl };
    const target = form.method === 'GET' ? withQuery(form.action, form.fields) : form.action;

    const recorder = this.handle.recorder();
    const result = await lightFetch(target, {
      method: form.method,
      headers,
      form: form.method === 'POST' ? form.fields : undefined,
      timeout: login.timeoutMs,
      signal,
      cookieJar: recorder.jar,
      proxyUrl: this.proxyUrl,
    });
    return toResponse(result, recorder.stored());
  }

  session(): CookieJarSession {
    return this.handle;
  }

  async clearCookies(): Promise<void> {
    await this.handle.clear();
  }

  async close(): Promise<void> {
    // got keeps no per-transport pool; dropping the jar is all there is.
    await this.handle.clear();
  }
}

function toResponse(result: LightFetchResult, cookies: SessionCookie[]): TransportResponse {
  return {
    finalUrl: result.url,
    statusCode: result.statusCode,
    content: result.body,
    headers: result.headers,
    cookies,
  };
}

function withQuery(url: string, params: Record<string, string>): string {
  const parsed = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    parsed.searchParams.set(key, value);
  }
  return parsed.toString();
}
