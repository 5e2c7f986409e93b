/**
 * browserFetcher.ts — Full-browser transport.
 *
 * Every retrieval opens a page in the manager's persistent context,
 * navigates, waits for network idle and reads the rendered document. Cookies
 * seen after each navigation are captured into the session handle so they
 * can be reported as deltas, persisted, and replayed into a new context.
 */

import { randomUUID } from 'crypto';
import type { Cookie, CookieParam, Page } from 'puppeteer-core';
import { BrowserManager, type BrowserManagerOptions } from '../core/browserManager';
import { Logger } from '../core/logger';
import { ConfigurationError, describeError } from '../core/errors';
import { cookieKey, type Transport, type TransportLogin } from './transport';
import type {
  SessionCookie,
  SessionHandle,
  TransportRequest,
  TransportResponse,
} from '../core/types';

const logger = new Logger('BrowserFetcher');

/** Delay between keystrokes when filling login fields. */
const TYPING_DELAY_MS = 35;

/** Longest wait for a login submit to navigate or go quiet. */
const LOGIN_SETTLE_MS = 10_000;

/** Quiet period that counts as network idle after a login submit. */
const NETWORK_IDLE_MS = 500;

// ─── Session carrier ────────────────────────────────────────

/** Session handle of the browser transport: the persistent BrowserContext. */
export class BrowserContextSession implements SessionHandle {
  readonly kind = 'browser' as const;
  readonly id = randomUUID();
  private readonly captured = new Map<string, SessionCookie>();

  constructor(private readonly manager: BrowserManager) {}

  /** The live context; null until the first navigation. */
  get context() {
    return this.manager.currentContext;
  }

  async cookies(): Promise<SessionCookie[]> {
    return [...this.captured.values()];
  }

  async isEmpty(): Promise<boolean> {
    return this.captured.size === 0;
  }

  /** Record and return the cookies visible to `page` after a navigation. */
  async capture(page: Page): Promise<SessionCookie[]> {
    const records = (await page.cookies()).map(fromPuppeteerCookie);
    for (const record of records) {
      this.captured.set(cookieKey(record), record);
    }
    return records;
  }

  remember(cookies: readonly SessionCookie[]): void {
    for (const cookie of cookies) {
      this.captured.set(cookieKey(cookie), cookie);
    }
  }

  forget(): void {
    this.captured.clear();
  }
}

function fromPuppeteerCookie(cookie: Cookie): SessionCookie {
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires > 0 ? Math.floor(cookie.expires) : undefined,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
  };
}

function toCookieParam(cookie: SessionCookie): CookieParam {
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
  };
}

// ─── Transport ──────────────────────────────────────────────

export class BrowserTransport implements Transport {
  readonly kind = 'browser' as const;
  private readonly manager: BrowserManager;
  private readonly handle: BrowserContextSession;
  /** Cookies still to be written into the context (restored or re-seeded). */
  private pending: SessionCookie[] = [];

  constructor(options: BrowserManagerOptions = {}, manager?: BrowserManager) {
    this.manager = manager ?? new BrowserManager(options);
    this.handle = new BrowserContextSession(this.manager);
  }

  async open(cookies: readonly SessionCookie[]): Promise<void> {
    await this.manager.ensureContext();
    this.pending = [...cookies];
    this.handle.remember(cookies);
    if (cookies.length > 0) {
      logger.info(`Restoring ${cookies.length} cookie(s) into the browser context`);
    }
  }

  async retrieve(request: TransportRequest, signal: AbortSignal): Promise<TransportResponse> {
    if (request.method !== 'GET') {
      throw new ConfigurationError('The browser transport only performs GET navigations', {
        url: request.url,
        method: request.method,
      });
    }

    return this.withPage(request.headers, signal, async (page) => {
      const response = await page.goto(request.url, {
        waitUntil: 'networkidle0',
        timeout: request.timeoutMs,
      });
      return this.read(page, response?.status() ?? 200, response?.headers() ?? {});
    });
  }

  async submitLogin(login: TransportLogin, signal: AbortSignal): Promise<TransportResponse> {
    const { fieldMap, credentials } = login;

    return this.withPage(login.headers, signal, async (page) => {
      await page.goto(login.loginPage.finalUrl, {
        waitUntil: 'networkidle0',
        timeout: login.timeoutMs,
      });

      await page.waitForSelector(fieldMap.username, { timeout: login.timeoutMs });
      await page.type(fieldMap.username, credentials.username, { delay: TYPING_DELAY_MS });
      await page.type(fieldMap.password, credentials.password, { delay: TYPING_DELAY_MS });

      // Armed before submitting so a fast redirect is not missed.
      const navigation = page
        .waitForNavigation({ waitUntil: 'networkidle0', timeout: login.timeoutMs })
        .then((response) => response?.status() ?? 200)
        .catch((err: unknown) => {
          logger.debug(`No navigation after login submit (${describeError(err)})`);
          return null;
        });

      if (fieldMap.submit) {
        await page.click(fieldMap.submit);
      } else {
        await page.focus(fieldMap.password);
        await page.keyboard.press('Enter');
      }

      // AJAX forms update the page in place: settle on network idle instead,
      // well inside the request deadline.
      const settleMs = Math.min(LOGIN_SETTLE_MS, Math.floor(login.timeoutMs / 2));
      const settled = page
        .waitForNetworkIdle({ idleTime: NETWORK_IDLE_MS, timeout: settleMs })
        .then(() => null)
        .catch((err: unknown) => {
          logger.debug(`Network not idle after login submit (${describeError(err)})`);
          return null;
        });

      const statusCode = (await Promise.race([navigation, settled])) ?? 200;
      return this.read(page, statusCode, {});
    });
  }

  session(): BrowserContextSession {
    return this.handle;
  }

  async clearCookies(): Promise<void> {
    this.pending = [];
    this.handle.forget();
    await this.manager.resetContext();
  }

  async close(): Promise<void> {
    await this.manager.close();
  }

  // ── Internals ──────────────────────────────────────────

  /**
   * Run `fn` with a fresh page, closing it afterwards. Aborting `signal`
   * closes the page early, which makes any pending navigation reject.
   */
  private async withPage<T>(
    headers: Record<string, string>,
    signal: AbortSignal,
    fn: (page: Page) => Promise<T>,
  ): Promise<T> {
    const page = await this.manager.newPage(headers);

    const closePage = async () => {
      if (page.isClosed()) return;
      try {
        await page.close();
      } catch (err) {
        logger.debug(`Page close failed: ${describeError(err)}`);
      }
    };
    const onAbort = () => {
      void closePage();
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      if (signal.aborted) {
        throw new Error('Navigation aborted before it started');
      }
      if (this.pending.length > 0) {
        await page.setCookie(...this.pending.map(toCookieParam));
        this.pending = [];
      }
      return await fn(page);
    } finally {
      signal.removeEventListener('abort', onAbort);
      await closePage();
    }
  }

  private async read(
    page: Page,
    statusCode: number,
    headers: Record<string, string>,
  ): Promise<TransportResponse> {
    const content = await page.content();
    const cookies = await this.handle.capture(page);
    return { finalUrl: page.url(), statusCode, content, headers, cookies };
  }
}
