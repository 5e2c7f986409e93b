/**
 * browserManager.ts — Owns one Chromium process and one isolated context.
 *
 * Each FetchEngine on the browser transport gets its own BrowserManager: a
 * single browser process, a single persistent BrowserContext (the session),
 * and short-lived pages opened in that context per request. The context is
 * what carries cookies and storage from a login into later navigations.
 *
 * Chromium is launched lazily on the first page request, through
 * puppeteer-extra with the stealth plugin.
 */

import puppeteer from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, BrowserContext, Page } from 'puppeteer-core';
import { Logger } from './logger';
import type { ProxySettings } from './types';

const logger = new Logger('BrowserManager');

// puppeteer-extra plugins must be registered before the first `launch()`.
puppeteer.use(StealthPlugin());

// Randomised accept-language pool; one value per manager.
const ACCEPT_LANGUAGES = [
  'en-US,en;q=0.9',
  'en-GB,en;q=0.9',
  'en-US,en;q=0.9,fr;q=0.8',
  'en-US,en;q=0.9,de;q=0.8',
  'en-CA,en;q=0.9',
];

export interface BrowserManagerOptions {
  /** Chrome/Chromium binary; puppeteer-core ships none, so launches need one. */
  executablePath?: string;
  headless?: boolean;
  proxy?: ProxySettings;
  /** Fixed User-Agent for every page (rotation picks one per manager). */
  userAgent?: string;
  random?: () => number;
}

export class BrowserManager {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private launching: Promise<BrowserContext> | null = null;
  private readonly acceptLang: string;

  constructor(private readonly options: BrowserManagerOptions = {}) {
    const random = options.random ?? Math.random;
    this.acceptLang = ACCEPT_LANGUAGES[Math.floor(random() * ACCEPT_LANGUAGES.length)];
  }

  /** The persistent context, or null before the first launch / after close. */
  get currentContext(): BrowserContext | null {
    return this.context;
  }

  // ── Core API ───────────────────────────────────────────

  /** Launch the browser (once) and return the persistent context. */
  async ensureContext(): Promise<BrowserContext> {
    if (this.context && this.browser?.connected) return this.context;
    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = null;
      });
    }
    return this.launching;
  }

  /**
   * Open a page in the persistent context with the session's viewport,
   * headers, User-Agent and proxy credentials applied. The caller closes it.
   */
  async newPage(headers: Record<string, string> = {}): Promise<Page> {
    const context = await this.ensureContext();
    const page = await context.newPage();

    await page.setViewport({ width: 1366, height: 768 });
    await page.setExtraHTTPHeaders({ 'accept-language': this.acceptLang, ...headers });

    if (this.options.userAgent) {
      await page.setUserAgent(this.options.userAgent);
    }

    const proxy = this.options.proxy;
    if (proxy?.enabled && proxy.username) {
      await page.authenticate({ username: proxy.username, password: proxy.password ?? '' });
    }

    return page;
  }

  /** Replace the persistent context with a fresh one (drops cookies and storage). */
  async resetContext(): Promise<void> {
    if (!this.browser || !this.context) return;
    const stale = this.context;
    this.context = await this.browser.createBrowserContext();
    await stale.close();
    logger.info('Browser context reset — session state discarded');
  }

  /** Close the context and terminate Chromium. Safe to call repeatedly. */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.context = null;
    if (browser) {
      await browser.close();
      logger.info('Browser closed');
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async launch(): Promise<BrowserContext> {
    const args = [
      '--no-sandbox',
      '--disable-setuid-sandbox',
      '--disable-dev-shm-usage',
      `--lang=${this.acceptLang.split(',')[0]}`,
    ];
    if (this.options.proxy?.enabled) {
      args.push(`--proxy-server=${this.options.proxy.server}`);
    }

    logger.info(`Launching browser (lang=${this.acceptLang.split(',')[0]})`);
    const browser = await puppeteer.launch({
      headless: this.options.headless ?? true,
      executablePath: this.options.executablePath,
      args,
    });
    this.browser = browser;
    this.context = await browser.createBrowserContext();
    return this.context;
  }
}
