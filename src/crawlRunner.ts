/**
 * crawlRunner.ts — Orchestrates one crawl over a list of URLs.
 *
 *   1. LOGIN   → SessionNegotiator (optional; skipped when a saved session was restored)
 *   2. FETCH   → FetchEngine, all URLs concurrently; the RateController paces them
 *   3. EXTRACT → the site adapter classifies each page and extracts records
 *   4. REPORT  → per-page outcomes plus run statistics
 *
 * A failed page is recorded and the run continues. Nothing is retried here;
 * the caller can re-run the failed URLs.
 */

import { Logger } from './core/logger';
import { CrawlerError, describeError } from './core/errors';
import { SessionNegotiator } from './agents/sessionNegotiator';
import { extractPage, type ExtractedRecord, type PageType, type SiteAdapter } from './scrapers/baseAdapter';
import type { CredentialStore } from './agents/credentialStore';
import type { FetchEngine } from './middleware/fetchEngine';
import type { Credentials, FetchStatus } from './core/types';

const logger = new Logger('CrawlRunner');

export interface CrawlLogin {
  loginUrl: string;
  fieldMap: unknown;
  /** Explicit credentials; otherwise resolved from the store under `credentialKey`. */
  credentials?: Credentials;
  credentialKey?: string;
  /** Log in even when the session already carries restored cookies. */
  force?: boolean;
}

export interface CrawlRunnerOptions {
  engine: FetchEngine;
  adapter: SiteAdapter;
  login?: CrawlLogin;
  credentialStore?: CredentialStore;
  /** Defaults to one that defers to the adapter's verifyLogin. */
  negotiator?: SessionNegotiator;
}

export interface PageOutcome {
  url: string;
  finalUrl?: string;
  pageType?: PageType;
  records: ExtractedRecord[];
  error?: { code: string; status: FetchStatus | 'extraction-error'; message: string };
}

export interface CrawlStats {
  pagesProcessed: number;
  itemsExtracted: number;
  errors: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface CrawlReport {
  pages: PageOutcome[];
  stats: CrawlStats;
}

export class CrawlRunner {
  private readonly negotiator: SessionNegotiator;

  constructor(private readonly options: CrawlRunnerOptions) {
    const { adapter } = options;
    this.negotiator =
      options.negotiator ??
      new SessionNegotiator({
        credentialStore: options.credentialStore,
        verifyLogin: adapter.verifyLogin ? (result) => adapter.verifyLogin?.(result) : undefined,
      });
  }

  async run(urls: readonly string[]): Promise<CrawlReport> {
    const { engine, adapter } = this.options;
    const started = Date.now();

    logger.info(`Starting crawl of ${urls.length} URL(s) with adapter "${adapter.id}"`);
    await engine.initialize();

    if (this.options.login) {
      await this.authenticate(this.options.login);
    }

    const settled = await Promise.allSettled(urls.map((url) => this.processPage(url)));
    const pages = settled.map((entry, i): PageOutcome =>
      entry.status === 'fulfilled' ? entry.value : failedPage(urls[i], entry.reason),
    );

    const finished = Date.now();
    const stats: CrawlStats = {
      pagesProcessed: pages.filter((page) => !page.error).length,
      itemsExtracted: pages.reduce((sum, page) => sum + page.records.length, 0),
      errors: pages.filter((page) => page.error).length,
      startedAt: new Date(started).toISOString(),
      finishedAt: new Date(finished).toISOString(),
      durationMs: finished - started,
    };

    logger.info(
      `Crawl complete — ${stats.pagesProcessed} page(s), ${stats.itemsExtracted} item(s), ` +
        `${stats.errors} error(s) in ${stats.durationMs} ms`,
    );
    return { pages, stats };
  }

  // ── Stages ─────────────────────────────────────────────

  private async authenticate(login: CrawlLogin): Promise<void> {
    const { engine } = this.options;

    if (!login.force && !(await engine.session.isEmpty())) {
      logger.info('Restored session found — skipping login');
      return;
    }

    if (login.credentials) {
      await this.negotiator.login(engine, login.loginUrl, login.fieldMap, login.credentials);
      return;
    }
    await this.negotiator.loginWithStore(
      engine,
      login.loginUrl,
      login.fieldMap,
      login.credentialKey ?? new URL(login.loginUrl, engine.baseUrl).host,
    );
  }

  private async processPage(url: string): Promise<PageOutcome> {
    const result = await this.options.engine.fetch({ url });

    try {
      const { pageType, records } = await extractPage(this.options.adapter, result.content, result.finalUrl);
      logger.info(`Extracted ${records.length} record(s) from ${result.finalUrl} (${pageType})`);
      return { url, finalUrl: result.finalUrl, pageType, records };
    } catch (err) {
      logger.warn(`Extraction failed for ${result.finalUrl}: ${describeError(err)}`);
      return {
        url,
        finalUrl: result.finalUrl,
        records: [],
        error: { code: 'EXTRACTION_FAILED', status: 'extraction-error', message: describeError(err) },
      };
    }
  }
}

function failedPage(url: string, reason: unknown): PageOutcome {
  if (reason instanceof CrawlerError) {
    return { url, records: [], error: { code: reason.code, status: reason.status, message: reason.message } };
  }
  return { url, records: [], error: { code: 'UNKNOWN', status: 'network-error', message: describeError(reason) } };
}
