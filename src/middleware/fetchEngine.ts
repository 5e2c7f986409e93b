/**
 * fetchEngine.ts — Single entry point for page retrieval.
 *
 * A FetchEngine owns exactly one transport (light HTTP or full browser),
 * chosen at construction. Every request goes through the same pipeline:
 *
 *   normalise URL → robots.txt (optional) → RateController.admit
 *     → transport retrieval under a deadline → classify → report → result
 *
 * Failures are converted to typed errors and reported to the RateController
 * before they reach the caller. Nothing here retries.
 */

import { Logger } from '../core/logger';
import {
  ConfigurationError,
  CrawlerError,
  FetchCancelledError,
  FetchTimeoutError,
  HttpStatusError,
  NetworkError,
  RobotsDisallowedError,
  describeError,
} from '../core/errors';
import { createDeadline } from '../core/timing';
import type { CrawlerConfig, RateLimitInput } from '../core/config';
import { loadSavedCookies, saveCookies } from '../agents/cookieFile';
import { RateController, targetOf } from './rateController';
import { RobotsPolicy, classifyStatus, isSuccessStatus, pickUserAgent, type RobotsLoader } from './compliance';
import { LightTransport, lightFetch } from './lightFetcher';
import { BrowserTransport } from './browserFetcher';
import { diffCookies, type Transport } from './transport';
import type {
  FetchRequest,
  FetchResult,
  LoginSubmission,
  ProxySettings,
  SessionCookie,
  SessionHandle,
  TransportKind,
  TransportResponse,
} from '../core/types';

const logger = new Logger('FetchEngine');

/** Default per-request timeout. */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Product token matched against robots.txt groups. */
const ROBOTS_USER_AGENT = 'session-crawler';

export interface FetchEngineOptions {
  /** Authority that relative URLs are resolved against. */
  baseUrl: string;
  transport?: TransportKind;
  /** Shared controller; a private one is built from `rateLimit` when omitted. */
  rateController?: RateController;
  rateLimit?: RateLimitInput;
  proxy?: ProxySettings;
  /** Sent with every request. */
  headers?: Record<string, string>;
  /** Pick a random desktop User-Agent for the browser context. */
  rotateUserAgent?: boolean;
  timeoutMs?: number;
  browser?: { executablePath?: string; headless?: boolean };
  /** Cookies seeded into the session on initialize(). */
  cookies?: readonly SessionCookie[];
  /** Cookie snapshot restored on initialize() and written on close(). */
  sessionFile?: string;
  cookieTtlHours?: number;
  respectRobotsTxt?: boolean;
  /** Overrides how robots.txt is fetched (defaults to an admitted light request). */
  robotsLoader?: RobotsLoader;
  /** Pre-built transport; takes precedence over `transport`. */
  transportImpl?: Transport;
  random?: () => number;
}

type EngineState = 'created' | 'initializing' | 'ready' | 'closed';

export class FetchEngine {
  readonly kind: TransportKind;
  readonly baseUrl: string;
  readonly rateController: RateController;
  private readonly transport: Transport;
  private readonly options: FetchEngineOptions;
  private readonly timeoutMs: number;
  private readonly robots: RobotsPolicy | null;
  /** Aborted by close(); every admission and retrieval observes it. */
  private readonly closer = new AbortController();
  private state: EngineState = 'created';
  private initializing: Promise<void> | null = null;
  private closing: Promise<void> | null = null;

  constructor(options: FetchEngineOptions) {
    let base: URL;
    try {
      base = new URL(options.baseUrl);
    } catch {
      throw new ConfigurationError(`Base URL is not absolute: ${options.baseUrl}`, {
        baseUrl: options.baseUrl,
      });
    }

    this.options = options;
    this.baseUrl = base.toString();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.rateController = options.rateController ?? new RateController(options.rateLimit);
    this.transport = options.transportImpl ?? this.createTransport(options);
    this.kind = this.transport.kind;

    this.robots = options.respectRobotsTxt
      ? new RobotsPolicy(ROBOTS_USER_AGENT, options.robotsLoader ?? ((url) => this.loadRobots(url)))
      : null;
  }

  /** Engine wired from environment-driven configuration. */
  static fromConfig(config: CrawlerConfig, overrides: Partial<FetchEngineOptions> = {}): FetchEngine {
    return new FetchEngine({
      baseUrl: config.baseUrl,
      transport: config.transport,
      rateLimit: config.rateLimit,
      proxy: config.proxy,
      timeoutMs: config.timeoutMs,
      browser: { executablePath: config.browserExecutablePath },
      sessionFile: config.sessionFile,
      cookieTtlHours: config.cookieTtlHours,
      respectRobotsTxt: config.respectRobotsTxt,
      ...overrides,
    });
  }

  // ── Lifecycle ──────────────────────────────────────────

  /**
   * Open the transport and restore session cookies. Concurrent and repeated
   * calls share the first call's work.
   */
  initialize(): Promise<void> {
    if (this.state === 'closed') {
      return Promise.reject(new FetchCancelledError('Engine is closed'));
    }
    if (!this.initializing) {
      this.state = 'initializing';
      this.initializing = this.open().then(
        () => {
          if (this.state === 'initializing') this.state = 'ready';
        },
        (err: unknown) => {
          this.initializing = null;
          if (this.state === 'initializing') this.state = 'created';
          throw err;
        },
      );
    }
    return this.initializing;
  }

  /**
   * Abort in-flight work, save the cookie snapshot and release the transport.
   * Safe before initialize() and on repeat.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  get isClosed(): boolean {
    return this.state === 'closed';
  }

  /** The live session carrier. */
  get session(): SessionHandle {
    return this.transport.session();
  }

  // ── Retrieval ──────────────────────────────────────────

  async fetch(request: FetchRequest): Promise<FetchResult> {
    if (request.transport && request.transport !== this.kind) {
      throw new ConfigurationError(
        `Engine uses the ${this.kind} transport; a ${request.transport} request needs its own engine`,
        { url: request.url },
      );
    }

    const url = this.normalize(request.url, request.params);
    await this.initialize();

    if (this.robots && !(await this.robots.isAllowed(url))) {
      throw new RobotsDisallowedError(url, ROBOTS_USER_AGENT);
    }

    const method = request.method ?? (request.form ? 'POST' : 'GET');
    const headers = { ...this.options.headers, ...request.headers };
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;

    return this.perform(url, timeoutMs, (signal) =>
      this.transport.retrieve({ url, method, form: request.form, headers, timeoutMs }, signal),
    );
  }

  /**
   * Fill and submit a login form found on an already fetched page. The
   * submission is admitted and reported like any other request.
   */
  async submitLogin(submission: LoginSubmission): Promise<FetchResult> {
    const url = submission.loginPage.finalUrl;
    await this.initialize();

    const timeoutMs = submission.timeoutMs ?? this.timeoutMs;
    return this.perform(url, timeoutMs, (signal) =>
      this.transport.submitLogin(
        {
          loginPage: submission.loginPage,
          fieldMap: submission.fieldMap,
          credentials: submission.credentials,
          headers: { ...this.options.headers },
          timeoutMs,
        },
        signal,
      ),
    );
  }

  /** Drop all session cookies; the next request starts unauthenticated. */
  async invalidateSession(): Promise<void> {
    if (this.state !== 'ready') return;
    await this.transport.clearCookies();
    logger.info('Session invalidated');
  }

  /** Write the current cookies to `sessionFile`. False when not configured or on failure. */
  async saveSession(): Promise<boolean> {
    const path = this.options.sessionFile;
    if (!path || this.state === 'created') return false;
    return saveCookies(path, await this.transport.session().cookies());
  }

  // ── Internals ──────────────────────────────────────────

  private createTransport(options: FetchEngineOptions): Transport {
    const kind = options.transport ?? 'light';
    if (kind === 'light') {
      return new LightTransport({ proxy: options.proxy });
    }
    return new BrowserTransport({
      executablePath: options.browser?.executablePath,
      headless: options.browser?.headless,
      proxy: options.proxy,
      userAgent: options.rotateUserAgent ? pickUserAgent(options.random) : undefined,
      random: options.random,
    });
  }

  private async open(): Promise<void> {
    const seeded = [...(this.options.cookies ?? [])];
    if (this.options.sessionFile) {
      seeded.push(
        ...(await loadSavedCookies(this.options.sessionFile, this.options.cookieTtlHours ?? 24)),
      );
    }

    logger.info(`Opening ${this.kind} transport for ${this.baseUrl}`);
    await this.transport.open(seeded);
  }

  private async shutdown(): Promise<void> {
    const wasOpened = this.state !== 'created';
    this.state = 'closed';
    this.closer.abort(new FetchCancelledError('Engine closed'));

    if (!wasOpened) return;

    // Let a pending initialize() settle before tearing the transport down.
    await this.initializing?.catch((err: unknown) => {
      logger.warn(`Initialization failed before close: ${describeError(err)}`);
    });

    const path = this.options.sessionFile;
    if (path) {
      await saveCookies(path, await this.transport.session().cookies());
    }

    await this.transport.close();
    logger.info(`Closed ${this.kind} transport`);
  }

  /** Resolve `raw` against the base URL and merge `params` into its query. */
  private normalize(raw: string, params?: Record<string, string>): string {
    let url: URL;
    try {
      url = new URL(raw, this.baseUrl);
    } catch {
      throw new ConfigurationError(`Cannot resolve URL "${raw}" against ${this.baseUrl}`, { url: raw });
    }
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  /**
   * Admission, deadline, classification and reporting shared by fetch() and
   * submitLogin(). `run` receives a signal that aborts on timeout or close.
   */
  private async perform(
    url: string,
    timeoutMs: number,
    run: (signal: AbortSignal) => Promise<TransportResponse>,
  ): Promise<FetchResult> {
    if (this.state === 'closed') {
      throw new FetchCancelledError('Engine is closed', { url });
    }

    const target = targetOf(url);
    // Admission only observes close(): a long cool-down is not a timeout.
    const permit = await this.rateController.admit(target, this.closer.signal);
    const started = Date.now();
    const deadline = createDeadline(timeoutMs, this.closer.signal);
    const session = this.transport.session();

    try {
      const before = await session.cookies();
      const response = await run(deadline.signal);

      if (!isSuccessStatus(response.statusCode)) {
        throw new HttpStatusError(url, response.statusCode, response.content);
      }

      const result: FetchResult = Object.freeze({
        url,
        finalUrl: response.finalUrl,
        content: response.content,
        statusCode: response.statusCode,
        status: classifyStatus(response.statusCode),
        transport: this.kind,
        newCookies: Object.freeze(diffCookies(before, response.cookies)),
        elapsedMs: Date.now() - started,
      });

      this.rateController.report(target, 'success');
      logger.info(`Fetched ${url} (HTTP ${result.statusCode}, ${result.elapsedMs} ms)`);
      return result;
    } catch (err) {
      const typed = this.toTypedError(err, url, timeoutMs, deadline.timedOut());
      this.rateController.report(target, 'failure');
      logger.warn(`Fetch failed for ${url} [${typed.status}]: ${typed.message}`);
      throw typed;
    } finally {
      deadline.dispose();
      permit.release();
    }
  }

  private toTypedError(err: unknown, url: string, timeoutMs: number, timedOut: boolean): CrawlerError {
    if (err instanceof CrawlerError && !(err instanceof FetchCancelledError)) {
      return err;
    }
    if (timedOut || isTimeoutLike(err)) {
      return new FetchTimeoutError(url, timeoutMs, err);
    }
    if (this.closer.signal.aborted || err instanceof FetchCancelledError) {
      return new FetchCancelledError(`Fetch of ${url} cancelled: engine closed`, { url });
    }
    return new NetworkError(`Network failure fetching ${url}: ${describeError(err)}`, { url }, err);
  }

  /** robots.txt through the light client, paced like any other request. */
  private async loadRobots(robotsUrl: string): Promise<string | null> {
    const target = targetOf(robotsUrl);
    const permit = await this.rateController.admit(target, this.closer.signal);
    const deadline = createDeadline(this.timeoutMs, this.closer.signal);
    try {
      const response = await lightFetch(robotsUrl, {
        headers: { ...this.options.headers },
        timeout: this.timeoutMs,
        signal: deadline.signal,
      });
      return isSuccessStatus(response.statusCode) ? response.body : null;
    } finally {
      deadline.dispose();
      permit.release();
    }
  }
}

function isTimeoutLike(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name === 'TimeoutError') return true;
  return 'code' in err && err.code === 'ETIMEDOUT';
}
