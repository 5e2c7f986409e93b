/**
 * session-crawler — rate-controlled, session-aware page fetching.
 */

export * from './middleware';
export * from './agents';
export * from './scrapers';

export { CrawlRunner } from './crawlRunner';
export type { CrawlLogin, CrawlReport, CrawlRunnerOptions, CrawlStats, PageOutcome } from './crawlRunner';

export { BrowserManager } from './core/browserManager';
export type { BrowserManagerOptions } from './core/browserManager';
export { Logger, resolveLogLevel } from './core/logger';
export type { LogLevel } from './core/logger';
export {
  loadCrawlerConfig,
  parseFieldMap,
  parseProxySettings,
  parseRateLimitSettings,
  proxyUrlOf,
  DEFAULT_CREDENTIALS_FILE,
} from './core/config';
export type { CrawlerConfig, RateLimitInput, RateLimitSettings } from './core/config';
export * from './core/errors';
export { sleep, createDeadline } from './core/timing';
export type { Deadline } from './core/timing';
export type * from './core/types';
