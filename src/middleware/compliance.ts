/**
 * compliance.ts — Politeness helpers layered on top of pacing.
 *
 *   • robots.txt checks, cached per origin for the lifetime of the policy.
 *   • A small pool of desktop User-Agents for browser contexts when rotation
 *     is enabled (the light transport generates its own headers).
 *   • Status classification shared by both transports.
 */

import robotsParser from 'robots-parser';
import { Logger } from '../core/logger';
import type { FetchStatus } from '../core/types';

const logger = new Logger('Compliance');

// ─── User-Agent pool ────────────────────────────────────────

const DESKTOP_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/130.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/130.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36',
];

/** Pick a desktop Chrome User-Agent. */
export function pickUserAgent(random: () => number = Math.random): string {
  return DESKTOP_USER_AGENTS[Math.floor(random() * DESKTOP_USER_AGENTS.length)];
}

// ─── Status classification ──────────────────────────────────

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/** Map an HTTP status to the outcome classification. */
export function classifyStatus(statusCode: number): FetchStatus {
  if (isSuccessStatus(statusCode)) return 'success';
  return statusCode >= 500 ? 'server-error' : 'client-error';
}

// ─── robots.txt ─────────────────────────────────────────────

/** Loads the raw robots.txt body, or null when there is none (non-200, network error). */
export type RobotsLoader = (robotsUrl: string) => Promise<string | null>;

type Robots = ReturnType<typeof robotsParser>;

/**
 * Per-origin robots.txt cache. A missing or unreachable robots.txt means
 * "no restrictions" (RFC 9309).
 */
export class RobotsPolicy {
  private readonly cache = new Map<string, Robots | null>();

  constructor(
    private readonly userAgent: string,
    private readonly load: RobotsLoader,
  ) {}

  async isAllowed(url: string): Promise<boolean> {
    let origin: string;
    try {
      origin = new URL(url).origin;
    } catch {
      // Unparseable URL: let the fetch layer reject it.
      return true;
    }

    let robots = this.cache.get(origin);
    if (robots === undefined) {
      robots = await this.fetchRobots(origin);
      this.cache.set(origin, robots);
    }

    if (!robots) return true;

    const allowed = robots.isAllowed(url, this.userAgent) ?? true;
    if (!allowed) {
      logger.warn(`robots.txt disallows ${url} for UA "${this.userAgent}"`);
    }
    return allowed;
  }

  clear(): void {
    this.cache.clear();
  }

  private async fetchRobots(origin: string): Promise<Robots | null> {
    const robotsUrl = `${origin}/robots.txt`;
    try {
      const body = await this.load(robotsUrl);
      return body === null ? null : robotsParser(robotsUrl, body);
    } catch (err) {
      logger.warn(
        `Could not fetch robots.txt for ${origin} — assuming allowed ` +
          `(${err instanceof Error ? err.message : String(err)})`,
      );
      return null;
    }
  }
}
