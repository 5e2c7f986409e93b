/**
 * errors.ts — Typed failures surfaced by the fetch and session layer.
 *
 * Every error carries a stable `code` plus a `status` classification so the
 * orchestration layer can decide whether to retry, re-authenticate, or skip
 * without string-matching messages.
 */

import type { FetchStatus } from './types';

export class CrawlerError extends Error {
  /** Outcome classification reported alongside the error. */
  readonly status: FetchStatus;

  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
    options?: { cause?: unknown; status?: FetchStatus },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.status = options?.status ?? 'network-error';
    Error.captureStackTrace(this, this.constructor);
  }
}

// ─── Transport failures ─────────────────────────────────────

/** Connection, DNS or TLS failure — no HTTP response was received. */
export class NetworkError extends CrawlerError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'NETWORK_ERROR', details, { cause, status: 'network-error' });
  }
}

/** The server answered with a non-2xx status. The raw status and body are kept. */
export class HttpStatusError extends CrawlerError {
  readonly statusCode: number;
  readonly body: string;

  constructor(url: string, statusCode: number, body = '') {
    super(
      `HTTP ${statusCode} when fetching ${url}`,
      'HTTP_STATUS_ERROR',
      { url, statusCode },
      { status: statusCode >= 500 ? 'server-error' : 'client-error' },
    );
    this.statusCode = statusCode;
    this.body = body;
  }
}

export class FetchTimeoutError extends CrawlerError {
  constructor(url: string, timeoutMs: number, cause?: unknown) {
    super(
      `Timed out after ${timeoutMs} ms fetching ${url}`,
      'FETCH_TIMEOUT',
      { url, timeoutMs },
      { cause, status: 'timeout' },
    );
  }
}

/** The engine was closed (or the caller aborted) while the request was pending. */
export class FetchCancelledError extends CrawlerError {
  constructor(message = 'Fetch cancelled', details?: Record<string, unknown>) {
    super(message, 'FETCH_CANCELLED', details, { status: 'cancelled' });
  }
}

export class RobotsDisallowedError extends CrawlerError {
  constructor(url: string, userAgent: string) {
    super(
      `robots.txt disallows ${url} for "${userAgent}"`,
      'ROBOTS_DISALLOWED',
      { url, userAgent },
      { status: 'client-error' },
    );
  }
}

// ─── Session failures ───────────────────────────────────────

export class AuthenticationError extends CrawlerError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'AUTHENTICATION_FAILED', details, { cause, status: 'client-error' });
  }
}

/** No credential source produced a value and prompting is not allowed. */
export class CredentialUnavailableError extends AuthenticationError {
  constructor(key: string) {
    super(`No credentials available for "${key}"`, { key });
    this.code = 'CREDENTIAL_UNAVAILABLE';
  }
}

// ─── Configuration ──────────────────────────────────────────

export class ConfigurationError extends CrawlerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details, { status: 'client-error' });
  }
}

/** Best-effort human message for log lines. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
