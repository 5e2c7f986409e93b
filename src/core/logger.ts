/**
 * logger.ts — Natural-language progress logger for the fetch layer.
 *
 * Every module creates its own `Logger` with a context label, so a crawl log
 * reads like:
 *
 *   [2026-02-10T18:30:00.000Z] [INFO ] [FetchEngine] Fetched https://shop.test/a (HTTP 200, 312 ms)
 *
 * The minimum level comes from `LOG_LEVEL` (debug | info | warn | error).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

/** Resolve the active threshold from the environment, defaulting to `info`. */
export function resolveLogLevel(raw: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const normalized = (raw ?? '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

/**
 * Lightweight logger that emits human-readable, timestamped messages.
 *
 * Usage:
 *   const logger = new Logger('RateController');
 *   logger.warn('https://shop.test has 3 consecutive errors — backing off 2.0s');
 */
export class Logger {
  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;
  private readonly threshold: LogLevel;

  constructor(context: string, level: LogLevel = resolveLogLevel()) {
    this.context = context;
    this.threshold = level;
  }

  // ── Public API ─────────────────────────────────────────

  /** Chatty detail: admission waits, cookie counts, form fields resolved. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: page fetched, login succeeded, engine closed. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Something unexpected but non-fatal: backoff escalation, stale cookie file. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: browser crash, unreadable credential store. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err !== undefined && this.enabled('error')) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.threshold];
  }

  /** `[ISO timestamp] [LEVEL] [Context] message` */
  private emit(level: LogLevel, message: string): void {
    if (!this.enabled(level)) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}
