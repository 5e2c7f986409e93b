/**
 * rateController.ts — Per-target pacing, adaptive backoff and global
 * concurrency admission.
 *
 * Admission happens in two steps:
 *
 *   1. **Slot** — a Bottleneck limiter with `maxConcurrent = concurrency`
 *      acts as the process-wide counting semaphore. The job scheduled on it
 *      stays "running" until the permit is released, so the slot is held for
 *      the whole request.
 *   2. **Spacing** — once a slot is held, the caller sleeps until the
 *      target's delay (plus jitter) has passed since the previous admission
 *      to that target. The start time is reserved at admission, so two
 *      overlapping requests to one host still start `delay` apart.
 *
 * Failures reported through `report()` escalate the delay exponentially
 * after `backoffThreshold` consecutive errors, and put the target into a
 * long cool-down after `blockThreshold`. One success resets it.
 */

import Bottleneck from 'bottleneck';
import { Logger } from '../core/logger';
import { FetchCancelledError } from '../core/errors';
import { parseRateLimitSettings, type RateLimitInput, type RateLimitSettings } from '../core/config';
import { sleep as defaultSleep } from '../core/timing';
import type { FetchOutcome } from '../core/types';

const logger = new Logger('RateController');

// ─── Types ──────────────────────────────────────────────────

/** Snapshot of a target's pacing state. Durations in milliseconds. */
export interface TargetState {
  readonly id: string;
  readonly baseDelayMs: number;
  readonly delayMs: number;
  /** Reserved start time of the latest admission (epoch ms), null before the first. */
  readonly lastRequestAt: number | null;
  readonly consecutiveErrors: number;
  readonly requestCount: number;
}

/** Proof of admission. Release exactly once; later calls are ignored. */
export interface Permit {
  readonly target: string;
  /** Time spent sleeping for spacing/backoff (ms). */
  readonly waitedMs: number;
  readonly released: boolean;
  release(): void;
}

export interface RateControllerHooks {
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Uniform [0, 1) source used for jitter and backoff randomisation. */
  random?: () => number;
}

interface MutableTarget {
  id: string;
  baseDelayMs: number;
  delayMs: number;
  lastRequestAt: number | null;
  consecutiveErrors: number;
  requestCount: number;
}

/** Start time taken by an admission that is still waiting out its spacing. */
interface Reservation {
  state: MutableTarget;
  previous: number | null;
  at: number;
}

/** Authority (`scheme://host[:port]`) of a URL — the unit of pacing. */
export function targetOf(url: string): string {
  return new URL(url).origin;
}

// ─── RateController ─────────────────────────────────────────

export class RateController {
  readonly settings: RateLimitSettings;
  private readonly limiter: Bottleneck;
  /** Insertion order doubles as LRU order: touched targets are re-inserted. */
  private readonly targets = new Map<string, MutableTarget>();
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private active = 0;

  constructor(settings: RateLimitInput = {}, hooks: RateControllerHooks = {}) {
    this.settings = parseRateLimitSettings(settings);
    this.now = hooks.now ?? Date.now;
    this.sleep = hooks.sleep ?? defaultSleep;
    this.random = hooks.random ?? Math.random;

    this.limiter = new Bottleneck({ maxConcurrent: this.settings.concurrency });
  }

  // ── Public API ─────────────────────────────────────────

  /** Number of permits currently held. Never exceeds `settings.concurrency`. */
  get activeCount(): number {
    return this.active;
  }

  /**
   * Wait for a concurrency slot and for the target's spacing to elapse.
   *
   * Rejects with FetchCancelledError only when `signal` aborts; the slot is
   * released in that case.
   */
  async admit(target: string, signal?: AbortSignal): Promise<Permit> {
    const releaseSlot = await this.acquireSlot(signal);

    let waitedMs = 0;
    let reservation: Reservation | null = null;
    try {
      const state = this.touch(target);
      const now = this.now();
      const elapsed = state.lastRequestAt === null ? Infinity : now - state.lastRequestAt;
      const required = Math.max(0, state.delayMs + this.drawJitter() - elapsed);

      // Reserve the start before sleeping so concurrent admissions queue behind it.
      reservation = { state, previous: state.lastRequestAt, at: now + required };
      state.lastRequestAt = reservation.at;
      state.requestCount += 1;

      if (required > 0) {
        logger.debug(`Pacing ${target}: waiting ${(required / 1000).toFixed(2)}s`);
        await this.sleep(required, signal);
      }
      waitedMs = required;
    } catch (err) {
      if (reservation) this.cancelReservation(reservation);
      releaseSlot();
      throw err instanceof FetchCancelledError
        ? err
        : new FetchCancelledError(`Admission to ${target} cancelled`, { target });
    }

    let released = false;
    return {
      target,
      waitedMs,
      get released() {
        return released;
      },
      release: () => {
        if (released) return;
        released = true;
        releaseSlot();
      },
    };
  }

  /** Feed a request outcome back into the target's backoff state. */
  report(target: string, outcome: FetchOutcome): void {
    const state = this.touch(target);

    if (outcome === 'success') {
      if (state.consecutiveErrors > 0) {
        logger.info(`${target} recovered after ${state.consecutiveErrors} error(s)`);
      }
      state.consecutiveErrors = 0;
      state.delayMs = state.baseDelayMs;
      return;
    }

    state.consecutiveErrors += 1;
    const count = state.consecutiveErrors;
    const { backoffThreshold, blockThreshold } = this.settings;

    if (count < backoffThreshold) return;

    // Escalated delays are measured from the failure, not from the last start.
    const now = this.now();
    state.lastRequestAt = Math.max(state.lastRequestAt ?? now, now);

    if (count >= blockThreshold) {
      state.delayMs = Math.max(state.delayMs, this.settings.cooldown * 1000);
      logger.error(
        `${target} has ${count} consecutive errors — cooling down for ` +
          `${(state.delayMs / 1000).toFixed(0)}s`,
      );
      return;
    }

    const ceiling = this.settings.maxBackoff * 1000;
    const exponential = Math.min(state.baseDelayMs * 2 ** (count - 2), ceiling);
    const randomized = exponential * (0.8 + 0.4 * this.random());
    state.delayMs = Math.max(state.delayMs, Math.min(ceiling, randomized));
    logger.warn(
      `${target} has ${count} consecutive errors — backing off ` +
        `${(state.delayMs / 1000).toFixed(2)}s`,
    );
  }

  /** Current state of a target, or undefined if it has never been seen. */
  snapshot(target: string): TargetState | undefined {
    const state = this.targets.get(target);
    return state ? { ...state } : undefined;
  }

  /** Number of targets currently tracked. */
  get targetCount(): number {
    return this.targets.size;
  }

  // ── Internals ──────────────────────────────────────────

  /**
   * Undo the start time reserved by an admission that never ran. Later
   * reservations (or a failure report) that moved `lastRequestAt` are kept.
   */
  private cancelReservation(reservation: Reservation): void {
    const { state } = reservation;
    state.requestCount = Math.max(0, state.requestCount - 1);
    if (state.lastRequestAt === reservation.at) {
      state.lastRequestAt = reservation.previous;
    }
  }

  /**
   * Schedule a Bottleneck job that resolves our promise with a release
   * function and then stays pending until that function is called.
   */
  private acquireSlot(signal?: AbortSignal): Promise<() => void> {
    return new Promise<() => void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new FetchCancelledError('Admission cancelled'));
        return;
      }

      let settled = false;
      const onAbort = () => {
        if (settled) return;
        settled = true;
        reject(new FetchCancelledError('Admission cancelled'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const job = () =>
        new Promise<void>((finish) => {
          signal?.removeEventListener('abort', onAbort);
          if (settled) {
            // Cancelled while queued: give the slot straight back.
            finish();
            return;
          }
          settled = true;
          this.active += 1;
          resolve(() => {
            this.active -= 1;
            finish();
          });
        });

      this.limiter.schedule(job).catch((err: unknown) => {
        if (settled) {
          logger.error('Concurrency limiter failed after admission', err);
          return;
        }
        settled = true;
        reject(err);
      });
    });
  }

  private touch(target: string): MutableTarget {
    let state = this.targets.get(target);
    if (state) {
      this.targets.delete(target);
    } else {
      const baseDelayMs = this.baseDelayFor(target) * 1000;
      state = {
        id: target,
        baseDelayMs,
        delayMs: baseDelayMs,
        lastRequestAt: null,
        consecutiveErrors: 0,
        requestCount: 0,
      };
      this.evictIfFull();
    }
    this.targets.set(target, state);
    return state;
  }

  private evictIfFull(): void {
    while (this.targets.size >= this.settings.maxTargets) {
      const oldest = this.targets.keys().next();
      if (oldest.done) return;
      this.targets.delete(oldest.value);
      logger.debug(`Evicted pacing state for ${oldest.value}`);
    }
  }

  private baseDelayFor(target: string): number {
    const overrides = this.settings.perTargetOverrides;
    if (target in overrides) return overrides[target];
    try {
      const { host, hostname } = new URL(target);
      if (host in overrides) return overrides[host];
      if (hostname in overrides) return overrides[hostname];
    } catch {
      // Not a URL-shaped target id; only exact overrides apply.
    }
    return this.settings.baseDelay;
  }

  /** Uniform draw in [-jitter, +jitter] milliseconds. */
  private drawJitter(): number {
    const jitterMs = this.settings.jitter * 1000;
    return jitterMs === 0 ? 0 : (this.random() * 2 - 1) * jitterMs;
  }
}
