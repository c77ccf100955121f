/**
 * Fixed-window rate limiter.
 *
 * One instance is created per process and injected into the request handler.
 * The counter resets when the current window ends; bursts across a window
 * boundary are accepted. Check-and-increment runs inside a single mutex.
 */
import { Mutex } from "../shared/mutex.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RateLimiterOptions {
  /** Requests admitted per window. */
  limit: number;
  /** Window length in milliseconds. Defaults to 60_000. */
  windowMs?: number;
  /** When false every call is admitted. Defaults to true. */
  enabled?: boolean;
  /** Clock override for tests. */
  now?: () => number;
}

export interface RateLimitSnapshot {
  windowStart: number;
  count: number;
  limit: number;
  windowMs: number;
  enabled: boolean;
}

// ---------------------------------------------------------------------------
// Core
// ---------------------------------------------------------------------------

const DEFAULT_WINDOW_MS = 60_000;

export class RateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly enabled: boolean;
  private readonly now: () => number;
  private readonly mutex = new Mutex();
  private windowStart: number;
  private count = 0;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.limit) || options.limit <= 0) {
      throw new RangeError(`Rate limit must be a positive integer, got ${options.limit}`);
    }
    this.limit = options.limit;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? Date.now;
    this.windowStart = this.now();
  }

  /**
   * Try to admit one request.
   *
   * Returns false once `limit` requests were admitted in the current window;
   * a rejected call does not change the counter.
   */
  admit(): Promise<boolean> {
    if (!this.enabled) return Promise.resolve(true);

    return this.mutex.runExclusive(() => {
      const now = this.now();
      if (now >= this.windowStart + this.windowMs) {
        this.windowStart = now;
        this.count = 0;
      }
      if (this.count < this.limit) {
        this.count++;
        return true;
      }
      return false;
    });
  }

  /** Milliseconds until the current window ends (0 if it already has). */
  retryAfterMs(): number {
    return Math.max(0, this.windowStart + this.windowMs - this.now());
  }

  /** Requests still available in the current window. */
  remaining(): number {
    if (!this.enabled) return this.limit;
    if (this.now() >= this.windowStart + this.windowMs) return this.limit;
    return this.limit - this.count;
  }

  snapshot(): RateLimitSnapshot {
    return {
      windowStart: this.windowStart,
      count: this.count,
      limit: this.limit,
      windowMs: this.windowMs,
      enabled: this.enabled,
    };
  }
}
