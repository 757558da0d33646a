import { getConfig } from "../config.js";
import { RuntimeError } from "../errors.js";
import { log } from "./logger.js";

const logger = log.child("rate-limit");

export type RateLimiterOptions = {
  /** Maximum requests per window (default: 10) */
  maxRequests?: number;
  /** Window size in milliseconds (default: 1000) */
  windowMs?: number;
  /** Queue requests over the limit instead of rejecting them (default: true) */
  queueExcess?: boolean;
  /** Default: 50 */
  maxQueueSize?: number;
};

type Waiter = {
  resolve: () => void;
  reject: (err: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

export type RateLimiterStats = {
  allowed: number;
  throttled: number;
  queued: number;
  rejected: number;
  queueSize: number;
  remaining: number;
};

/**
 * Sliding-window limiter. Model calls pass through one of these per model
 * name so a burst of parallel roles cannot flood the backend.
 */
export class RateLimiter {
  private timestamps: number[] = [];
  private queue: Waiter[] = [];
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly queueExcess: boolean;
  private readonly maxQueueSize: number;
  private timer: NodeJS.Timeout | undefined;
  private stats = { allowed: 0, throttled: 0, queued: 0, rejected: 0 };

  constructor(opts: RateLimiterOptions = {}) {
    this.maxRequests = Math.max(1, opts.maxRequests ?? 10);
    this.windowMs = opts.windowMs ?? 1000;
    this.queueExcess = opts.queueExcess ?? true;
    this.maxQueueSize = opts.maxQueueSize ?? 50;
  }

  private cleanup(): void {
    const cutoff = Date.now() - this.windowMs;
    this.timestamps = this.timestamps.filter((t) => t > cutoff);
  }

  remaining(): number {
    this.cleanup();
    return Math.max(0, this.maxRequests - this.timestamps.length);
  }

  /** Milliseconds until a slot frees up; 0 when one is free now. */
  nextAvailableIn(): number {
    this.cleanup();
    const oldest = this.timestamps[0];
    if (this.timestamps.length < this.maxRequests || oldest === undefined) {
      return 0;
    }
    return Math.max(0, oldest + this.windowMs - Date.now());
  }

  tryAcquire(): boolean {
    this.cleanup();
    if (this.timestamps.length < this.maxRequests) {
      this.timestamps.push(Date.now());
      this.stats.allowed++;
      return true;
    }
    this.stats.throttled++;
    return false;
  }

  /**
   * Resolve once a slot is available. Over the limit, the call waits in FIFO
   * order or, with `queueExcess` off, rejects. Aborting `signal` removes the
   * waiter and rejects with the abort reason.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(signal.reason);
    if (this.queue.length === 0 && this.tryAcquire()) return Promise.resolve();
    if (this.queue.length > 0) this.stats.throttled++;

    if (!this.queueExcess) {
      this.stats.rejected++;
      return Promise.reject(new RuntimeError("PROVIDER_ERROR", "Rate limit exceeded"));
    }
    if (this.queue.length >= this.maxQueueSize) {
      this.stats.rejected++;
      return Promise.reject(new RuntimeError("PROVIDER_ERROR", "Rate limit queue full"));
    }

    this.stats.queued++;
    logger.debug("Request queued", {
      queueSize: this.queue.length + 1,
      waitMs: this.nextAvailableIn(),
    });

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          this.queue = this.queue.filter((w) => w !== waiter);
          reject(signal.reason);
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      this.queue.push(waiter);
      this.schedule();
    });
  }

  private schedule(): void {
    if (this.timer || this.queue.length === 0) return;
    const wait = Math.max(1, this.nextAvailableIn());
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.drain();
    }, wait);
  }

  private drain(): void {
    this.cleanup();
    while (this.queue.length > 0 && this.timestamps.length < this.maxRequests) {
      const waiter = this.queue.shift();
      if (!waiter) break;
      if (waiter.onAbort) waiter.signal?.removeEventListener("abort", waiter.onAbort);
      this.timestamps.push(Date.now());
      this.stats.allowed++;
      waiter.resolve();
    }
    this.schedule();
  }

  getStats(): RateLimiterStats {
    return {
      ...this.stats,
      queueSize: this.queue.length,
      remaining: this.remaining(),
    };
  }

  reset(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    const pending = this.queue;
    this.queue = [];
    for (const waiter of pending) {
      if (waiter.onAbort) waiter.signal?.removeEventListener("abort", waiter.onAbort);
      waiter.reject(new RuntimeError("PROVIDER_ERROR", "Rate limiter reset"));
    }
    this.timestamps = [];
    this.stats = { allowed: 0, throttled: 0, queued: 0, rejected: 0 };
  }
}

/** One limiter per key, created on first use. */
export class RateLimiterRegistry {
  private limiters = new Map<string, RateLimiter>();
  private readonly defaultOptions: () => RateLimiterOptions;

  constructor(defaultOptions: RateLimiterOptions | (() => RateLimiterOptions) = {}) {
    this.defaultOptions =
      typeof defaultOptions === "function" ? defaultOptions : () => defaultOptions;
  }

  get(key: string, opts?: RateLimiterOptions): RateLimiter {
    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = new RateLimiter({ ...this.defaultOptions(), ...opts });
      this.limiters.set(key, limiter);
    }
    return limiter;
  }

  acquire(key: string, signal?: AbortSignal): Promise<void> {
    return this.get(key).acquire(signal);
  }

  getAllStats(): Record<string, RateLimiterStats> {
    const stats: Record<string, RateLimiterStats> = {};
    for (const [key, limiter] of this.limiters) {
      stats[key] = limiter.getStats();
    }
    return stats;
  }

  resetAll(): void {
    for (const limiter of this.limiters.values()) {
      limiter.reset();
    }
    this.limiters.clear();
  }
}

/** Per-model limiters, sized from `rateLimit` settings at first use. */
export const modelRateLimiters = new RateLimiterRegistry(() => {
  const settings = getConfig().rateLimit;
  return {
    maxRequests: settings.maxRequestsPerSecond,
    windowMs: 1000,
    queueExcess: settings.queueExcess,
    maxQueueSize: settings.maxQueueSize,
  };
});
