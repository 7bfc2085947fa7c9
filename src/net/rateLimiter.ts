import { createAbortError } from "../errors";

type TimeoutHandle = ReturnType<typeof setTimeout>;

export interface RateLimiterOptions {
  /** Requests started per second. Omit for no pacing. */
  qps?: number;
  burst?: number;
  /** Upper bound on tasks running at once. */
  maxConcurrent?: number;
  jitterRatio?: number;
  clock?: () => number;
  setTimeoutFn?: typeof setTimeout;
}

interface ScheduledTask<T> {
  fn: () => Promise<T> | T;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
  signal?: AbortSignal;
}

export class RateLimiter {
  private qps: number | null;
  private burst: number;
  private maxConcurrent: number;
  private jitterRatio: number;
  private clock: () => number;
  private setTimeoutFn: typeof setTimeout;
  private tokens: number;
  private lastRefillMs: number;
  private queue: Array<ScheduledTask<unknown>>;
  private active: number;
  private timer: TimeoutHandle | null;
  private pumping: boolean;

  constructor(options: RateLimiterOptions = {}) {
    this.qps = options.qps === undefined ? null : Math.max(0.01, options.qps);
    this.burst = Math.max(1, Math.floor(options.burst ?? 1));
    this.maxConcurrent = Math.max(1, Math.floor(options.maxConcurrent ?? Number.POSITIVE_INFINITY));
    this.jitterRatio = Math.max(0, options.jitterRatio ?? 0.25);
    this.clock = options.clock ?? (() => Date.now());
    this.setTimeoutFn = options.setTimeoutFn ?? setTimeout;
    this.tokens = this.burst;
    this.lastRefillMs = this.clock();
    this.queue = [];
    this.active = 0;
    this.timer = null;
    this.pumping = false;
  }

  /**
   * Queue a task. A task whose signal is aborted before it starts is
   * rejected with an AbortError and never runs.
   */
  schedule<T>(fn: () => Promise<T> | T, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(createAbortError());
    }
    return new Promise<T>((resolve, reject) => {
      this.queue.push({ fn, resolve: resolve as (value: unknown) => void, reject, signal });
      this.pump();
    });
  }

  private refillTokens(): void {
    const now = this.clock();
    if (this.qps === null) {
      this.tokens = this.burst;
      this.lastRefillMs = now;
      return;
    }
    const elapsedMs = Math.max(0, now - this.lastRefillMs);
    const refill = (elapsedMs / 1000) * this.qps;
    if (refill > 0) {
      this.tokens = Math.min(this.burst, this.tokens + refill);
      this.lastRefillMs = now;
    }
  }

  private computeJitterDelayMs(): number {
    if (this.jitterRatio <= 0 || this.qps === null) {
      return 0;
    }
    const intervalMs = 1000 / this.qps;
    return Math.random() * intervalMs * this.jitterRatio;
  }

  private timeUntilNextTokenMs(): number {
    this.refillTokens();
    if (this.tokens >= 1 || this.qps === null) {
      return 0;
    }
    const missing = 1 - this.tokens;
    return Math.max(0, (missing / this.qps) * 1000);
  }

  private schedulePump(delayMs: number): void {
    if (this.timer) {
      return;
    }
    this.timer = this.setTimeoutFn(() => {
      this.timer = null;
      this.pump();
    }, Math.max(0, delayMs));
  }

  private pump(): void {
    if (this.pumping) {
      return;
    }
    this.pumping = true;
    while (this.queue.length > 0 && this.active < this.maxConcurrent) {
      const task = this.queue[0];
      if (task.signal?.aborted) {
        this.queue.shift();
        task.reject(createAbortError());
        continue;
      }
      this.refillTokens();
      if (this.tokens < 1) {
        this.schedulePump(this.timeUntilNextTokenMs());
        break;
      }
      this.queue.shift();
      if (this.qps !== null) {
        this.tokens -= 1;
      }
      this.active += 1;
      const delayMs = this.computeJitterDelayMs();
      this.setTimeoutFn(() => this.run(task), delayMs);
    }
    this.pumping = false;
  }

  private run(task: ScheduledTask<unknown>): void {
    void Promise.resolve()
      .then(task.fn)
      .then(task.resolve, task.reject)
      .finally(() => {
        this.active -= 1;
        this.pump();
      });
  }
}
