import { CancelledError, throwIfCancelled } from '../errors.js';

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }

      const onAbort = () => {
        clearTimeout(timer);
        reject(new CancelledError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

export interface RateLimitOptions {
  requestsPerWindow: number;
  windowMs: number;
  circuitBreakerThreshold: number;
  circuitBreakerPauseMs: number;
}

export interface RateLimitState {
  windowStartTime: number;
  requestCountInWindow: number;
  consecutiveFailureCount: number;
  circuitOpenUntil: number;
}

/**
 * Process-wide request budget shared by every completion call.
 *
 * `acquire` runs inside a promise-chain critical section so that concurrent
 * callers observe and consume window capacity one at a time.
 */
export class RateLimiter {
  private readonly state: RateLimitState;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly options: RateLimitOptions,
    private readonly clock: Clock = systemClock,
  ) {
    this.state = {
      windowStartTime: clock.now(),
      requestCountInWindow: 0,
      consecutiveFailureCount: 0,
      circuitOpenUntil: 0,
    };
  }

  private enqueue<T>(fn: () => Promise<T>): Promise<T> {
    const task = this.queue.then(fn);
    this.queue = task.then(
      () => {},
      () => {},
    );
    return task;
  }

  snapshot(): RateLimitState {
    return { ...this.state };
  }

  /**
   * Waits for a request slot. An aborted signal rejects with `CancelledError`
   * right away, even while another caller holds the queue; the abandoned
   * queue entry then exits without taking a slot.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (!signal) return this.reserve();
    if (signal.aborted) return Promise.reject(new CancelledError());

    const reservation = this.reserve(signal);
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => reject(new CancelledError());
      signal.addEventListener('abort', onAbort, { once: true });
      void reservation.then(
        () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }

  private reserve(signal?: AbortSignal): Promise<void> {
    return this.enqueue(async () => {
      throwIfCancelled(signal);

      const pauseMs = this.state.circuitOpenUntil - this.clock.now();
      if (pauseMs > 0) {
        console.warn(
          `[rate-limit] circuit open after ${this.state.consecutiveFailureCount} consecutive failures, pausing ${pauseMs}ms`,
        );
        await this.clock.sleep(pauseMs, signal);
      }

      this.rollWindow();
      if (this.state.requestCountInWindow >= this.options.requestsPerWindow) {
        const waitMs = this.state.windowStartTime + this.options.windowMs - this.clock.now();
        console.log(
          `[rate-limit] ${this.state.requestCountInWindow}/${this.options.requestsPerWindow} requests used, waiting ${waitMs}ms for the next window`,
        );
        if (waitMs > 0) {
          await this.clock.sleep(waitMs, signal);
        }
        this.startWindow(this.clock.now());
      }

      this.state.requestCountInWindow += 1;
    });
  }

  recordSuccess(): void {
    this.state.consecutiveFailureCount = 0;
    this.state.circuitOpenUntil = 0;
  }

  recordFailure(): number {
    this.state.consecutiveFailureCount += 1;
    if (this.state.consecutiveFailureCount >= this.options.circuitBreakerThreshold) {
      this.state.circuitOpenUntil = this.clock.now() + this.options.circuitBreakerPauseMs;
      console.warn(
        `[rate-limit] ${this.state.consecutiveFailureCount} consecutive failures, next request waits ${this.options.circuitBreakerPauseMs}ms`,
      );
    }
    return this.state.consecutiveFailureCount;
  }

  private rollWindow(): void {
    const now = this.clock.now();
    if (now - this.state.windowStartTime >= this.options.windowMs) {
      this.startWindow(now);
    }
  }

  private startWindow(now: number): void {
    this.state.windowStartTime = now;
    this.state.requestCountInWindow = 0;
  }
}
