/**
 * Clock interface
 * Abstracts time and waiting so backoff and timing stay deterministic in tests
 */

/**
 * Raised by `delay` when its signal aborts before the wait completes
 */
export class DelayAbortedError extends Error {
  constructor() {
    super('Delay aborted');
    this.name = 'DelayAbortedError';
  }
}

export interface Clock {
  now(): Date;

  /**
   * Current time as a Unix timestamp in milliseconds
   */
  timestamp(): number;

  iso(): string;

  /**
   * Wait for a duration. Rejects with DelayAbortedError when the signal
   * aborts first.
   */
  delay(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Real implementation of Clock using system time
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  timestamp(): number {
    return Date.now();
  }

  iso(): string {
    return new Date().toISOString();
  }

  delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new DelayAbortedError());
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new DelayAbortedError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/**
 * Controllable clock for tests
 *
 * With `autoAdvance` (the default) every delay resolves on the next microtask
 * and moves the clock forward by its duration, so retry schedules run
 * instantly. Without it, pending delays resolve only when `advance` passes
 * their deadline.
 */
export class MockClock implements Clock {
  private currentTime: number;
  private readonly autoAdvance: boolean;
  private pending: Array<{ time: number; resolve: () => void }> = [];

  /** Every duration passed to `delay`, in call order */
  readonly delays: number[] = [];

  constructor(options: { initialTime?: Date; autoAdvance?: boolean } = {}) {
    this.currentTime = (options.initialTime ?? new Date('2025-01-01T00:00:00.000Z')).getTime();
    this.autoAdvance = options.autoAdvance ?? true;
  }

  now(): Date {
    return new Date(this.currentTime);
  }

  timestamp(): number {
    return this.currentTime;
  }

  iso(): string {
    return new Date(this.currentTime).toISOString();
  }

  async delay(ms: number, signal?: AbortSignal): Promise<void> {
    this.delays.push(ms);
    if (signal?.aborted) {
      throw new DelayAbortedError();
    }
    if (this.autoAdvance) {
      this.currentTime += ms;
      return;
    }
    await new Promise<void>((resolve, reject) => {
      const entry = { time: this.currentTime + ms, resolve };
      this.pending.push(entry);
      signal?.addEventListener(
        'abort',
        () => {
          this.pending = this.pending.filter((p) => p !== entry);
          reject(new DelayAbortedError());
        },
        { once: true }
      );
    });
  }

  /**
   * Move time forward and release any delays that are now due
   */
  advance(ms: number): void {
    this.currentTime += ms;
    const due = this.pending.filter((p) => p.time <= this.currentTime);
    this.pending = this.pending.filter((p) => p.time > this.currentTime);
    due.forEach((p) => p.resolve());
  }

  pendingCount(): number {
    return this.pending.length;
  }
}
