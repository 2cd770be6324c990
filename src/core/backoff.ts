/**
 * Backoff schedule
 *
 * Retry delays are data: retry n waits `delaysMs[n - 1]`, and the last entry
 * repeats for later retries. Each delay is capped at `maxDelayMs`, then
 * spread by up to ±`jitterRatio` of itself.
 */

import type { BackoffSettings } from '../types/effective-config';

export class BackoffSchedule {
  private readonly settings: BackoffSettings;
  private readonly random: () => number;

  /**
   * @param random - Source of uniform values in [0, 1); injectable for tests
   */
  constructor(settings: BackoffSettings, random: () => number = Math.random) {
    this.settings = {
      delaysMs: [...settings.delaysMs],
      maxDelayMs: settings.maxDelayMs,
      jitterRatio: Math.max(0, Math.min(1, settings.jitterRatio)),
    };
    this.random = random;
    this.validate();
  }

  /**
   * Delay before the given retry (1-indexed)
   */
  delayFor(retry: number): number {
    if (retry < 1) {
      throw new Error(`Retry number must be >= 1, got: ${retry}`);
    }

    const { delaysMs, maxDelayMs, jitterRatio } = this.settings;
    if (delaysMs.length === 0) {
      return 0;
    }

    const index = Math.min(retry, delaysMs.length) - 1;
    let delayMs = Math.min(delaysMs[index], maxDelayMs);

    if (jitterRatio > 0) {
      const jitterAmount = delayMs * jitterRatio;
      delayMs = Math.max(0, delayMs + this.random() * jitterAmount * 2 - jitterAmount);
    }

    return Math.round(delayMs);
  }

  /**
   * Delays for retries 1..count
   */
  delays(count: number): number[] {
    const result: number[] = [];
    for (let retry = 1; retry <= count; retry++) {
      result.push(this.delayFor(retry));
    }
    return result;
  }

  getSettings(): Readonly<BackoffSettings> {
    return { ...this.settings, delaysMs: [...this.settings.delaysMs] };
  }

  private validate(): void {
    for (const delay of this.settings.delaysMs) {
      if (delay < 0) {
        throw new Error(`Backoff delays must be >= 0, got: ${delay}`);
      }
    }
    if (this.settings.maxDelayMs < 0) {
      throw new Error(`Max delay must be >= 0, got: ${this.settings.maxDelayMs}`);
    }
  }
}

/**
 * Schedule with no waiting, for dry runs
 */
export function createImmediateBackoff(): BackoffSchedule {
  return new BackoffSchedule({ delaysMs: [0], maxDelayMs: 0, jitterRatio: 0 });
}
