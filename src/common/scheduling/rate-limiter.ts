import { Scheduler } from './scheduler';

export const PAIR_BATCH_RATE_LIMITER = 'PAIR_BATCH_RATE_LIMITER';
export const LABEL_RATE_LIMITER = 'LABEL_RATE_LIMITER';
export const QUERY_BACKOFF_LIMITER = 'QUERY_BACKOFF_LIMITER';

export interface RateLimiter {
  readonly delayMs: number;
  pause(): Promise<void>;
}

/**
 * Sleeps for the same interval on every `pause()`; callers invoke it after
 * each request they want spaced out.
 */
export class FixedDelayRateLimiter implements RateLimiter {
  constructor(
    private readonly scheduler: Scheduler,
    readonly delayMs: number,
  ) {}

  async pause(): Promise<void> {
    if (this.delayMs <= 0) return;
    await this.scheduler.sleep(this.delayMs);
  }
}
