/**
 * Throttle service - enforces a minimum spacing between outbound completion calls
 */
import type { ThrottleStatus } from '../types/index';

export type Clock = () => number;
export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Process-wide call spacing shared by every request routed through one dispatcher.
 * Each caller reserves the next free slot synchronously, then waits for it, so
 * concurrent callers line up one interval apart.
 */
export class ThrottleService {
  private lastCallTime = 0;
  private readonly minIntervalMs: number;
  private readonly now: Clock;
  private readonly sleep: Sleep;

  constructor(minIntervalMs: number, now: Clock = Date.now, sleep: Sleep = defaultSleep) {
    this.minIntervalMs = minIntervalMs;
    this.now = now;
    this.sleep = sleep;
  }

  /**
   * Waits until the caller may make its outbound call and records the call time
   * @returns Milliseconds waited (0 when no wait was needed)
   */
  async acquire(): Promise<number> {
    const current = this.now();
    const slot = Math.max(current, this.lastCallTime + this.minIntervalMs);
    this.lastCallTime = slot;

    const waitMs = slot - current;
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
    return waitMs;
  }

  /**
   * Gets current throttle state without reserving a slot
   */
  getStatus(): ThrottleStatus {
    return {
      minIntervalMs: this.minIntervalMs,
      lastCallTime: this.lastCallTime,
      nextAvailableTime: Math.max(this.now(), this.lastCallTime + this.minIntervalMs),
    };
  }
}
