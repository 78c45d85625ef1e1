import { sleep } from "./concurrency";

/**
 * Spaces requests to the same host at least `minIntervalMs` apart. Slots are
 * reserved synchronously, so concurrent callers queue in call order.
 */
export class HostRateLimiter {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly nextSlot = new Map<string, number>();

  constructor(minIntervalMs: number, now: () => number = Date.now, wait: (ms: number) => Promise<void> = sleep) {
    this.minIntervalMs = minIntervalMs;
    this.now = now;
    this.wait = wait;
  }

  async acquire(url: string): Promise<void> {
    if (this.minIntervalMs <= 0) {
      return;
    }

    const host = new URL(url).host;
    const current = this.now();
    const slot = Math.max(current, this.nextSlot.get(host) ?? 0);
    this.nextSlot.set(host, slot + this.minIntervalMs);
    if (slot > current) {
      await this.wait(slot - current);
    }
  }
}
