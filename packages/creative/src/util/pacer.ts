import { defaultSleep, type Sleep } from './retry.js';

/** Minimum spacing between requests for a requests-per-minute budget; 0 disables pacing. */
export const intervalFromRpm = (rpm: number): number => (rpm > 0 ? Math.ceil(60_000 / rpm) : 0);

/**
 * Spaces outbound requests so that no two start closer than `intervalMs`.
 * Slots are reserved before waiting, so concurrent callers queue up in order.
 */
export class RequestPacer {
  private nextSlotAt = 0;

  constructor(
    private readonly intervalMs: number,
    private readonly sleep: Sleep = defaultSleep,
    private readonly now: () => number = Date.now
  ) {}

  async wait(signal?: AbortSignal): Promise<void> {
    if (this.intervalMs <= 0) return;
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;
    if (slot > now) {
      await this.sleep(slot - now, signal);
    }
  }
}
