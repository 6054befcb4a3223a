export type Clock = () => number;
export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Keeps outbound calls at least `spacingMs` apart.
 *
 * Callers reserve the earliest free slot synchronously, so the reservation
 * itself is the critical section: two callers can never claim the same slot.
 * Excess calls queue behind each other instead of being dropped.
 */
export class RequestSpacer {
  private nextSlotAt = 0;

  constructor(
    private readonly spacingMs: number,
    private readonly now: Clock = Date.now,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  async acquire(): Promise<void> {
    if (this.spacingMs <= 0) return;

    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.spacingMs;

    // Timers may fire a little early; never release before the reserved slot
    let wait = slot - now;
    while (wait > 0) {
      await this.sleep(wait);
      wait = slot - this.now();
    }
  }
}
