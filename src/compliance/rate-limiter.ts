/**
 * Per-host request gate.
 *
 * Each caller reserves the next free start slot synchronously, so concurrent
 * callers queue up behind one another and no two requests to the same host
 * start less than `minIntervalMs` apart. One gate is created per run and
 * handed to the fetcher.
 */
export class RateLimitGate {
  private readonly nextSlot = new Map<string, number>();

  async acquire(host: string, minIntervalMs: number): Promise<void> {
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot.get(host) ?? 0);
    this.nextSlot.set(host, slot + minIntervalMs);

    const waitMs = slot - now;
    if (waitMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, waitMs));
    }
  }
}
