import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { RateLimitGate } from '../../src/compliance/rate-limiter.js';

describe('RateLimitGate', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-08-02T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should space concurrent starts to one host at least the interval apart', async () => {
    const gate = new RateLimitGate();
    const t0 = Date.now();
    const starts: number[] = [];

    const acquired = Array.from({ length: 4 }, () =>
      gate.acquire('www.vlr.gg', 1000).then(() => {
        starts.push(Date.now() - t0);
      }),
    );
    await vi.advanceTimersByTimeAsync(3000);
    await Promise.all(acquired);

    expect(starts).toEqual([0, 1000, 2000, 3000]);
  });

  it('should not hold back a request once the interval has passed', async () => {
    const gate = new RateLimitGate();
    await gate.acquire('www.vlr.gg', 1000);
    await vi.advanceTimersByTimeAsync(1500);

    const t1 = Date.now();
    await gate.acquire('www.vlr.gg', 1000);
    expect(Date.now()).toBe(t1);
  });

  it('should keep hosts independent', async () => {
    const gate = new RateLimitGate();
    const t0 = Date.now();

    await gate.acquire('www.vlr.gg', 1000);
    await gate.acquire('example.com', 1000);

    expect(Date.now()).toBe(t0);
  });
});
