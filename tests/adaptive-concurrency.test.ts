import { describe, it, expect, vi } from 'vitest';
import { AdaptiveConcurrencyController } from '../src/scanner/adaptive-concurrency.js';

function feed(controller: AdaptiveConcurrencyController, latencyMs: number, count: number): Array<number | null> {
  return Array.from({ length: count }, () => controller.record(latencyMs));
}

describe('AdaptiveConcurrencyController', () => {
  it('grows by 20% after a window of fast responses', () => {
    const controller = new AdaptiveConcurrencyController({ initial: 10, max: 50, enabled: true });
    const listener = vi.fn();
    controller.onChange(listener);

    const results = feed(controller, 50, 50);

    expect(results.slice(0, 49).every(result => result === null)).toBe(true);
    expect(results[49]).toBe(12);
    expect(controller.limit).toBe(12);
    expect(listener).toHaveBeenCalledWith(12, 10);
  });

  it('shrinks by 30% after a window of slow responses', () => {
    const controller = new AdaptiveConcurrencyController({ initial: 10, max: 50, enabled: true });
    feed(controller, 800, 50);
    expect(controller.limit).toBe(7);
  });

  it('holds steady between the thresholds', () => {
    const controller = new AdaptiveConcurrencyController({ initial: 10, max: 50, enabled: true });
    expect(feed(controller, 300, 50)[49]).toBeNull();
    expect(controller.limit).toBe(10);
  });

  it('stays within its floor and ceiling', () => {
    const floor = new AdaptiveConcurrencyController({ initial: 1, max: 50, enabled: true });
    feed(floor, 900, 100);
    expect(floor.limit).toBe(1);

    const ceiling = new AdaptiveConcurrencyController({ initial: 49, max: 50, enabled: true });
    feed(ceiling, 10, 50);
    expect(ceiling.limit).toBe(50);
  });

  it('does nothing when disabled', () => {
    const controller = new AdaptiveConcurrencyController({ initial: 10, max: 10, enabled: false });
    expect(feed(controller, 10, 100).every(result => result === null)).toBe(true);
    expect(controller.limit).toBe(10);
    expect(controller.isAdaptive).toBe(false);
  });
});
