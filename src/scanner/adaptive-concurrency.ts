export interface AdaptiveConcurrencyOptions {
  initial: number;
  max: number;
  min?: number;
  enabled: boolean;
  windowSize?: number;
  lowLatencyMs?: number;
  highLatencyMs?: number;
  increaseRatio?: number;
  decreaseRatio?: number;
}

export type LimitListener = (limit: number, previous: number) => void;

function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? upper) + upper) / 2;
}

/**
 * Latency-driven worker count. Every `windowSize` completions the median of the
 * last `windowSize` latencies is compared against the thresholds:
 * fast targets grow the pool by 20%, slow ones shrink it by 30%.
 */
export class AdaptiveConcurrencyController {
  private current: number;
  private readonly max: number;
  private readonly min: number;
  private readonly enabled: boolean;
  private readonly windowSize: number;
  private readonly lowLatencyMs: number;
  private readonly highLatencyMs: number;
  private readonly increaseRatio: number;
  private readonly decreaseRatio: number;
  private readonly window: number[] = [];
  private completions = 0;
  private readonly listeners: LimitListener[] = [];

  constructor(options: AdaptiveConcurrencyOptions) {
    this.min = Math.max(1, options.min ?? 1);
    this.max = Math.max(this.min, options.max);
    this.current = Math.min(this.max, Math.max(this.min, options.initial));
    this.enabled = options.enabled;
    this.windowSize = options.windowSize ?? 50;
    this.lowLatencyMs = options.lowLatencyMs ?? 100;
    this.highLatencyMs = options.highLatencyMs ?? 500;
    this.increaseRatio = options.increaseRatio ?? 0.2;
    this.decreaseRatio = options.decreaseRatio ?? 0.3;
  }

  get limit(): number {
    return this.current;
  }

  get isAdaptive(): boolean {
    return this.enabled;
  }

  onChange(listener: LimitListener): void {
    this.listeners.push(listener);
  }

  /**
   * Record one completed probe. Returns the new limit when this completion
   * triggered an adjustment, otherwise null.
   */
  record(latencyMs: number): number | null {
    if (!this.enabled) return null;

    this.window.push(latencyMs);
    if (this.window.length > this.windowSize) {
      this.window.shift();
    }

    this.completions++;
    if (this.completions % this.windowSize !== 0) return null;

    const representative = median(this.window);
    const previous = this.current;

    if (representative < this.lowLatencyMs) {
      const step = Math.max(1, Math.round(previous * this.increaseRatio));
      this.current = Math.min(this.max, previous + step);
    } else if (representative > this.highLatencyMs) {
      const step = Math.max(1, Math.round(previous * this.decreaseRatio));
      this.current = Math.max(this.min, previous - step);
    }

    if (this.current === previous) return null;

    for (const listener of this.listeners) {
      listener(this.current, previous);
    }
    return this.current;
  }
}
