import { abortableDelay } from '../utils/delay.js';

export interface RateControllerOptions {
  /** Global ceiling in requests per second. */
  rateLimit?: number | undefined;
  /** Minimum spacing between request starts of one worker. */
  delayMs?: number | undefined;
  now?: () => number;
}

/**
 * Shared gate every worker passes right before issuing a request.
 * Start slots are reserved synchronously in arrival order, so waiting never
 * reorders or drops requests; the stricter of the two constraints wins.
 */
export class RateController {
  private readonly intervalMs: number;
  private readonly delayMs: number;
  private readonly now: () => number;
  private nextSlot: number | null = null;
  private readonly lastStartByWorker = new Map<string, number>();
  private waitedMs = 0;

  constructor(options: RateControllerOptions = {}) {
    this.intervalMs = options.rateLimit !== undefined && options.rateLimit > 0 ? 1000 / options.rateLimit : 0;
    this.delayMs = options.delayMs ?? 0;
    this.now = options.now ?? Date.now;
  }

  get enabled(): boolean {
    return this.intervalMs > 0 || this.delayMs > 0;
  }

  /** Total scheduled wait handed out so far, in milliseconds. */
  get totalWaitMs(): number {
    return this.waitedMs;
  }

  /**
   * Wait for this worker's next start slot.
   * Resolves `false` when `signal` aborts during the wait.
   */
  async acquire(workerId: string, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return false;
    if (!this.enabled) return true;

    const now = this.now();
    let slot = now;

    if (this.intervalMs > 0 && this.nextSlot !== null) {
      slot = Math.max(slot, this.nextSlot);
    }

    const lastStart = this.lastStartByWorker.get(workerId);
    if (this.delayMs > 0 && lastStart !== undefined) {
      slot = Math.max(slot, lastStart + this.delayMs);
    }

    if (this.intervalMs > 0) {
      this.nextSlot = slot + this.intervalMs;
    }
    this.lastStartByWorker.set(workerId, slot);

    const wait = slot - now;
    if (wait <= 0) return true;

    this.waitedMs += wait;
    return abortableDelay(wait, signal);
  }

  release(workerId: string): void {
    this.lastStartByWorker.delete(workerId);
  }
}
