import type { TransportErrorKind } from '../types/http.js';
import type { ScanMetricsSnapshot } from '../types/scan.js';

const RPS_WINDOW_MS = 5000;

/**
 * Counters for one target scan. Mutated only through these methods,
 * each of which runs to completion without yielding.
 */
export class ScanMetrics {
  private readonly now: () => number;
  private readonly startedAt: number;
  private finishedAt: number | null = null;
  private requestsSent = 0;
  private transportErrors = 0;
  private readonly transportErrorsByKind: Partial<Record<TransportErrorKind, number>> = {};
  private cacheHits = 0;
  private cacheMisses = 0;
  private baselineRejections = 0;
  private filtered = 0;
  private accepted = 0;
  private duplicatesSuppressed = 0;
  private currentWorkers = 0;
  private peakWorkers = 0;
  private readonly statusCodes: Record<string, number> = {};
  private bytesReceived = 0;
  private latencyTotalMs = 0;
  private latencySamples = 0;
  private recentRequests: number[] = [];

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.startedAt = now();
  }

  recordRequestStart(): void {
    this.requestsSent++;
    const now = this.now();
    this.recentRequests.push(now);
    this.pruneRecent(now);
  }

  recordResponse(status: number, bytes: number, latencyMs: number): void {
    const key = String(status);
    this.statusCodes[key] = (this.statusCodes[key] ?? 0) + 1;
    this.bytesReceived += bytes;
    this.recordLatency(latencyMs);
  }

  recordTransportError(kind: TransportErrorKind, latencyMs: number): void {
    this.transportErrors++;
    this.transportErrorsByKind[kind] = (this.transportErrorsByKind[kind] ?? 0) + 1;
    this.recordLatency(latencyMs);
  }

  recordCacheHit(): void {
    this.cacheHits++;
  }

  recordCacheMiss(): void {
    this.cacheMisses++;
  }

  recordBaselineRejection(): void {
    this.baselineRejections++;
  }

  recordFiltered(): void {
    this.filtered++;
  }

  recordAccepted(): void {
    this.accepted++;
  }

  recordDuplicate(): void {
    this.duplicatesSuppressed++;
  }

  setWorkers(count: number): void {
    this.currentWorkers = count;
    this.peakWorkers = Math.max(this.peakWorkers, count);
  }

  finish(): void {
    this.finishedAt ??= this.now();
  }

  snapshot(): ScanMetricsSnapshot {
    const now = this.finishedAt ?? this.now();
    this.pruneRecent(now);
    const lookups = this.cacheHits + this.cacheMisses;
    const windowMs = Math.min(RPS_WINDOW_MS, Math.max(1, now - this.startedAt));

    return {
      requestsSent: this.requestsSent,
      transportErrors: this.transportErrors,
      transportErrorsByKind: { ...this.transportErrorsByKind },
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      cacheHitRate: lookups === 0 ? 0 : this.cacheHits / lookups,
      baselineRejections: this.baselineRejections,
      filtered: this.filtered,
      accepted: this.accepted,
      duplicatesSuppressed: this.duplicatesSuppressed,
      currentWorkers: this.currentWorkers,
      peakWorkers: this.peakWorkers,
      currentRps: (this.recentRequests.length * 1000) / windowMs,
      statusCodes: { ...this.statusCodes },
      bytesReceived: this.bytesReceived,
      averageLatencyMs: this.latencySamples === 0 ? 0 : this.latencyTotalMs / this.latencySamples,
      elapsedMs: now - this.startedAt,
    };
  }

  private recordLatency(latencyMs: number): void {
    this.latencyTotalMs += latencyMs;
    this.latencySamples++;
  }

  private pruneRecent(now: number): void {
    const cutoff = now - RPS_WINDOW_MS;
    if (this.recentRequests.length > 0 && (this.recentRequests[0] ?? now) < cutoff) {
      this.recentRequests = this.recentRequests.filter(timestamp => timestamp >= cutoff);
    }
  }
}
