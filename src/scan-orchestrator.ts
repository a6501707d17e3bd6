import type { Logger } from 'winston';
import { HttpProber } from './prober/client.js';
import type { Catalog } from './schemas/catalog.js';
import type { ScanConfig } from './schemas/config.js';
import { AdaptiveConcurrencyController } from './scanner/adaptive-concurrency.js';
import { BaselineClassifier } from './scanner/baseline-classifier.js';
import { CandidateGenerator } from './scanner/candidate-generator.js';
import { getDefaultCatalog } from './scanner/catalog.js';
import { FingerprintCache } from './scanner/fingerprint-cache.js';
import { RateController } from './scanner/rate-controller.js';
import { ScanMetrics } from './scanner/scan-metrics.js';
import type { Prober } from './types/http.js';
import type { Baseline, Candidate, ScanProgress, ScanResult, TargetScanReport } from './types/scan.js';
import { createLogger, createTargetLogger } from './utils/logger.js';

export interface TargetStartInfo {
  target: string;
  baseline: Baseline | null;
  skipped: boolean;
  workers: number;
}

export interface ScanOrchestratorOptions {
  config: ScanConfig;
  catalog?: Catalog;
  prober?: Prober;
  logger?: Logger;
  rateController?: RateController;
  referenceDate?: Date;
  onTargetStart?: (info: TargetStartInfo) => void;
  onResult?: (result: ScanResult, target: string) => void;
  onProgress?: (progress: ScanProgress) => void;
  onTargetComplete?: (report: TargetScanReport) => void;
}

interface TargetRun {
  target: string;
  iterator: Iterator<Candidate>;
  classifier: BaselineClassifier;
  concurrency: AdaptiveConcurrencyController;
  metrics: ScanMetrics;
  logger: Logger;
  signal: AbortSignal | undefined;
  results: ScanResult[];
  emitted: Set<string>;
  exhausted: boolean;
  active: number;
  inFlight: number;
  processed: number;
  /** First error thrown by a worker; the rest of the pool drains before it is rethrown. */
  failure: { error: unknown } | null;
}

export function resultKey(result: Pick<ScanResult, 'finalUrl' | 'status' | 'size'>): string {
  return `${result.finalUrl}|${result.status}|${result.size}`;
}

/**
 * Drives one scan per target: baseline first, then a resizable pool of workers
 * pulling candidates from the generator through rate gate, probe and classifier.
 * Targets run one after another and share the rate controller.
 */
export class ScanOrchestrator {
  private readonly config: ScanConfig;
  private readonly catalog: Catalog;
  private readonly prober: Prober;
  private readonly ownsProber: boolean;
  private readonly logger: Logger;
  private readonly rateController: RateController;
  private readonly options: ScanOrchestratorOptions;
  private isRunning = false;

  constructor(options: ScanOrchestratorOptions) {
    this.options = options;
    this.config = options.config;
    this.catalog = options.catalog ?? getDefaultCatalog();
    this.ownsProber = options.prober === undefined;
    this.prober = options.prober ?? new HttpProber(this.config, this.catalog.userAgents);
    this.logger =
      options.logger ??
      createLogger({
        name: 'scan-orchestrator',
        level: this.config.verbose ? 'debug' : this.config.silent ? 'error' : 'info',
        logFile: this.config.logFile,
      });
    this.rateController =
      options.rateController ??
      new RateController({ rateLimit: this.config.rateLimit, delayMs: this.config.delayMs });
  }

  async run(signal?: AbortSignal): Promise<TargetScanReport[]> {
    if (this.isRunning) {
      throw new Error('Scan already running');
    }

    this.isRunning = true;
    const reports: TargetScanReport[] = [];

    try {
      for (const target of this.config.targets) {
        if (signal?.aborted) break;
        reports.push(await this.scanTarget(target, signal));
      }
    } finally {
      this.isRunning = false;
      if (this.ownsProber) this.prober.close?.();
    }

    return reports;
  }

  async scanTarget(target: string, signal?: AbortSignal): Promise<TargetScanReport> {
    const timestamp = new Date().toISOString();
    const logger = createTargetLogger(this.logger, target);
    const metrics = new ScanMetrics();
    const cache = new FingerprintCache(this.config.cacheCapacity);
    const classifier = new BaselineClassifier({
      config: this.config,
      prober: this.prober,
      cache,
      metrics,
      logger,
      rateController: this.rateController,
    });
    logger.info('Starting target scan', { level: this.config.level });

    if (this.config.skipBaseline) {
      classifier.skip();
    } else {
      const established = await classifier.establish(target, signal);
      if (established.unreachable) {
        logger.warn('Target unreachable, every baseline probe failed');
        return this.finishTarget(target, timestamp, metrics, classifier, [], 0, signal, true);
      }
    }

    const concurrency = new AdaptiveConcurrencyController({
      initial: this.config.threads,
      max: this.config.adaptive ? this.config.maxThreads : this.config.threads,
      enabled: this.config.adaptive,
    });
    metrics.setWorkers(concurrency.limit);

    this.options.onTargetStart?.({
      target,
      baseline: classifier.baseline,
      skipped: classifier.state === 'skipped',
      workers: concurrency.limit,
    });

    if (signal?.aborted) {
      return this.finishTarget(target, timestamp, metrics, classifier, [], 0, signal, false);
    }

    const generator = new CandidateGenerator(target, {
      config: this.config,
      catalog: this.catalog,
      ...(this.options.referenceDate !== undefined ? { referenceDate: this.options.referenceDate } : {}),
    });

    const run: TargetRun = {
      target,
      iterator: generator.candidates(),
      classifier,
      concurrency,
      metrics,
      logger,
      signal,
      results: [],
      emitted: new Set(),
      exhausted: false,
      active: 0,
      inFlight: 0,
      processed: 0,
      failure: null,
    };

    await this.runPool(run);

    logger.info('Target scan finished', {
      processed: run.processed,
      accepted: run.results.length,
      suppressed: generator.stats.suppressed,
      rateWaitMs: this.rateController.totalWaitMs,
      cancelled: signal?.aborted ?? false,
    });

    return this.finishTarget(target, timestamp, metrics, classifier, run.results, run.processed, signal, false);
  }

  private async runPool(run: TargetRun): Promise<void> {
    const running = new Set<Promise<void>>();
    let nextWorkerId = 1;

    const fill = (): void => {
      while (!run.exhausted && !run.signal?.aborted && run.failure === null && run.active < run.concurrency.limit) {
        const workerId = `worker-${nextWorkerId++}`;
        run.active++;
        const worker: Promise<void> = this.workerLoop(workerId, run)
          .catch((error: unknown) => {
            run.failure ??= { error };
          })
          .finally(() => {
            run.active--;
            running.delete(worker);
            this.rateController.release(workerId);
          });
        running.add(worker);
      }
    };

    run.concurrency.onChange((limit, previous) => {
      run.metrics.setWorkers(limit);
      run.logger.debug('Worker pool resized', { from: previous, to: limit });
      fill();
    });

    fill();
    while (running.size > 0) {
      await Promise.all([...running]);
    }

    if (run.failure !== null) {
      throw run.failure.error;
    }
  }

  private async workerLoop(workerId: string, run: TargetRun): Promise<void> {
    while (!run.signal?.aborted && run.failure === null) {
      // Retire when the pool shrank below the number of live workers
      if (run.active > run.concurrency.limit) return;

      const next = run.iterator.next();
      if (next.done) {
        run.exhausted = true;
        return;
      }

      const allowed = await this.rateController.acquire(workerId, run.signal);
      if (!allowed) return;

      await this.processCandidate(next.value, run);
    }
  }

  private async processCandidate(candidate: Candidate, run: TargetRun): Promise<void> {
    run.inFlight++;
    run.metrics.recordRequestStart();
    // Dispatched probes are not cancelled; they finish or hit their own timeout
    const result = await this.prober.probe(candidate.url);
    run.inFlight--;
    run.processed++;

    if (!result.success) {
      run.metrics.recordTransportError(result.error.kind, result.elapsedMs);
      run.concurrency.record(result.elapsedMs);
      run.logger.debug('Probe failed', { url: candidate.url, kind: result.error.kind, error: result.error.message });
      this.reportProgress(run);
      return;
    }

    const { outcome } = result;
    run.metrics.recordResponse(outcome.status, outcome.bytesRead, outcome.elapsedMs);
    run.concurrency.record(outcome.elapsedMs);

    const verdict = run.classifier.classify(candidate, outcome);
    if (verdict.accepted) {
      const scanResult: ScanResult = {
        url: candidate.url,
        finalUrl: outcome.finalUrl,
        path: candidate.path,
        status: outcome.status,
        size: outcome.size,
        contentType: outcome.contentType,
        hash: outcome.hash,
        confidence: verdict.confidence,
        category: verdict.category,
        partial: outcome.partial,
        source: candidate.source,
        tier: candidate.tier,
        elapsedMs: outcome.elapsedMs,
      };

      const key = resultKey(scanResult);
      if (run.emitted.has(key)) {
        run.metrics.recordDuplicate();
      } else {
        run.emitted.add(key);
        run.results.push(scanResult);
        run.metrics.recordAccepted();
        this.options.onResult?.(scanResult, run.target);
      }
    }

    this.reportProgress(run);
  }

  private reportProgress(run: TargetRun): void {
    this.options.onProgress?.({
      target: run.target,
      processed: run.processed,
      accepted: run.results.length,
      inFlight: run.inFlight,
      workers: run.concurrency.limit,
    });
  }

  private finishTarget(
    target: string,
    timestamp: string,
    metrics: ScanMetrics,
    classifier: BaselineClassifier,
    results: ScanResult[],
    processed: number,
    signal: AbortSignal | undefined,
    unreachable: boolean
  ): TargetScanReport {
    metrics.finish();
    const report: TargetScanReport = {
      target,
      timestamp,
      level: this.config.level,
      results,
      baseline: classifier.baseline,
      candidatesProcessed: processed,
      cancelled: signal?.aborted ?? false,
      unreachable,
      metrics: metrics.snapshot(),
    };
    this.options.onTargetComplete?.(report);
    return report;
  }
}
