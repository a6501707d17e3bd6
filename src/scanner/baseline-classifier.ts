import type { Logger } from 'winston';
import type { ScanConfig } from '../schemas/config.js';
import type { ProbeOutcome, Prober } from '../types/http.js';
import type {
  Baseline,
  BaselineSample,
  BaselineSignature,
  BaselineState,
  Candidate,
  Confidence,
  RejectReason,
  Verdict,
} from '../types/scan.js';
import { splitTargetPath } from './candidate-generator.js';
import { FingerprintCache, fingerprintKey } from './fingerprint-cache.js';
import type { RateController } from './rate-controller.js';
import { categorize, generateBaselinePath, looksLikeSoft404 } from './response-signatures.js';
import type { ScanMetrics } from './scan-metrics.js';

const BASELINE_SUFFIXES = ['', '.bak', '.old'];
const BASELINE_WORKER = 'baseline';

const AUTH_ERROR_STATUSES = new Set([401, 403]);
const AUTH_ERROR_MIN_SIZE = 150;
const AUTH_ERROR_INDICATORS = [
  'access denied',
  'access forbidden',
  'forbidden',
  'not allowed',
  'authorization required',
  'not authorized',
  'permission denied',
];

export interface BaselineClassifierDeps {
  config: ScanConfig;
  prober: Prober;
  cache: FingerprintCache;
  metrics: ScanMetrics;
  logger: Logger;
  rateController?: RateController;
}

export interface BaselineEstablishResult {
  baseline: Baseline | null;
  /** Every sanity probe failed at the transport level. */
  unreachable: boolean;
}

export function withinTolerance(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= Math.max(a, b) * tolerance;
}

function toSignature(sample: BaselineSample): BaselineSignature {
  return { status: sample.status, size: sample.size, hash: sample.hash };
}

/**
 * Consensus over the sanity samples: first by identical (status, hash), then by
 * (status, size within tolerance). Below the threshold on both, the target is
 * treated as inconsistent and classification falls back to the permissive policy.
 */
export function computeBaseline(
  samples: BaselineSample[],
  consensusThreshold: number,
  sizeTolerance: number
): Baseline {
  const base = { samples, consensusThreshold, sizeTolerance };
  if (samples.length === 0) {
    return { ...base, signature: null, policy: 'permissive', agreement: 0 };
  }

  const exactGroups = new Map<string, BaselineSample[]>();
  for (const sample of samples) {
    const key = `${sample.status}:${sample.hash}`;
    const group = exactGroups.get(key) ?? [];
    group.push(sample);
    exactGroups.set(key, group);
  }

  let bestExact: BaselineSample[] = [];
  for (const group of exactGroups.values()) {
    if (group.length > bestExact.length) bestExact = group;
  }
  const exactAgreement = bestExact.length / samples.length;
  const exactRepresentative = bestExact[0];
  if (exactRepresentative !== undefined && exactAgreement >= consensusThreshold) {
    return { ...base, signature: toSignature(exactRepresentative), policy: 'exact', agreement: exactAgreement };
  }

  let sizedRepresentative: BaselineSample | undefined;
  let sizedCount = 0;
  for (const sample of samples) {
    const count = samples.filter(
      other => other.status === sample.status && withinTolerance(other.size, sample.size, sizeTolerance)
    ).length;
    if (count > sizedCount) {
      sizedCount = count;
      sizedRepresentative = sample;
    }
  }
  const sizedAgreement = sizedCount / samples.length;
  if (sizedRepresentative !== undefined && sizedAgreement >= consensusThreshold) {
    return { ...base, signature: toSignature(sizedRepresentative), policy: 'sized', agreement: sizedAgreement };
  }

  return { ...base, signature: null, policy: 'permissive', agreement: Math.max(exactAgreement, sizedAgreement) };
}

/**
 * Learns a target's "not found" signature from improbable paths, then decides
 * for each probe outcome whether it is a real leftover or generic noise.
 */
export class BaselineClassifier {
  private readonly config: ScanConfig;
  private readonly prober: Prober;
  private readonly cache: FingerprintCache;
  private readonly metrics: ScanMetrics;
  private readonly logger: Logger;
  private readonly rateController: RateController | undefined;
  private currentState: BaselineState = 'uninitialized';
  private currentBaseline: Baseline | null = null;
  private readonly sampleKeys = new Set<string>();
  private readonly authErrorSizes = new Map<string, number>();
  private readonly ignoredContentTypes: string[];

  constructor(deps: BaselineClassifierDeps) {
    this.config = deps.config;
    this.prober = deps.prober;
    this.cache = deps.cache;
    this.metrics = deps.metrics;
    this.logger = deps.logger;
    this.rateController = deps.rateController;
    this.ignoredContentTypes = this.config.ignoreContentTypes.map(type => type.trim().toLowerCase());
  }

  get state(): BaselineState {
    return this.currentState;
  }

  get baseline(): Baseline | null {
    return this.currentBaseline;
  }

  async establish(targetUrl: string, signal?: AbortSignal): Promise<BaselineEstablishResult> {
    if (this.currentState !== 'uninitialized') {
      throw new Error(`Baseline already ${this.currentState}`);
    }
    this.currentState = 'sanity_check';

    const target = new URL(targetUrl);
    const { baseDirectory } = splitTargetPath(target.pathname);
    const samples: BaselineSample[] = [];
    let failures = 0;

    try {
      for (let i = 0; i < this.config.baselineProbes; i++) {
        if (signal?.aborted) break;
        if (this.rateController && !(await this.rateController.acquire(BASELINE_WORKER, signal))) break;

        const suffix = BASELINE_SUFFIXES[i % BASELINE_SUFFIXES.length] ?? '';
        const path = `${baseDirectory}${generateBaselinePath()}${suffix}`;
        this.metrics.recordRequestStart();
        const result = await this.prober.probe(`${target.origin}${path}`);

        if (!result.success) {
          failures++;
          this.metrics.recordTransportError(result.error.kind, result.elapsedMs);
          this.logger.debug('Baseline probe failed', { path, kind: result.error.kind, error: result.error.message });
          continue;
        }

        const { outcome } = result;
        this.metrics.recordResponse(outcome.status, outcome.bytesRead, outcome.elapsedMs);
        samples.push({ path, status: outcome.status, size: outcome.size, hash: outcome.hash });
      }
    } finally {
      this.rateController?.release(BASELINE_WORKER);
    }

    if (samples.length === 0 && failures > 0) {
      this.currentState = 'uninitialized';
      return { baseline: null, unreachable: true };
    }

    const baseline = computeBaseline(samples, this.config.baselineConsensus, this.config.sizeTolerance);
    for (const sample of samples) {
      this.sampleKeys.add(`${sample.status}:${sample.hash}`);
    }
    this.currentBaseline = baseline;
    this.currentState = 'ready';

    if (baseline.policy === 'permissive') {
      this.logger.warn('Target answers inconsistently for missing paths; falling back to permissive classification', {
        agreement: baseline.agreement,
      });
    } else {
      this.logger.debug('Baseline established', { policy: baseline.policy, signature: baseline.signature });
    }

    return { baseline, unreachable: false };
  }

  skip(): void {
    if (this.currentState !== 'uninitialized') {
      throw new Error(`Baseline already ${this.currentState}`);
    }
    this.currentState = 'skipped';
  }

  classify(candidate: Candidate, outcome: ProbeOutcome): Verdict {
    if (this.currentState !== 'ready' && this.currentState !== 'skipped') {
      throw new Error('Cannot classify before the baseline is established or skipped');
    }

    const filtered = this.applyFilters(outcome);
    if (filtered !== null) {
      this.metrics.recordFiltered();
      return { accepted: false, reason: filtered };
    }

    const rejection = this.baselineRejection(candidate, outcome) ?? this.authErrorRejection(outcome);
    if (rejection !== null) {
      this.metrics.recordBaselineRejection();
      return { accepted: false, reason: rejection };
    }

    return {
      accepted: true,
      confidence: this.confidence(outcome),
      category: categorize(candidate.path, outcome.sample),
    };
  }

  private applyFilters(outcome: ProbeOutcome): RejectReason | null {
    const { statusFilter, ignoreStatuses, minSize, maxSize } = this.config;

    // An explicit allow list takes precedence over the ignore list
    if (statusFilter !== undefined) {
      if (!statusFilter.includes(outcome.status)) return 'status_filter';
    } else if (ignoreStatuses.includes(outcome.status)) {
      return 'ignored_status';
    }

    if (outcome.contentType !== null && this.ignoredContentTypes.length > 0) {
      const mediaType = outcome.contentType.split(';')[0]?.trim().toLowerCase() ?? '';
      if (this.ignoredContentTypes.some(ignored => mediaType === ignored || mediaType.startsWith(ignored))) {
        return 'ignored_content_type';
      }
    }

    if (minSize !== undefined && outcome.size < minSize) return 'size_bounds';
    if (maxSize !== undefined && outcome.size > maxSize) return 'size_bounds';

    return null;
  }

  private baselineRejection(candidate: Candidate, outcome: ProbeOutcome): RejectReason | null {
    // Partial bodies hash only a prefix, so their verdicts are not shared
    if (outcome.partial) {
      return this.computeRejection(outcome);
    }

    const key = fingerprintKey(candidate, outcome.status);
    const cached = this.cache.get(key);
    if (cached !== undefined && cached.hash === outcome.hash) {
      this.metrics.recordCacheHit();
      return cached.isBaselineMatch ? 'baseline_match' : null;
    }

    this.metrics.recordCacheMiss();
    const rejection = this.computeRejection(outcome);
    this.cache.put(key, { isBaselineMatch: rejection !== null, hash: outcome.hash });
    return rejection;
  }

  private computeRejection(outcome: ProbeOutcome): RejectReason | null {
    const baseline = this.currentBaseline;

    if (this.currentState === 'ready' && baseline !== null) {
      if (this.sampleKeys.has(`${outcome.status}:${outcome.hash}`)) return 'baseline_match';

      const signature = baseline.signature;
      if (signature !== null) {
        if (baseline.policy === 'exact' && outcome.status === signature.status && outcome.hash === signature.hash) {
          return 'baseline_match';
        }
        if (
          baseline.policy === 'sized' &&
          outcome.status === signature.status &&
          withinTolerance(outcome.size, signature.size, baseline.sizeTolerance)
        ) {
          return 'baseline_match';
        }
      }
    }

    if (looksLikeSoft404(outcome.contentType, outcome.sample)) return 'soft_404';
    return null;
  }

  /**
   * 401/403 pages that look like a server-wide access error rather than a
   * protected file: repeated (status, size), tiny bodies, or stock denial text.
   * Skipped when the status allow list names the status.
   */
  private authErrorRejection(outcome: ProbeOutcome): RejectReason | null {
    if (!AUTH_ERROR_STATUSES.has(outcome.status)) return null;
    if (this.config.statusFilter?.includes(outcome.status)) return null;

    const sizeKey = `${outcome.status}:${outcome.size}`;
    const seen = (this.authErrorSizes.get(sizeKey) ?? 0) + 1;
    this.authErrorSizes.set(sizeKey, seen);

    if (seen >= 2) return 'generic_error';
    if (outcome.size < AUTH_ERROR_MIN_SIZE) return 'generic_error';

    const text = outcome.sample.toLowerCase();
    if (AUTH_ERROR_INDICATORS.some(indicator => text.includes(indicator))) return 'generic_error';
    return null;
  }

  private confidence(outcome: ProbeOutcome): Confidence {
    const baseline = this.currentBaseline;
    if (this.currentState === 'skipped' || baseline === null || baseline.signature === null) {
      return 'low';
    }

    const signature = baseline.signature;
    if (outcome.status !== signature.status) return 'high';
    if (!withinTolerance(outcome.size, signature.size, baseline.sizeTolerance)) return 'high';
    return 'medium';
  }
}
