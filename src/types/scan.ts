// Scan engine types

import type { TransportErrorKind } from './http.js';

export type ScanLevel = 0 | 1 | 2 | 3 | 4;

export type WordLanguage = 'en' | 'pt-br';

export type LanguageFilter = WordLanguage | 'all';

export type CandidateSource =
  | 'critical'
  | 'index'
  | 'specific'
  | 'extension'
  | 'brute-force'
  | 'domain'
  | 'recursive';

export interface Candidate {
  url: string;
  path: string;
  /** Priority tier, 1 (critical files) through 6 (recursive expansion). */
  tier: number;
  source: CandidateSource;
  extension: string | null;
  interesting: boolean;
}

export type InterestCategory =
  | 'credentials_file'
  | 'backup_file'
  | 'source_control'
  | 'admin_panel'
  | 'server_info'
  | 'sensitive_directory'
  | 'configuration_file'
  | 'log_file'
  | 'database_file'
  | 'robots_sitemap'
  | 'other';

export type Confidence = 'high' | 'medium' | 'low';

export type BaselineState = 'uninitialized' | 'sanity_check' | 'ready' | 'skipped';

// exact: most probes agree on (status, hash); sized: on (status, size within tolerance)
export type BaselinePolicy = 'exact' | 'sized' | 'permissive';

export interface BaselineSample {
  path: string;
  status: number;
  size: number;
  hash: string;
}

export interface BaselineSignature {
  status: number;
  size: number;
  hash: string;
}

export interface Baseline {
  samples: BaselineSample[];
  signature: BaselineSignature | null;
  policy: BaselinePolicy;
  /** Fraction of samples agreeing with the signature. */
  agreement: number;
  consensusThreshold: number;
  sizeTolerance: number;
}

export type RejectReason =
  | 'status_filter'
  | 'ignored_status'
  | 'ignored_content_type'
  | 'size_bounds'
  | 'baseline_match'
  | 'soft_404'
  | 'generic_error';

export type Verdict =
  | { accepted: true; confidence: Confidence; category: InterestCategory }
  | { accepted: false; reason: RejectReason };

export interface ScanResult {
  url: string;
  finalUrl: string;
  path: string;
  status: number;
  size: number;
  contentType: string | null;
  hash: string;
  confidence: Confidence;
  category: InterestCategory;
  partial: boolean;
  source: CandidateSource;
  tier: number;
  elapsedMs: number;
}

export interface ScanMetricsSnapshot {
  requestsSent: number;
  transportErrors: number;
  transportErrorsByKind: Partial<Record<TransportErrorKind, number>>;
  cacheHits: number;
  cacheMisses: number;
  cacheHitRate: number;
  baselineRejections: number;
  filtered: number;
  accepted: number;
  duplicatesSuppressed: number;
  currentWorkers: number;
  peakWorkers: number;
  currentRps: number;
  statusCodes: Record<string, number>;
  bytesReceived: number;
  averageLatencyMs: number;
  elapsedMs: number;
}

export interface ScanProgress {
  target: string;
  processed: number;
  accepted: number;
  inFlight: number;
  workers: number;
}

export interface TargetScanReport {
  target: string;
  timestamp: string;
  level: ScanLevel;
  results: ScanResult[];
  baseline: Baseline | null;
  candidatesProcessed: number;
  cancelled: boolean;
  unreachable: boolean;
  metrics: ScanMetricsSnapshot;
}
