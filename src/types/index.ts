// Probe executor types
export type {
  TransportErrorKind,
  TransportError,
  ProbeOutcome,
  ProbeSuccessResult,
  ProbeErrorResult,
  ProbeResult,
  Prober,
} from './http.js';

// Scan engine types
export type {
  ScanLevel,
  WordLanguage,
  LanguageFilter,
  CandidateSource,
  Candidate,
  InterestCategory,
  Confidence,
  BaselineState,
  BaselinePolicy,
  BaselineSample,
  BaselineSignature,
  Baseline,
  RejectReason,
  Verdict,
  ScanResult,
  ScanMetricsSnapshot,
  ScanProgress,
  TargetScanReport,
} from './scan.js';
