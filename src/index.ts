export { ScanOrchestrator, resultKey, type ScanOrchestratorOptions, type TargetStartInfo } from './scan-orchestrator.js';
export { buildScanConfig } from './config/build.js';
export { configFromCli, type CliOptions } from './cli/options.js';

export { HttpProber, classifyTransportError, digestStream, type HttpProberOptions } from './prober/client.js';
export { ProbeRequestConfig } from './prober/config.js';

export { loadCatalog, getDefaultCatalog } from './scanner/catalog.js';
export { SCAN_LEVELS, resolveLevel, type LevelSelection } from './scanner/levels.js';
export { CandidateGenerator, TIER, type CandidateGeneratorOptions } from './scanner/candidate-generator.js';
export { generateDomainVariations } from './scanner/domain-wordlist.js';
export { optimizeExtensions, analyzeTargetContext } from './scanner/extension-optimizer.js';
export { BaselineClassifier, computeBaseline } from './scanner/baseline-classifier.js';
export { FingerprintCache, fingerprintKey } from './scanner/fingerprint-cache.js';
export { RateController } from './scanner/rate-controller.js';
export { AdaptiveConcurrencyController } from './scanner/adaptive-concurrency.js';
export { ScanMetrics } from './scanner/scan-metrics.js';
export { categorize, looksLikeSoft404 } from './scanner/response-signatures.js';

export { ConsoleReporter, VERSION } from './reporting/console-reporter.js';
export { buildReportDocument, perUrlReportPath, writeReports, type ReportDocument } from './reporting/json-report.js';

export * from './schemas/index.js';
export type * from './types/index.js';
export * from './utils/index.js';
