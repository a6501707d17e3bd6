import type { TargetStartInfo } from '../scan-orchestrator.js';
import type { ScanConfig } from '../schemas/config.js';
import type { ScanMetricsSnapshot, ScanProgress, ScanResult, TargetScanReport } from '../types/scan.js';

export const VERSION = '1.2.0';

const ANSI = {
  reset: '\u001b[0m',
  bold: '\u001b[1m',
  dim: '\u001b[2m',
  red: '\u001b[31m',
  green: '\u001b[32m',
  yellow: '\u001b[33m',
  magenta: '\u001b[35m',
  cyan: '\u001b[36m',
} as const;

type Color = keyof typeof ANSI;

export interface ConsoleReporterOptions {
  color: boolean;
  silent: boolean;
  verbose: boolean;
  progressEvery?: number;
  write?: (line: string) => void;
}

export function statusColor(status: number): Color {
  if (status >= 200 && status < 300) return 'green';
  if (status >= 300 && status < 400) return 'cyan';
  if (status === 401 || status === 403) return 'yellow';
  if (status >= 400 && status < 500) return 'magenta';
  return 'red';
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

function mediaType(contentType: string | null): string {
  return contentType?.split(';')[0]?.trim() || 'N/A';
}

/**
 * Operator-facing output: banner, one row per accepted result colored by status class,
 * progress lines and per-target summaries.
 */
export class ConsoleReporter {
  private readonly options: ConsoleReporterOptions;
  private readonly write: (line: string) => void;
  private readonly progressEvery: number;

  constructor(options: ConsoleReporterOptions) {
    this.options = options;
    this.write = options.write ?? ((line: string) => console.log(line));
    this.progressEvery = options.progressEvery ?? 500;
  }

  paint(text: string, color: Color): string {
    return this.options.color ? `${ANSI[color]}${text}${ANSI.reset}` : text;
  }

  formatResultRow(result: ScanResult): string {
    const status = this.paint(String(result.status).padEnd(3), statusColor(result.status));
    const size = formatSize(result.size).padStart(10);
    const partial = result.partial ? this.paint(' [partial]', 'dim') : '';
    return `${status}  ${size}  ${mediaType(result.contentType).padEnd(24)}  ${result.finalUrl}  [${result.category}, ${result.confidence}]${partial}`;
  }

  printBanner(config: ScanConfig): void {
    if (this.options.silent) return;

    this.write('\n========================================');
    this.write(`   ${this.paint('RESIDUE SCANNER', 'bold')} v${VERSION}`);
    this.write('========================================');
    this.write(`Targets: ${config.targets.length} | Level: ${config.level}`);
    this.write(
      `Workers: ${config.adaptive ? `adaptive (${config.threads} → max ${config.maxThreads})` : config.threads}`
    );
    if (config.rateLimit !== undefined || config.delayMs !== undefined) {
      this.write(`Rate: ${config.rateLimit ?? '∞'} req/s | Delay: ${config.delayMs ?? 0} ms`);
    }
    this.write('========================================\n');
  }

  targetStarted(info: TargetStartInfo): void {
    if (this.options.silent) return;

    this.write(`\n📂 ${this.paint(info.target, 'bold')}`);
    if (info.skipped) {
      this.write('   📊 Baseline: skipped');
    } else if (info.baseline?.signature) {
      const { status, size } = info.baseline.signature;
      this.write(`   📊 Baseline: ${status} (${size} bytes, ${info.baseline.policy} match)`);
    } else {
      this.write(`   📊 Baseline: inconsistent, permissive classification`);
    }
  }

  result(result: ScanResult): void {
    const origin = this.options.verbose ? this.paint(`  (${result.source}, tier ${result.tier})`, 'dim') : '';
    this.write(`${this.formatResultRow(result)}${origin}`);
  }

  progress(progress: ScanProgress): void {
    if (this.options.silent || progress.processed === 0 || progress.processed % this.progressEvery !== 0) return;
    this.write(
      this.paint(
        `   📊 Progress: ${progress.processed} probed, ${progress.accepted} found, ${progress.workers} workers`,
        'dim'
      )
    );
  }

  targetCompleted(report: TargetScanReport, showMetrics: boolean): void {
    if (this.options.silent) return;

    if (report.unreachable) {
      this.write(`   🚫 ${this.paint('TARGET UNREACHABLE', 'red')} (baseline failed)`);
      return;
    }

    const suffix = report.cancelled ? ' (interrupted, partial results)' : '';
    this.write(
      `\n--- ${report.target}: ${report.results.length} found in ${report.candidatesProcessed} probes${suffix} ---`
    );
    this.printTopFindings(report.results);
    if (showMetrics) this.printMetrics(report.metrics);
  }

  printMetrics(metrics: ScanMetricsSnapshot): void {
    this.write('\n--- Scan Metrics ---');
    this.write(`Requests Sent: ${metrics.requestsSent}`);
    this.write(`Transport Errors: ${metrics.transportErrors}`);
    this.write(`Cache Hit Rate: ${(metrics.cacheHitRate * 100).toFixed(1)}%`);
    this.write(`Baseline Rejections: ${metrics.baselineRejections}`);
    this.write(`Workers: ${metrics.currentWorkers} (peak ${metrics.peakWorkers})`);
    this.write(`Average Latency: ${metrics.averageLatencyMs.toFixed(0)} ms`);
    this.write(`Elapsed: ${(metrics.elapsedMs / 1000).toFixed(2)} s`);
    this.write('--------------------');
  }

  private printTopFindings(results: ScanResult[]): void {
    if (results.length === 0) return;

    // 200s first, then larger bodies
    const top = [...results]
      .sort((a, b) => Number(b.status === 200) - Number(a.status === 200) || b.size - a.size)
      .slice(0, 10);

    this.write(this.paint('Top Findings:', 'bold'));
    top.forEach((result, index) => {
      this.write(`${String(index + 1).padStart(2)}. ${this.formatResultRow(result)}`);
    });
  }
}
