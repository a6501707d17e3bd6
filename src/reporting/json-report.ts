import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Confidence, InterestCategory, ScanLevel, TargetScanReport } from '../types/scan.js';

export interface ReportEntry {
  url: string;
  status: number;
  size: number;
  contentType: string | null;
  hash: string;
  confidence: Confidence;
  category: InterestCategory;
  partial: boolean;
}

export interface ReportMetricsSummary {
  totalRequests: number;
  cacheHitRate: number;
  finalWorkers: number;
  peakWorkers: number;
  elapsedMs: number;
  baselineRejections: number;
  transportErrors: number;
}

export interface ReportDocument {
  target: string;
  timestamp: string;
  level: ScanLevel;
  cancelled: boolean;
  unreachable: boolean;
  results: ReportEntry[];
  metrics?: ReportMetricsSummary;
}

export interface WriteReportOptions {
  output: string;
  outputPerUrl: boolean;
  includeMetrics: boolean;
}

export function buildReportDocument(report: TargetScanReport, includeMetrics: boolean): ReportDocument {
  const document: ReportDocument = {
    target: report.target,
    timestamp: report.timestamp,
    level: report.level,
    cancelled: report.cancelled,
    unreachable: report.unreachable,
    results: report.results.map(result => ({
      url: result.finalUrl,
      status: result.status,
      size: result.size,
      contentType: result.contentType,
      hash: result.hash,
      confidence: result.confidence,
      category: result.category,
      partial: result.partial,
    })),
  };

  if (includeMetrics) {
    const { metrics } = report;
    document.metrics = {
      totalRequests: metrics.requestsSent,
      cacheHitRate: metrics.cacheHitRate,
      finalWorkers: metrics.currentWorkers,
      peakWorkers: metrics.peakWorkers,
      elapsedMs: metrics.elapsedMs,
      baselineRejections: metrics.baselineRejections,
      transportErrors: metrics.transportErrors,
    };
  }

  return document;
}

/**
 * File name for one target's report: `<stem>_<host>_<path>.json` next to `output`,
 * or `<stem>_<host>.json` for a root target.
 */
export function perUrlReportPath(output: string, target: string): string {
  const parsed = new URL(target);
  const stem = path.basename(output).split('.')[0] || 'report';
  const host = parsed.host.replace(/:/g, '_');
  const urlPath = parsed.pathname.replace(/\//g, '_').replace(/^_+|_+$/g, '');
  const fileName = urlPath ? `${stem}_${host}_${urlPath}.json` : `${stem}_${host}.json`;
  return path.join(path.dirname(output), fileName);
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
}

/** Writes the reports and returns the paths written. */
export async function writeReports(reports: TargetScanReport[], options: WriteReportOptions): Promise<string[]> {
  const documents = reports.map(report => buildReportDocument(report, options.includeMetrics));

  if (options.outputPerUrl) {
    const written: string[] = [];
    for (const document of documents) {
      const filePath = perUrlReportPath(options.output, document.target);
      await writeJson(filePath, document);
      written.push(filePath);
    }
    return written;
  }

  await writeJson(options.output, documents.length === 1 ? documents[0] : documents);
  return [options.output];
}
