import type { ZodIssue } from 'zod';
import {
  DEFAULT_THREADS,
  ScanConfigSchema,
  type ScanConfig,
  type ScanConfigInput,
} from '../schemas/config.js';
import { ConfigurationError } from '../utils/errors.js';

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : 'config';
  return `${where}: ${issue.message}`;
}

/**
 * Validate raw options into the immutable scan configuration.
 * Throws ConfigurationError before any probing can start.
 */
export function buildScanConfig(input: ScanConfigInput): ScanConfig {
  const parsed = ScanConfigSchema.safeParse(input);

  if (!parsed.success) {
    const [first] = parsed.error.issues;
    const code = first?.path[0] === 'targets' ? 'INVALID_TARGET' : 'INVALID_CONFIG';
    throw new ConfigurationError(
      code,
      `Invalid configuration: ${parsed.error.issues.map(formatIssue).join('; ')}`,
      { cause: parsed.error }
    );
  }

  const config = parsed.data;

  if (config.threads !== undefined && config.adaptive) {
    throw new ConfigurationError(
      'CONFLICTING_OPTIONS',
      'An explicit thread count disables adaptive concurrency; pass either threads or adaptive, not both'
    );
  }

  if (config.verbose && config.silent) {
    throw new ConfigurationError('CONFLICTING_OPTIONS', 'verbose and silent cannot be combined');
  }

  if (config.minSize !== undefined && config.maxSize !== undefined && config.minSize > config.maxSize) {
    throw new ConfigurationError(
      'INVALID_CONFIG',
      `minSize (${config.minSize}) is greater than maxSize (${config.maxSize})`
    );
  }

  if (config.sampleBytes > config.largeFileThresholdBytes) {
    throw new ConfigurationError(
      'INVALID_CONFIG',
      'sampleBytes cannot exceed largeFileThresholdBytes'
    );
  }

  if (config.outputPerUrl && config.output === undefined) {
    throw new ConfigurationError('CONFLICTING_OPTIONS', 'outputPerUrl requires an output path');
  }

  return Object.freeze({
    ...config,
    threads: config.threads ?? DEFAULT_THREADS,
  });
}
