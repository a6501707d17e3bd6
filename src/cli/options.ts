import { InvalidArgumentError } from 'commander';
import { buildScanConfig } from '../config/build.js';
import { LanguageFilterSchema, type ScanConfig, type ScanConfigInput } from '../schemas/config.js';
import { SCAN_LEVELS } from '../scanner/levels.js';
import type { LanguageFilter, ScanLevel } from '../types/scan.js';
import { ConfigurationError } from '../utils/errors.js';
import { readLineList } from '../utils/files.js';

// Kept a type alias for commander's opts<T>()
export type CliOptions = {
  url?: string;
  list?: string;
  extensions?: string;
  wordlist?: string;
  timeout?: number;
  threads?: number;
  adaptive?: boolean;
  maxThreads?: number;
  rateLimit?: number;
  delay?: number;
  header?: string[];
  userAgent?: string;
  randomAgent?: boolean;
  ignoreContent?: string;
  status?: string;
  minSize?: number;
  maxSize?: number;
  brute?: boolean;
  bruteRecursive?: boolean;
  domainWordlist?: boolean;
  testIndex?: boolean;
  level?: number;
  lang?: string;
  insecure?: boolean;
  skipBaseline?: boolean;
  baselineConsensus?: number;
  output?: string;
  outputPerUrl?: boolean;
  metrics?: boolean;
  verbose?: boolean;
  silent?: boolean;
  color?: boolean;
  logFile?: string;
};

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function parseStatusList(value: string): number[] {
  return splitList(value).map(item => {
    const status = Number(item);
    if (!Number.isInteger(status)) {
      throw new ConfigurationError('INVALID_CONFIG', `Invalid status code "${item}"`);
    }
    return status;
  });
}

export function toScanLevel(value: number): ScanLevel {
  const level = SCAN_LEVELS.find(candidate => candidate === value);
  if (level === undefined) {
    throw new ConfigurationError('INVALID_CONFIG', `Invalid scan level ${value}; expected 0-4`);
  }
  return level;
}

export function toLanguage(value: string): LanguageFilter {
  const parsed = LanguageFilterSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new ConfigurationError('INVALID_CONFIG', `Invalid language "${value}"; expected en, pt-br or all`);
  }
  return parsed.data;
}

/** Parse repeated `Name: value` header flags. */
export function parseHeaders(values: string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const raw of values) {
    const separator = raw.indexOf(':');
    const name = separator > 0 ? raw.slice(0, separator).trim() : '';
    if (!name) {
      throw new ConfigurationError('INVALID_CONFIG', `Invalid header "${raw}", expected "Name: value"`);
    }
    headers[name] = raw.slice(separator + 1).trim();
  }
  return headers;
}

function takeUserAgent(headers: Record<string, string>): { headers: Record<string, string>; userAgent?: string } {
  const rest: Record<string, string> = {};
  let userAgent: string | undefined;
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === 'user-agent') {
      userAgent = value;
    } else {
      rest[name] = value;
    }
  }
  return userAgent === undefined ? { headers: rest } : { headers: rest, userAgent };
}

/**
 * Turn parsed command-line flags into the validated scan configuration,
 * reading target lists and wordlists from disk first.
 */
export async function configFromCli(options: CliOptions): Promise<ScanConfig> {
  const targets: string[] = [];
  if (options.url) targets.push(options.url);
  if (options.list) targets.push(...(await readLineList(options.list)));
  if (targets.length === 0) {
    throw new ConfigurationError('INVALID_TARGET', 'No target given; use --url or --list');
  }

  let words: string[] | undefined;
  if (options.wordlist) {
    words = await readLineList(options.wordlist);
    if (words.length === 0) {
      throw new ConfigurationError('INVALID_CONFIG', `Wordlist ${options.wordlist} contains no entries`);
    }
  }

  const { headers, userAgent: headerUserAgent } = takeUserAgent(parseHeaders(options.header ?? []));
  const userAgent = options.userAgent ?? headerUserAgent;

  const input: ScanConfigInput = {
    targets,
    headers,
    bruteForce: options.brute ?? false,
    bruteRecursive: options.bruteRecursive ?? false,
    domainWordlist: options.domainWordlist ?? false,
    testIndex: options.testIndex ?? false,
    adaptive: options.adaptive ?? false,
    rotateUserAgent: options.randomAgent ?? false,
    verifyTls: !(options.insecure ?? false),
    skipBaseline: options.skipBaseline ?? false,
    outputPerUrl: options.outputPerUrl ?? false,
    metrics: options.metrics ?? false,
    verbose: options.verbose ?? false,
    silent: options.silent ?? false,
    noColor: options.color === false,
    ...(options.level !== undefined ? { level: toScanLevel(options.level) } : {}),
    ...(options.lang !== undefined ? { language: toLanguage(options.lang) } : {}),
    ...(options.extensions !== undefined ? { extensions: splitList(options.extensions) } : {}),
    ...(words !== undefined ? { words } : {}),
    ...(options.timeout !== undefined ? { timeoutMs: Math.round(options.timeout * 1000) } : {}),
    ...(options.threads !== undefined ? { threads: options.threads } : {}),
    ...(options.maxThreads !== undefined ? { maxThreads: options.maxThreads } : {}),
    ...(options.rateLimit !== undefined ? { rateLimit: options.rateLimit } : {}),
    ...(options.delay !== undefined ? { delayMs: options.delay } : {}),
    ...(userAgent !== undefined ? { userAgent } : {}),
    ...(options.ignoreContent !== undefined ? { ignoreContentTypes: splitList(options.ignoreContent) } : {}),
    ...(options.status !== undefined ? { statusFilter: parseStatusList(options.status) } : {}),
    ...(options.minSize !== undefined ? { minSize: options.minSize } : {}),
    ...(options.maxSize !== undefined ? { maxSize: options.maxSize } : {}),
    ...(options.baselineConsensus !== undefined ? { baselineConsensus: options.baselineConsensus } : {}),
    ...(options.output !== undefined ? { output: options.output } : {}),
    ...(options.logFile !== undefined ? { logFile: options.logFile } : {}),
  };

  return buildScanConfig(input);
}
