import { z } from 'zod';
import { isHttpUrl } from '../utils/domain.js';

export const DEFAULT_THREADS = 10;
export const DEFAULT_TIMEOUT_MS = 5000;
export const DEFAULT_LARGE_FILE_THRESHOLD = 10 * 1024 * 1024;

export const ScanLevelSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

export const LanguageFilterSchema = z.enum(['en', 'pt-br', 'all']);

const TargetUrlSchema = z.string().refine(isHttpUrl, { message: 'must be an absolute http(s) URL' });

const PositiveInt = z.number().int().positive();
const NonNegativeInt = z.number().int().nonnegative();
const Fraction = z.number().min(0).max(1);

export const ScanConfigSchema = z
  .object({
    targets: z.array(TargetUrlSchema).min(1),
    level: ScanLevelSchema.default(2),
    extensions: z.array(z.string().min(1)).min(1).optional(),
    words: z.array(z.string().min(1)).min(1).optional(),
    bruteForce: z.boolean().default(false),
    bruteRecursive: z.boolean().default(false),
    domainWordlist: z.boolean().default(false),
    testIndex: z.boolean().default(false),
    language: LanguageFilterSchema.default('all'),

    threads: PositiveInt.max(500).optional(),
    adaptive: z.boolean().default(false),
    maxThreads: PositiveInt.max(500).default(50),
    rateLimit: z.number().positive().optional(),
    delayMs: NonNegativeInt.optional(),
    timeoutMs: PositiveInt.default(DEFAULT_TIMEOUT_MS),

    verifyTls: z.boolean().default(true),
    followRedirects: z.boolean().default(true),
    headers: z.record(z.string()).default({}),
    userAgent: z.string().min(1).optional(),
    rotateUserAgent: z.boolean().default(false),

    ignoreContentTypes: z.array(z.string().min(1)).default([]),
    statusFilter: z.array(z.number().int().min(100).max(599)).min(1).optional(),
    ignoreStatuses: z.array(z.number().int().min(100).max(599)).default([404]),
    minSize: NonNegativeInt.optional(),
    maxSize: NonNegativeInt.optional(),

    largeFileThresholdBytes: PositiveInt.default(DEFAULT_LARGE_FILE_THRESHOLD),
    sampleBytes: PositiveInt.default(4096),
    cacheCapacity: PositiveInt.default(1024),
    baselineProbes: PositiveInt.max(20).default(3),
    baselineConsensus: Fraction.default(0.66),
    sizeTolerance: Fraction.default(0.05),
    skipBaseline: z.boolean().default(false),

    output: z.string().min(1).optional(),
    outputPerUrl: z.boolean().default(false),
    metrics: z.boolean().default(false),
    verbose: z.boolean().default(false),
    silent: z.boolean().default(false),
    noColor: z.boolean().default(false),
    logFile: z.string().min(1).optional(),
  })
  .strict();

export type ScanConfigInput = z.input<typeof ScanConfigSchema>;
export type ParsedScanConfig = z.output<typeof ScanConfigSchema>;

// threads is always resolved once the config is built
export type ScanConfig = Readonly<Omit<ParsedScanConfig, 'threads'> & { threads: number }>;
