import type { Catalog } from '../schemas/catalog.js';
import type { ScanConfig } from '../schemas/config.js';
import type { Candidate, CandidateSource } from '../types/scan.js';
import { isIpAddress, normalizeUrl, splitHost } from '../utils/domain.js';
import { domainBackupExtensions, generateDomainVariations } from './domain-wordlist.js';
import { contextualExtensions, optimizeExtensions } from './extension-optimizer.js';
import { isSensitiveExtension, resolveLevel } from './levels.js';

const LEFTOVER_NAMES = ['backup', 'bak', 'old', 'temp', 'archive', 'test'];
const ENVIRONMENT_NAMES = ['dev', 'test', 'staging', 'prod', 'debug'];
const DOMAIN_AFFIXES = ['backup', 'old', 'bak', 'temp'];

export const TIER = {
  critical: 1,
  index: 2,
  sweep: 3,
  bruteForce: 4,
  domain: 5,
  recursive: 6,
} as const;

export interface CandidateGeneratorOptions {
  config: ScanConfig;
  catalog: Catalog;
  /** Reference date for date-stamped domain names. */
  referenceDate?: Date;
}

export interface TargetPath {
  /** Directory the target points into, always ending with "/". */
  baseDirectory: string;
  /** Last segment when it names a file (contains a dot). */
  fileName: string | null;
  directorySegments: string[];
}

export function appendExtension(name: string, extension: string): string {
  return extension.startsWith('~') || extension.startsWith('.') ? `${name}${extension}` : `${name}.${extension}`;
}

export function splitTargetPath(pathname: string): TargetPath {
  const segments = pathname.split('/').filter(segment => segment.length > 0);
  const last = segments[segments.length - 1];
  const fileName = last !== undefined && last.includes('.') ? last : null;
  const directorySegments = fileName === null ? segments : segments.slice(0, -1);
  const baseDirectory = directorySegments.length === 0 ? '/' : `/${directorySegments.join('/')}/`;
  return { baseDirectory, fileName, directorySegments };
}

/** Directories above the base directory, deepest first, root excluded. */
export function ancestorDirectories(target: TargetPath): string[] {
  const ancestors: string[] = [];
  for (let depth = target.directorySegments.length - 1; depth >= 1; depth--) {
    ancestors.push(`/${target.directorySegments.slice(0, depth).join('/')}/`);
  }
  return ancestors;
}

function encodePath(path: string): string {
  return path.replace(/[?#%\s]/g, char => encodeURIComponent(char));
}

/**
 * Lazily yields the candidate paths for one target in priority order:
 * critical files, index variants, extension sweep, brute force,
 * domain-derived names, then recursive expansion of parent directories.
 * A normalized URL is never yielded twice. Single use: create one per target scan.
 */
export class CandidateGenerator implements Iterable<Candidate> {
  private readonly target: URL;
  private readonly targetPath: TargetPath;
  private readonly config: ScanConfig;
  private readonly catalog: Catalog;
  private readonly referenceDate: Date;
  private readonly seen = new Set<string>();
  private readonly extensions: string[];
  private readonly extensionSet: Set<string>;
  private readonly specificFiles: string[];
  private readonly words: string[];
  private readonly directoryNames: string[];
  private started = false;
  private emitted = 0;
  private suppressed = 0;

  constructor(targetUrl: string, options: CandidateGeneratorOptions) {
    this.target = new URL(targetUrl);
    this.targetPath = splitTargetPath(this.target.pathname);
    this.config = options.config;
    this.catalog = options.catalog;
    this.referenceDate = options.referenceDate ?? new Date();

    const selection = resolveLevel(this.catalog, this.config.level, this.config.language);
    const baseExtensions = this.config.extensions ?? [
      ...selection.extensions,
      ...(selection.contextualExtensions ? contextualExtensions(targetUrl) : []),
    ];
    this.extensions = optimizeExtensions([...new Set(baseExtensions)], targetUrl, this.catalog);
    this.extensionSet = new Set(this.extensions);
    this.specificFiles = selection.files;
    this.words = this.config.words ?? selection.words;
    this.directoryNames = this.buildDirectoryNames();
  }

  get stats(): { emitted: number; suppressed: number } {
    return { emitted: this.emitted, suppressed: this.suppressed };
  }

  [Symbol.iterator](): Iterator<Candidate> {
    return this.candidates();
  }

  *candidates(): Generator<Candidate, void, undefined> {
    if (this.started) return;
    this.started = true;

    const base = this.targetPath.baseDirectory;
    const bruteForce = this.config.bruteForce || this.config.bruteRecursive;

    yield* this.criticalFiles(base);
    if (this.config.testIndex) yield* this.indexVariants(base, TIER.index);
    yield* this.specificFileCandidates(base);
    yield* this.extensionSweep(base, TIER.sweep);
    if (bruteForce) yield* this.bruteForce(base, TIER.bruteForce);
    if (this.config.domainWordlist) yield* this.domainNames(base, TIER.domain);

    if (!this.config.bruteRecursive) return;

    // Explicit work queue of parent directories instead of recursion
    const queue = ancestorDirectories(this.targetPath);
    while (queue.length > 0) {
      const directory = queue.shift();
      if (directory === undefined) break;

      yield* this.emit(directory, TIER.recursive, 'recursive', null, false);
      if (this.config.testIndex) yield* this.indexVariants(directory, TIER.recursive);
      yield* this.extensionSweep(directory, TIER.recursive);
      yield* this.bruteForce(directory, TIER.recursive);
      if (this.config.domainWordlist) yield* this.domainNames(directory, TIER.recursive);
    }
  }

  private *criticalFiles(directory: string): Generator<Candidate> {
    for (const file of this.catalog.files.critical) {
      yield* this.emit(`${directory}${file}`, TIER.critical, 'critical', null, true);
    }
  }

  private *indexVariants(directory: string, tier: number): Generator<Candidate> {
    for (const ext of this.extensions) {
      yield* this.emit(`${directory}${appendExtension('index', ext)}`, tier, 'index', ext, false);
    }
  }

  private *specificFileCandidates(directory: string): Generator<Candidate> {
    const vcs = new Set(this.catalog.files.vcs);
    for (const file of this.specificFiles) {
      yield* this.emit(`${directory}${file}`, TIER.sweep, 'specific', null, vcs.has(file));
    }
  }

  private *extensionSweep(directory: string, tier: number): Generator<Candidate> {
    const prefixes = this.pathPrefixes();
    for (const ext of this.extensions) {
      const interesting = isSensitiveExtension(this.catalog, ext);
      for (const prefix of prefixes) {
        yield* this.emit(appendExtension(prefix, ext), tier, 'extension', ext, interesting);
      }
      for (const name of this.directoryNames) {
        yield* this.emit(`${directory}${appendExtension(name, ext)}`, tier, 'extension', ext, interesting);
      }
    }
  }

  private *bruteForce(directory: string, tier: number): Generator<Candidate> {
    for (const word of this.words) {
      if (this.carriesExtension(word)) {
        yield* this.emit(`${directory}${word}`, tier, 'brute-force', null, false);
        continue;
      }
      for (const ext of this.extensions) {
        const interesting = isSensitiveExtension(this.catalog, ext);
        yield* this.emit(`${directory}${appendExtension(word, ext)}`, tier, 'brute-force', ext, interesting);
      }
    }
  }

  private *domainNames(directory: string, tier: number): Generator<Candidate> {
    const variations = generateDomainVariations(this.target.hostname, this.referenceDate);
    const extensions = domainBackupExtensions(this.catalog);
    for (const variation of variations) {
      for (const ext of extensions) {
        yield* this.emit(`${directory}${appendExtension(variation, ext)}`, tier, 'domain', ext, true);
      }
    }
  }

  private *emit(
    path: string,
    tier: number,
    source: CandidateSource,
    extension: string | null,
    interesting: boolean
  ): Generator<Candidate> {
    const url = `${this.target.origin}${encodePath(path)}`;
    const key = normalizeUrl(url);
    if (this.seen.has(key)) {
      this.suppressed++;
      return;
    }
    this.seen.add(key);
    this.emitted++;
    yield { url, path, tier, source, extension, interesting };
  }

  private carriesExtension(word: string): boolean {
    const dot = word.lastIndexOf('.');
    return dot > 0 && this.extensionSet.has(word.slice(dot + 1));
  }

  /** Absolute prefixes swept in place: the named file, then each dotless directory level. */
  private pathPrefixes(): string[] {
    const prefixes: string[] = [];
    const { baseDirectory, fileName, directorySegments } = this.targetPath;
    if (fileName !== null) prefixes.push(`${baseDirectory}${fileName}`);
    for (let depth = directorySegments.length; depth >= 1; depth--) {
      const segment = directorySegments[depth - 1];
      if (segment !== undefined && !segment.includes('.')) {
        prefixes.push(`/${directorySegments.slice(0, depth).join('/')}`);
      }
    }
    return prefixes;
  }

  /** Base names tried inside a directory: host labels, domain backups, common leftovers. */
  private buildDirectoryNames(): string[] {
    const names: string[] = [];
    const hostname = this.target.hostname.toLowerCase();

    if (!isIpAddress(hostname)) {
      const { subdomain, domain, suffix } = splitHost(hostname);
      if (subdomain) {
        names.push(...subdomain.split('.'), subdomain);
      }
      if (domain) {
        names.push(domain);
        if (suffix) names.push(`${domain}.${suffix}`);
      }
      names.push(hostname);
      if (domain) {
        for (const affix of DOMAIN_AFFIXES) {
          names.push(`${domain}_${affix}`, `${affix}_${domain}`);
        }
      }
    }

    names.push(...LEFTOVER_NAMES, ...ENVIRONMENT_NAMES);
    return [...new Set(names.filter(name => name.length > 0))];
  }
}
