import { describe, it, expect } from 'vitest';
import { buildScanConfig } from '../src/config/build.js';
import type { ScanConfigInput } from '../src/schemas/config.js';
import {
  CandidateGenerator,
  TIER,
  ancestorDirectories,
  appendExtension,
  splitTargetPath,
} from '../src/scanner/candidate-generator.js';
import { getDefaultCatalog } from '../src/scanner/catalog.js';
import { resolveLevel } from '../src/scanner/levels.js';
import { normalizeUrl } from '../src/utils/domain.js';
import type { Candidate } from '../src/types/scan.js';

const catalog = getDefaultCatalog();
const referenceDate = new Date(2024, 0, 5);

function generate(overrides: Partial<ScanConfigInput> = {}): Candidate[] {
  const config = buildScanConfig({ targets: ['https://example.com/'], ...overrides });
  const [target] = config.targets;
  if (target === undefined) throw new Error('no target');
  return [...new CandidateGenerator(target, { config, catalog, referenceDate })];
}

describe('path helpers', () => {
  it('appends extensions with or without a dot', () => {
    expect(appendExtension('index', 'php')).toBe('index.php');
    expect(appendExtension('config', '~')).toBe('config~');
    expect(appendExtension('site', '.bak')).toBe('site.bak');
  });

  it('splits a file target into directory and file name', () => {
    expect(splitTargetPath('/app/config.php')).toEqual({
      baseDirectory: '/app/',
      fileName: 'config.php',
      directorySegments: ['app'],
    });
  });

  it('treats a dotless last segment as a directory', () => {
    expect(splitTargetPath('/a/b')).toEqual({
      baseDirectory: '/a/b/',
      fileName: null,
      directorySegments: ['a', 'b'],
    });
    expect(splitTargetPath('/').baseDirectory).toBe('/');
  });

  it('lists ancestor directories deepest first without the root', () => {
    expect(ancestorDirectories(splitTargetPath('/a/b/c/'))).toEqual(['/a/b/', '/a/']);
    expect(ancestorDirectories(splitTargetPath('/'))).toEqual([]);
  });
});

describe('CandidateGenerator', () => {
  it('yields exactly the critical files at level 0', () => {
    const candidates = generate({ level: 0 });

    expect(candidates.map(candidate => candidate.url)).toEqual(
      catalog.files.critical.map(file => `https://example.com/${file}`)
    );
    expect(candidates.every(candidate => candidate.tier === TIER.critical)).toBe(true);
    expect(candidates.every(candidate => candidate.source === 'critical')).toBe(true);
  });

  it('places critical files in the target directory', () => {
    const candidates = generate({ targets: ['https://example.com/app/login.php'], level: 0 });
    expect(candidates[0]?.path).toBe('/app/certificate.pfx');
  });

  it('grows monotonically with the level', () => {
    const urls = (level: 1 | 2 | 3) => new Set(generate({ level }).map(candidate => candidate.url));
    const level1 = urls(1);
    const level2 = urls(2);
    const level3 = urls(3);

    expect([...level1].every(url => level2.has(url))).toBe(true);
    expect([...level2].every(url => level3.has(url))).toBe(true);
    expect(level2.size).toBeGreaterThan(level1.size);
    expect(level3.size).toBeGreaterThan(level2.size);
  });

  it('never yields the same normalized URL twice', () => {
    const candidates = generate({
      targets: ['https://shop.example.com/a/b/'],
      level: 2,
      bruteRecursive: true,
      domainWordlist: true,
      testIndex: true,
    });
    const normalized = candidates.map(candidate => normalizeUrl(candidate.url));
    expect(new Set(normalized).size).toBe(normalized.length);
  });

  it('emits tiers in non-decreasing order', () => {
    const candidates = generate({
      targets: ['https://example.com/a/b/'],
      level: 1,
      bruteRecursive: true,
      domainWordlist: true,
      testIndex: true,
    });
    const tiers = candidates.map(candidate => candidate.tier);
    expect(tiers).toEqual([...tiers].sort((a, b) => a - b));
    expect(new Set(tiers)).toEqual(new Set([1, 2, 3, 4, 5, 6]));
  });

  it('expands recursively into each parent directory', () => {
    const candidates = generate({ targets: ['https://example.com/a/b/c/'], level: 0, bruteRecursive: true });
    const directories = candidates
      .filter(candidate => candidate.source === 'recursive')
      .map(candidate => candidate.path);
    expect(directories).toEqual(['/a/b/', '/a/']);
  });

  it('uses custom words and keeps words that already carry a known extension', () => {
    const candidates = generate({
      level: 0,
      extensions: ['bak', 'sql'],
      words: ['dump.sql', 'wordx'],
      bruteForce: true,
    });
    const brute = candidates.filter(candidate => candidate.source === 'brute-force').map(candidate => candidate.path);
    expect(brute).toContain('/dump.sql');
    expect(brute).toContain('/wordx.bak');
    expect(brute).toContain('/wordx.sql');
    expect(brute).not.toContain('/dump.sql.bak');
  });

  it('sweeps the named file of a file target', () => {
    const candidates = generate({ targets: ['https://example.com/app/config.php'], level: 0, extensions: ['bak'] });
    expect(candidates.map(candidate => candidate.path)).toContain('/app/config.php.bak');
  });

  it('does not derive host-label names from an IP address', () => {
    const candidates = generate({ targets: ['http://10.0.0.1/'], level: 0, extensions: ['zip'], domainWordlist: true });
    const paths = candidates.map(candidate => candidate.path);
    expect(paths).toContain('/backup.zip');
    expect(paths.some(path => path.startsWith('/10.0.0.1'))).toBe(false);
    expect(candidates.some(candidate => candidate.source === 'domain')).toBe(false);
  });

  it('is single use', () => {
    const config = buildScanConfig({ targets: ['https://example.com/'], level: 0 });
    const generator = new CandidateGenerator('https://example.com/', { config, catalog });
    expect([...generator.candidates()]).toHaveLength(12);
    expect([...generator.candidates()]).toHaveLength(0);
    expect(generator.stats.emitted).toBe(12);
  });
});

describe('resolveLevel', () => {
  it('filters keyword groups by language', () => {
    const english = resolveLevel(catalog, 4, 'en').words;
    const portuguese = resolveLevel(catalog, 4, 'pt-br').words;

    expect(english).toContain('account');
    expect(english).not.toContain('boleto');
    expect(portuguese).toContain('boleto');
    expect(portuguese).not.toContain('account');
  });

  it('selects nothing but the critical files at level 0', () => {
    expect(resolveLevel(catalog, 0)).toEqual({
      level: 0,
      extensions: [],
      files: [],
      words: [],
      contextualExtensions: false,
    });
  });
});
