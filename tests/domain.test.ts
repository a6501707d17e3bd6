import { describe, it, expect } from 'vitest';
import { domainBackupExtensions, generateDomainVariations } from '../src/scanner/domain-wordlist.js';
import { getDefaultCatalog } from '../src/scanner/catalog.js';
import { isHttpUrl, isIpAddress, normalizeUrl, splitHost } from '../src/utils/domain.js';

describe('splitHost', () => {
  it('splits a plain domain', () => {
    expect(splitHost('example.com')).toEqual({ hostname: 'example.com', subdomain: '', domain: 'example', suffix: 'com' });
  });

  it('recognizes two-label public suffixes', () => {
    expect(splitHost('Shop.Example.co.uk')).toEqual({
      hostname: 'shop.example.co.uk',
      subdomain: 'shop',
      domain: 'example',
      suffix: 'co.uk',
    });
    expect(splitHost('loja.exemplo.com.br').domain).toBe('exemplo');
  });

  it('keeps nested subdomains together', () => {
    expect(splitHost('a.b.example.org').subdomain).toBe('a.b');
  });

  it('returns no labels for IP addresses', () => {
    expect(splitHost('192.168.0.10')).toEqual({ hostname: '192.168.0.10', subdomain: '', domain: '', suffix: '' });
    expect(isIpAddress('[::1]')).toBe(true);
    expect(isIpAddress('example.com')).toBe(false);
  });

  it('handles single-label hosts', () => {
    expect(splitHost('localhost')).toEqual({ hostname: 'localhost', subdomain: '', domain: 'localhost', suffix: '' });
  });
});

describe('normalizeUrl', () => {
  it('lowercases the host, drops default ports, query and fragment, and collapses slashes', () => {
    expect(normalizeUrl('HTTP://Example.com:80//a//b.bak?x=1#top')).toBe('http://example.com/a/b.bak');
  });

  it('keeps non-default ports', () => {
    expect(normalizeUrl('https://example.com:8443/a')).toBe('https://example.com:8443/a');
  });

  it('accepts only http(s) URLs', () => {
    expect(isHttpUrl('https://example.com')).toBe(true);
    expect(isHttpUrl('ftp://example.com')).toBe(false);
    expect(isHttpUrl('example.com')).toBe(false);
  });
});

describe('generateDomainVariations', () => {
  const reference = new Date(2024, 0, 5);

  it('starts with the domain and subdomain permutations', () => {
    expect(generateDomainVariations('www.example.com', reference).slice(0, 8)).toEqual([
      'example',
      'www',
      'example.www',
      'www.example',
      'wwwexample',
      'examplewww',
      'www_example',
      'example_www',
    ]);
  });

  it('adds backup affixes, case variants and date stamps', () => {
    const variations = generateDomainVariations('example.com', reference);

    expect(variations).toContain('backup_example');
    expect(variations).toContain('examplebak');
    expect(variations).toContain('EXAMPLE');
    expect(variations).toContain('Example');
    expect(variations).toContain('example_20240105');
    expect(variations).toContain('example-2024-01-05');
    expect(variations).toContain('example2023');
    expect(variations).toContain('backup_2024');
    expect(new Set(variations).size).toBe(variations.length);
  });

  it('splits composite subdomains', () => {
    const variations = generateDomainVariations('api-v2.example.com', reference);
    expect(variations).toContain('api');
    expect(variations).toContain('v2');
    expect(variations).toContain('v2_api');
  });

  it('yields nothing for IP addresses', () => {
    expect(generateDomainVariations('10.0.0.1', reference)).toEqual([]);
  });

  it('caps the backup extensions', () => {
    const extensions = domainBackupExtensions(getDefaultCatalog());
    expect(extensions.length).toBeLessThanOrEqual(50);
    expect(extensions).toContain('zip');
    expect(extensions).toContain('sql');
  });
});
