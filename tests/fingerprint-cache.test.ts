import { describe, it, expect } from 'vitest';
import { FingerprintCache, fingerprintKey, pathShape } from '../src/scanner/fingerprint-cache.js';

const entry = (hash: string) => ({ isBaselineMatch: true, hash });

describe('FingerprintCache', () => {
  it('evicts the least recently inserted key past capacity', () => {
    const cache = new FingerprintCache(2);
    cache.put('a', entry('1'));
    cache.put('b', entry('2'));
    cache.put('c', entry('3'));

    expect(cache.size).toBe(2);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.keys()).toEqual(['b', 'c']);
    expect(cache.evictionCount).toBe(1);
  });

  it('treats a read as a use', () => {
    const cache = new FingerprintCache(2);
    cache.put('a', entry('1'));
    cache.put('b', entry('2'));
    expect(cache.get('a')).toEqual(entry('1'));
    cache.put('c', entry('3'));

    expect(cache.keys()).toEqual(['a', 'c']);
  });

  it('replaces an existing key without evicting', () => {
    const cache = new FingerprintCache(2);
    cache.put('a', entry('1'));
    cache.put('b', entry('2'));
    cache.put('a', entry('9'));

    expect(cache.size).toBe(2);
    expect(cache.get('a')?.hash).toBe('9');
    expect(cache.evictionCount).toBe(0);
  });

  it('never holds more than its capacity', () => {
    const cache = new FingerprintCache(3);
    for (let i = 0; i < 50; i++) {
      cache.put(`key-${i}`, entry(String(i)));
      expect(cache.size).toBeLessThanOrEqual(3);
    }
    expect(cache.keys()).toEqual(['key-47', 'key-48', 'key-49']);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new FingerprintCache(0)).toThrow(RangeError);
  });
});

describe('pathShape', () => {
  it('reduces paths to their structural shape', () => {
    expect(pathShape({ path: '/admin/', extension: null })).toBe('/');
    expect(pathShape({ path: '/index.php.bak', extension: 'php.bak' })).toBe('*.php.bak');
    expect(pathShape({ path: '/config~', extension: '~' })).toBe('*~');
    expect(pathShape({ path: '/.env', extension: null })).toBe('.env');
    expect(pathShape({ path: '/.git/config', extension: null })).toBe('*');
    expect(pathShape({ path: '/web.config', extension: null })).toBe('*.config');
  });

  it('keys by method, status and shape', () => {
    expect(fingerprintKey({ path: '/a/site.bak', extension: 'bak' }, 200)).toBe('GET:200:*.bak');
    expect(fingerprintKey({ path: '/b/other.bak', extension: 'bak' }, 200)).toBe('GET:200:*.bak');
    expect(fingerprintKey({ path: '/a/', extension: null }, 403, 'HEAD')).toBe('HEAD:403:/');
  });
});
