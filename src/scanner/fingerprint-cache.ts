import type { Candidate } from '../types/scan.js';

export interface FingerprintEntry {
  isBaselineMatch: boolean;
  hash: string;
}

/**
 * Structural shape of a probed path: "/" for directories, "*.ext" for files
 * with an extension, "*" otherwise. Identical shapes across directories share a key.
 */
export function pathShape(candidate: Pick<Candidate, 'path' | 'extension'>): string {
  if (candidate.path.endsWith('/')) return '/';
  if (candidate.extension !== null) {
    const ext = candidate.extension;
    return ext.startsWith('.') || ext.startsWith('~') ? `*${ext}` : `*.${ext}`;
  }

  const name = candidate.path.slice(candidate.path.lastIndexOf('/') + 1);
  const dot = name.indexOf('.', 1);
  if (name.startsWith('.')) return name.slice(0, dot === -1 ? undefined : dot);
  return dot === -1 ? '*' : `*${name.slice(dot)}`;
}

export function fingerprintKey(candidate: Pick<Candidate, 'path' | 'extension'>, status: number, method = 'GET'): string {
  return `${method}:${status}:${pathShape(candidate)}`;
}

/**
 * Bounded LRU map. A Map keeps insertion order, so re-inserting on access
 * moves an entry to the most-recently-used end and the first key is the eviction victim.
 * All operations are synchronous and complete within one turn of the event loop.
 */
export class FingerprintCache {
  private readonly entries = new Map<string, FingerprintEntry>();
  readonly capacity: number;
  private evictions = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get(key: string): FingerprintEntry | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry;
  }

  put(key: string, entry: FingerprintEntry): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    }
    this.entries.set(key, entry);

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get evictionCount(): number {
    return this.evictions;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
