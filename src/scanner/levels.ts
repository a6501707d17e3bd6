import type { Catalog, ExtensionGroup, FileGroup, WordGroup } from '../schemas/catalog.js';
import type { LanguageFilter, ScanLevel } from '../types/scan.js';

interface GroupPick<T extends string> {
  group: T;
  limit?: number;
}

interface LevelAdditions {
  extensions: GroupPick<ExtensionGroup>[];
  files: GroupPick<FileGroup>[];
  words: GroupPick<WordGroup>[];
  contextualExtensions?: boolean;
}

export const SCAN_LEVELS: readonly ScanLevel[] = [0, 1, 2, 3, 4];

// Each level lists only what it adds on top of the previous one
const LEVEL_ADDITIONS: Record<ScanLevel, LevelAdditions> = {
  0: { extensions: [], files: [], words: [] },
  1: {
    extensions: [{ group: 'criticalBackup', limit: 15 }],
    files: [],
    words: [{ group: 'core', limit: 5 }],
  },
  2: {
    extensions: [
      { group: 'criticalBackup' },
      { group: 'configLog' },
      { group: 'security', limit: 20 },
      { group: 'database', limit: 10 },
      { group: 'config', limit: 15 },
      { group: 'codeBackup', limit: 20 },
    ],
    files: [{ group: 'specific', limit: 30 }],
    words: [{ group: 'core' }],
  },
  3: {
    extensions: [
      { group: 'security' },
      { group: 'codeBackup' },
      { group: 'database' },
      { group: 'config' },
      { group: 'archive' },
      { group: 'document' },
      { group: 'buildConfig' },
      { group: 'ideLeftover' },
    ],
    files: [{ group: 'specific' }, { group: 'vcs' }],
    words: [
      { group: 'files' },
      { group: 'backupDirectory', limit: 40 },
      { group: 'webRelated' },
      { group: 'enCommon', limit: 40 },
      { group: 'ptbrCommon', limit: 30 },
      { group: 'versionControl' },
      { group: 'dateVersion', limit: 20 },
    ],
    contextualExtensions: true,
  },
  4: {
    extensions: [{ group: 'extras' }],
    files: [],
    words: [
      { group: 'backupDirectory' },
      { group: 'enCommon' },
      { group: 'ptbrCommon' },
      { group: 'dateVersion' },
      { group: 'ptbrBusiness' },
      { group: 'ptbrCorporate' },
      { group: 'ptbrTechnical' },
      { group: 'databaseConfig' },
    ],
  },
};

export interface LevelSelection {
  level: ScanLevel;
  extensions: string[];
  files: string[];
  words: string[];
  contextualExtensions: boolean;
}

function pushUnique(target: string[], seen: Set<string>, values: readonly string[]): void {
  for (const value of values) {
    if (!seen.has(value)) {
      seen.add(value);
      target.push(value);
    }
  }
}

function takeLimit(values: readonly string[], limit: number | undefined): readonly string[] {
  return limit === undefined ? values : values.slice(0, limit);
}

export function wordGroupMatches(languages: readonly string[], filter: LanguageFilter): boolean {
  return filter === 'all' || languages.includes(filter);
}

/**
 * Resolve the cumulative extension, file and keyword sets for a level.
 * Selections grow monotonically with the level.
 */
export function resolveLevel(catalog: Catalog, level: ScanLevel, language: LanguageFilter = 'all'): LevelSelection {
  const extensions: string[] = [];
  const files: string[] = [];
  const words: string[] = [];
  const seenExtensions = new Set<string>();
  const seenFiles = new Set<string>();
  const seenWords = new Set<string>();
  let contextualExtensions = false;

  for (const current of SCAN_LEVELS) {
    if (current > level) break;
    const additions = LEVEL_ADDITIONS[current];

    for (const pick of additions.extensions) {
      pushUnique(extensions, seenExtensions, takeLimit(catalog.extensions[pick.group], pick.limit));
    }
    for (const pick of additions.files) {
      pushUnique(files, seenFiles, takeLimit(catalog.files[pick.group], pick.limit));
    }
    for (const pick of additions.words) {
      const group = catalog.words[pick.group];
      if (wordGroupMatches(group.languages, language)) {
        pushUnique(words, seenWords, takeLimit(group.words, pick.limit));
      }
    }
    contextualExtensions ||= additions.contextualExtensions ?? false;
  }

  return { level, extensions, files, words, contextualExtensions };
}

export function isSensitiveExtension(catalog: Catalog, extension: string): boolean {
  return catalog.extensions.security.includes(extension) || catalog.extensions.database.includes(extension);
}
