import type { Catalog } from '../schemas/catalog.js';

export interface TargetContext {
  backupSite: boolean;
  development: boolean;
  admin: boolean;
  api: boolean;
  frameworks: string[];
}

const BACKUP_INDICATORS = ['backup', 'bkp', 'archive', 'old', 'temp', 'tmp', 'staging', 'test', 'dev', 'development'];
const DEV_INDICATORS = ['dev', 'test', 'staging', 'beta', 'alpha', 'demo', 'sandbox', 'lab', 'experimental'];
const ADMIN_INDICATORS = ['admin', 'manage', 'control', 'panel', 'dashboard'];
const API_INDICATORS = ['api', 'service', 'webservice', 'rest', 'graphql'];

const FRAMEWORK_HINTS: Array<{ pattern: RegExp; framework: string }> = [
  { pattern: /\.php\b|wp-|wordpress|joomla|drupal/, framework: 'php' },
  { pattern: /\.aspx\b/, framework: 'aspx' },
  { pattern: /\.asp\b/, framework: 'asp' },
  { pattern: /\.jsp\b|\.do\b/, framework: 'jsp' },
  { pattern: /\.py\b|django|flask/, framework: 'py' },
  { pattern: /\.rb\b|rails/, framework: 'rb' },
];

const BACKUP_LIKELIHOOD: Record<string, number> = {
  sql: 10, dump: 10, db: 10,
  zip: 9, rar: 9, 'tar.gz': 9, '7z': 9,
  bak: 8, backup: 8, old: 8,
  tar: 7, gz: 7, bz2: 7,
  tmp: 6, temp: 6, save: 6,
};

const CONTEXTUAL_EXTENSIONS = {
  backupSite: ['sql.gz', 'sql.bz2', 'db.gz', 'dump.gz', 'tar.bz2', 'tar.xz', 'backup.zip'],
  development: ['env.backup', 'config.bak', 'settings.old', 'local.env', 'dev.config', 'test.json'],
  admin: ['users.sql', 'admin.bak', 'passwords.txt', 'credentials.json', 'keys.txt'],
  api: ['swagger.json', 'openapi.json', 'api.json', 'schema.json'],
};

export function analyzeTargetContext(targetUrl: string): TargetContext {
  const parsed = new URL(targetUrl);
  const hostname = parsed.hostname.toLowerCase();
  const path = parsed.pathname.toLowerCase();
  const either = (indicator: string): boolean => hostname.includes(indicator) || path.includes(indicator);

  return {
    backupSite: BACKUP_INDICATORS.some(either),
    development: DEV_INDICATORS.some(indicator => hostname.includes(indicator)),
    admin: ADMIN_INDICATORS.some(either),
    api: API_INDICATORS.some(either),
    frameworks: FRAMEWORK_HINTS.filter(hint => hint.pattern.test(path) || hint.pattern.test(hostname)).map(
      hint => hint.framework
    ),
  };
}

/**
 * Reorder extensions by how likely they are to surface a leftover on this target.
 * Never adds or removes entries.
 */
export function optimizeExtensions(extensions: readonly string[], targetUrl: string, catalog: Catalog): string[] {
  if (extensions.length === 0) return [];

  const context = analyzeTargetContext(targetUrl);
  const high = new Set([
    ...catalog.extensions.archive,
    ...catalog.extensions.backupSuffixes,
    ...catalog.extensions.database,
  ]);
  const medium = new Set([...catalog.extensions.configLog, ...catalog.extensions.document]);
  const low = new Set(catalog.extensions.codeBackup);

  const framework: string[] = [];
  const highExts: string[] = [];
  const mediumExts: string[] = [];
  const lowExts: string[] = [];
  const unknownExts: string[] = [];

  for (const ext of extensions) {
    const base = ext.replace(/[.~].*$/, '');
    if (context.frameworks.length > 0 && low.has(ext) && context.frameworks.includes(base)) {
      framework.push(ext);
    } else if (high.has(ext)) {
      highExts.push(ext);
    } else if (medium.has(ext)) {
      mediumExts.push(ext);
    } else if (low.has(ext)) {
      lowExts.push(ext);
    } else {
      unknownExts.push(ext);
    }
  }

  if (context.backupSite) {
    const sorted = [...highExts].sort((a, b) => (BACKUP_LIKELIHOOD[b] ?? 0) - (BACKUP_LIKELIHOOD[a] ?? 0));
    return [...framework, ...sorted, ...mediumExts, ...unknownExts, ...lowExts];
  }
  if (context.development) {
    return [...framework, ...mediumExts, ...highExts, ...unknownExts, ...lowExts];
  }
  return [...framework, ...highExts, ...mediumExts, ...unknownExts, ...lowExts];
}

export function contextualExtensions(targetUrl: string): string[] {
  const context = analyzeTargetContext(targetUrl);
  const extra: string[] = [];
  if (context.backupSite) extra.push(...CONTEXTUAL_EXTENSIONS.backupSite);
  if (context.development) extra.push(...CONTEXTUAL_EXTENSIONS.development);
  if (context.admin) extra.push(...CONTEXTUAL_EXTENSIONS.admin);
  if (context.api) extra.push(...CONTEXTUAL_EXTENSIONS.api);
  return [...new Set(extra)];
}
