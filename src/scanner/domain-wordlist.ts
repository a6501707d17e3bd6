import type { Catalog } from '../schemas/catalog.js';
import { splitHost } from '../utils/domain.js';

const BACKUP_AFFIXES = ['backup', 'bak', 'old', 'temp'];
const MAX_VARIATIONS = 100;
const MAX_EXTENSIONS = 50;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function capitalize(value: string): string {
  return value.length === 0 ? value : value.charAt(0).toUpperCase() + value.slice(1);
}

function compositePermutations(subdomain: string): string[] {
  const separator = ['-', '_', '.'].find(sep => subdomain.includes(sep));
  if (separator === undefined) return [];

  const [first, second] = subdomain.split(separator);
  if (!first || !second) return [];

  const variations = [first, second];
  for (const sep of ['.', '_', '-', '']) {
    variations.push(`${first}${sep}${second}`, `${second}${sep}${first}`);
  }
  return variations;
}

function dateStamps(reference: Date): string[] {
  const year = reference.getFullYear();
  const stamp = `${year}${pad(reference.getMonth() + 1)}${pad(reference.getDate())}`;
  const dashed = `${year}-${pad(reference.getMonth() + 1)}-${pad(reference.getDate())}`;
  return [stamp, dashed, String(year), String(year - 1)];
}

/**
 * Derive backup-style base names from a hostname: label permutations,
 * backup affixes, case variants and date stamps.
 */
export function generateDomainVariations(hostname: string, reference: Date = new Date()): string[] {
  const { subdomain, domain } = splitHost(hostname);
  if (!domain) return [];

  const variations: string[] = [domain];

  if (subdomain) {
    variations.push(
      subdomain,
      `${domain}.${subdomain}`,
      `${subdomain}.${domain}`,
      `${subdomain}${domain}`,
      `${domain}${subdomain}`,
      `${subdomain}_${domain}`,
      `${domain}_${subdomain}`
    );
    if (/[-_.]/.test(subdomain)) {
      variations.push(...compositePermutations(subdomain));
    }
  }

  for (const affix of BACKUP_AFFIXES) {
    variations.push(`${affix}${domain}`, `${domain}${affix}`, `${affix}_${domain}`, `${domain}_${affix}`);
  }

  variations.push(domain.toUpperCase(), capitalize(domain));

  for (const stamp of dateStamps(reference)) {
    variations.push(`${domain}_${stamp}`, `${domain}-${stamp}`, `${domain}${stamp}`, `backup_${stamp}`);
  }

  return [...new Set(variations.filter(variation => variation.length > 0))].slice(0, MAX_VARIATIONS);
}

export function domainBackupExtensions(catalog: Catalog): string[] {
  const combined = [
    ...catalog.extensions.archive,
    ...catalog.extensions.backupSuffixes,
    ...catalog.extensions.database,
  ];
  return [...new Set(combined)].slice(0, MAX_EXTENSIONS);
}
