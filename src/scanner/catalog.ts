import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { CatalogSchema, type Catalog } from '../schemas/catalog.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';

// Same relative location from src/scanner and dist/scanner
const DEFAULT_CATALOG_URL = new URL('../../data/catalog.json', import.meta.url);

let defaultCatalog: Catalog | null = null;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

export function loadCatalog(location: string | URL = DEFAULT_CATALOG_URL): Catalog {
  const filePath = location instanceof URL ? fileURLToPath(location) : location;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError('UNREADABLE_FILE', `Cannot load catalog ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError('INVALID_CONFIG', `Malformed catalog ${filePath}: ${parsed.error.message}`);
  }

  return deepFreeze(parsed.data);
}

export function getDefaultCatalog(): Catalog {
  defaultCatalog ??= loadCatalog();
  return defaultCatalog;
}
