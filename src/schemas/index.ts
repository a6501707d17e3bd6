// Config schemas
export {
  ScanConfigSchema,
  ScanLevelSchema,
  LanguageFilterSchema,
  DEFAULT_THREADS,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_LARGE_FILE_THRESHOLD,
  type ScanConfigInput,
  type ParsedScanConfig,
  type ScanConfig,
} from './config.js';

// Catalog schemas
export {
  CatalogSchema,
  ExtensionGroupsSchema,
  FileGroupsSchema,
  WordGroupsSchema,
  WordGroupSchema,
  type Catalog,
  type ExtensionGroup,
  type FileGroup,
  type WordGroup,
} from './catalog.js';
