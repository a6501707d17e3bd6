import { z } from 'zod';

const ExtensionList = z.array(z.string().min(1));

export const ExtensionGroupsSchema = z.object({
  criticalBackup: ExtensionList,
  configLog: ExtensionList,
  backupSuffixes: ExtensionList,
  archive: ExtensionList,
  database: ExtensionList,
  config: ExtensionList,
  ideLeftover: ExtensionList,
  codeBackup: ExtensionList,
  document: ExtensionList,
  security: ExtensionList,
  buildConfig: ExtensionList,
  extras: ExtensionList,
});

export const FileGroupsSchema = z.object({
  critical: z.array(z.string().min(1)).min(1),
  specific: z.array(z.string().min(1)),
  vcs: z.array(z.string().min(1)),
});

export const WordGroupSchema = z.object({
  languages: z.array(z.enum(['en', 'pt-br'])),
  words: z.array(z.string().min(1)),
});

export const WordGroupsSchema = z.object({
  core: WordGroupSchema,
  files: WordGroupSchema,
  backupDirectory: WordGroupSchema,
  webRelated: WordGroupSchema,
  versionControl: WordGroupSchema,
  dateVersion: WordGroupSchema,
  enCommon: WordGroupSchema,
  ptbrCommon: WordGroupSchema,
  ptbrBusiness: WordGroupSchema,
  ptbrCorporate: WordGroupSchema,
  ptbrTechnical: WordGroupSchema,
  databaseConfig: WordGroupSchema,
});

export const CatalogSchema = z.object({
  extensions: ExtensionGroupsSchema,
  files: FileGroupsSchema,
  words: WordGroupsSchema,
  userAgents: z.array(z.string().min(1)).min(1),
});

export type Catalog = z.infer<typeof CatalogSchema>;
export type ExtensionGroup = keyof Catalog['extensions'];
export type FileGroup = keyof Catalog['files'];
export type WordGroup = keyof Catalog['words'];
