import { describe, it, expect } from 'vitest';
import { getDefaultCatalog } from '../src/scanner/catalog.js';
import { analyzeTargetContext, contextualExtensions, optimizeExtensions } from '../src/scanner/extension-optimizer.js';

const catalog = getDefaultCatalog();

describe('analyzeTargetContext', () => {
  it('reads hints from host and path', () => {
    expect(analyzeTargetContext('https://dev.example.com/admin/index.php')).toEqual({
      backupSite: true,
      development: true,
      admin: true,
      api: false,
      frameworks: ['php'],
    });
  });
});

describe('optimizeExtensions', () => {
  it('puts framework code backups first', () => {
    expect(optimizeExtensions(['txt', 'unknownx', 'zip', 'php.bak'], 'https://example.com/index.php', catalog)).toEqual([
      'php.bak',
      'zip',
      'txt',
      'unknownx',
    ]);
  });

  it('sorts archives by backup likelihood on backup hosts', () => {
    expect(optimizeExtensions(['txt', 'zip', 'sql'], 'https://backup.example.com/', catalog)).toEqual(['sql', 'zip', 'txt']);
  });

  it('never adds or drops entries', () => {
    const input = [...catalog.extensions.codeBackup, ...catalog.extensions.archive];
    const output = optimizeExtensions(input, 'https://staging.example.com/app.aspx', catalog);
    expect([...output].sort()).toEqual([...input].sort());
  });
});

describe('contextualExtensions', () => {
  it('adds compound extensions for API targets', () => {
    expect(contextualExtensions('https://example.com/api/')).toEqual(['swagger.json', 'openapi.json', 'api.json', 'schema.json']);
  });
});
