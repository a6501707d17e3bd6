import { readFile } from 'node:fs/promises';
import { ConfigurationError, errorMessage } from './errors.js';

/**
 * Read a line-oriented list (targets, wordlists). Blank lines and `#` comments are dropped.
 */
export async function readLineList(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError('UNREADABLE_FILE', `Cannot read ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}
