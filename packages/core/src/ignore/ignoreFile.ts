import fs from 'node:fs/promises';

import { ConfigurationError, errorCode, errorMessage } from '../errors.js';

/** Conventional ignore file read from the digest root unless disabled. */
export const DEFAULT_IGNORE_FILE = '.dirdigestignore';

/** One pattern per line; blank lines and `#` comments are skipped. */
export function parseIgnoreFile(content: string): string[] {
  const patterns: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) {
      continue;
    }
    patterns.push(trimmed);
  }
  return patterns;
}

export interface LoadIgnoreFileOptions {
  /** A missing file yields no patterns instead of an error. */
  optional?: boolean;
}

export async function loadIgnoreFile(filePath: string, opts: LoadIgnoreFileOptions = {}): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (opts.optional && errorCode(err) === 'ENOENT') return [];
    throw new ConfigurationError('IGNORE_FILE_UNREADABLE', `Failed to read ignore file: ${filePath}`, {
      path: filePath,
      error: errorMessage(err)
    });
  }

  return parseIgnoreFile(raw);
}
