import fs from 'node:fs/promises';
import path from 'node:path';
import YAML from 'yaml';

import { ConfigurationError, errorMessage } from '../errors.js';
import type { DigestOptions } from './options.js';

/**
 * dirdigest.yaml:
 *
 *   ignore: ["build/**", "*.tmp"]
 *   ignore_files: [ci/extra-ignores.txt]   # relative to this file
 *   default_ignore_file: true
 *   include_metadata: false
 *   follow_symlinks: false
 *   case_insensitive_order: false
 *   concurrency: 8
 */
const KNOWN_KEYS = new Set([
  'ignore',
  'ignore_files',
  'default_ignore_file',
  'include_metadata',
  'follow_symlinks',
  'case_insensitive_order',
  'concurrency'
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function readOptionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError('CONFIG_INVALID', `${field} must be boolean`, { field, value });
  }
  return value;
}

function readOptionalStrings(value: unknown, field: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigurationError('CONFIG_INVALID', `${field} must be a list of strings`, { field, value });
  }

  return value.map((item, index) => {
    if (typeof item !== 'string' || item.trim().length === 0) {
      throw new ConfigurationError('CONFIG_INVALID', `${field}[${index}] must be a non-empty string`, {
        field: `${field}[${index}]`,
        value: item
      });
    }
    return item;
  });
}

function readOptionalInteger(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigurationError('CONFIG_INVALID', `${field} must be an integer`, { field, value });
  }
  return value;
}

export function parseConfigFile(rawConfig: string, baseDir: string): DigestOptions {
  let parsed: unknown;
  try {
    parsed = YAML.parse(rawConfig);
  } catch (err) {
    throw new ConfigurationError('CONFIG_PARSE_ERROR', 'Failed to parse dirdigest config', {
      error: errorMessage(err)
    });
  }

  // An empty document is an empty config.
  if (parsed === null || parsed === undefined) return {};

  if (!isRecord(parsed)) {
    throw new ConfigurationError('CONFIG_INVALID', 'dirdigest config must be a mapping', { field: 'root' });
  }

  for (const key of Object.keys(parsed)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigurationError('CONFIG_INVALID', `unknown config key: ${key}`, { field: key });
    }
  }

  const options: DigestOptions = {};
  const ignore = readOptionalStrings(parsed.ignore, 'ignore');
  if (ignore) options.ignore = ignore;

  const ignoreFiles = readOptionalStrings(parsed.ignore_files, 'ignore_files');
  if (ignoreFiles) options.ignoreFiles = ignoreFiles.map((file) => path.resolve(baseDir, file));

  const defaultIgnoreFile = readOptionalBoolean(parsed.default_ignore_file, 'default_ignore_file');
  if (defaultIgnoreFile !== undefined) options.defaultIgnoreFile = defaultIgnoreFile;

  const includeMetadata = readOptionalBoolean(parsed.include_metadata, 'include_metadata');
  if (includeMetadata !== undefined) options.includeMetadata = includeMetadata;

  const followSymlinks = readOptionalBoolean(parsed.follow_symlinks, 'follow_symlinks');
  if (followSymlinks !== undefined) options.followSymlinks = followSymlinks;

  const caseInsensitiveOrder = readOptionalBoolean(parsed.case_insensitive_order, 'case_insensitive_order');
  if (caseInsensitiveOrder !== undefined) options.caseInsensitiveOrder = caseInsensitiveOrder;

  const concurrency = readOptionalInteger(parsed.concurrency, 'concurrency');
  if (concurrency !== undefined) options.concurrency = concurrency;

  return options;
}

export async function loadConfigFile(configPath: string): Promise<DigestOptions> {
  const absoluteConfigPath = path.resolve(configPath);

  let raw: string;
  try {
    raw = await fs.readFile(absoluteConfigPath, 'utf8');
  } catch (err) {
    throw new ConfigurationError('CONFIG_PARSE_ERROR', `Failed to read dirdigest config: ${absoluteConfigPath}`, {
      path: absoluteConfigPath,
      error: errorMessage(err)
    });
  }

  return parseConfigFile(raw, path.dirname(absoluteConfigPath));
}
