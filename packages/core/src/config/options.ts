import fs from 'node:fs/promises';
import path from 'node:path';

import { ConfigurationError, errorMessage } from '../errors.js';
import { DEFAULT_IGNORE_FILE, loadIgnoreFile } from '../ignore/ignoreFile.js';
import { IgnoreMatcher } from '../ignore/matcher.js';
import { nodeWalkFs, type WalkFs } from '../walk/fs.js';
import type { WalkConfig } from '../walk/walker.js';

export const DEFAULT_CONCURRENCY = 8;
export const MAX_CONCURRENCY = 64;

export interface DigestOptions {
  /** Inline glob patterns, relative to the root. */
  ignore?: readonly string[];
  /** Files holding one pattern per line, read in the order given. */
  ignoreFiles?: readonly string[];
  /** Read `.dirdigestignore` from the root when present (default true). */
  defaultIgnoreFile?: boolean;
  includeMetadata?: boolean;
  followSymlinks?: boolean;
  caseInsensitiveOrder?: boolean;
  /** Files hashed at once (default 8). */
  concurrency?: number;
  fileSystem?: WalkFs;
}

/** Everything a computation needs, settled before the walk starts. */
export interface ResolvedConfig extends WalkConfig {
  /** Merged patterns: inline, then ignore files, then the default ignore file. */
  patterns: readonly string[];
  concurrency: number;
}

function readBoolean(value: unknown, field: string, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError('CONFIG_INVALID', `${field} must be boolean`, { field, value });
  }
  return value;
}

function readStringList(value: unknown, field: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || value.some((item) => typeof item !== 'string')) {
    throw new ConfigurationError('CONFIG_INVALID', `${field} must be an array of strings`, { field, value });
  }
  return value.map(String);
}

function readConcurrency(value: unknown): number {
  if (value === undefined) return DEFAULT_CONCURRENCY;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > MAX_CONCURRENCY) {
    throw new ConfigurationError('CONFIG_INVALID', `concurrency must be an integer between 1 and ${MAX_CONCURRENCY}`, {
      field: 'concurrency',
      value
    });
  }
  return value;
}

async function resolveRoot(rootPath: string): Promise<string> {
  const absolute = path.resolve(rootPath);

  let real: string;
  try {
    real = await fs.realpath(absolute);
  } catch (err) {
    throw new ConfigurationError('ROOT_INVALID', `Root directory not found: ${absolute}`, {
      path: absolute,
      error: errorMessage(err)
    });
  }

  const stat = await fs.stat(real).catch(() => null);
  if (!stat || !stat.isDirectory()) {
    throw new ConfigurationError('ROOT_INVALID', `Root is not a directory: ${absolute}`, { path: absolute });
  }

  return real;
}

/**
 * Validate options, merge every ignore source and compile the matcher. All configuration
 * failures surface here, before any of the tree is read.
 */
export async function resolveConfig(rootPath: string, options: DigestOptions = {}): Promise<ResolvedConfig> {
  const includeMetadata = readBoolean(options.includeMetadata, 'includeMetadata', false);
  const followSymlinks = readBoolean(options.followSymlinks, 'followSymlinks', false);
  const caseInsensitiveOrder = readBoolean(options.caseInsensitiveOrder, 'caseInsensitiveOrder', false);
  const useDefaultIgnoreFile = readBoolean(options.defaultIgnoreFile, 'defaultIgnoreFile', true);
  const concurrency = readConcurrency(options.concurrency);
  const inline = readStringList(options.ignore, 'ignore');
  const ignoreFiles = readStringList(options.ignoreFiles, 'ignoreFiles');

  const root = await resolveRoot(rootPath);

  const patterns = [...inline];
  for (const file of ignoreFiles) {
    patterns.push(...(await loadIgnoreFile(path.resolve(file))));
  }
  if (useDefaultIgnoreFile) {
    patterns.push(...(await loadIgnoreFile(path.join(root, DEFAULT_IGNORE_FILE), { optional: true })));
  }

  return {
    root,
    patterns,
    matcher: new IgnoreMatcher(patterns),
    includeMetadata,
    followSymlinks,
    caseInsensitiveOrder,
    concurrency,
    fileSystem: options.fileSystem ?? nodeWalkFs
  };
}

/**
 * Layer `override` on top of `base`: scalar settings in `override` win, pattern and
 * ignore-file lists are appended after the base lists.
 */
export function mergeDigestOptions(base: DigestOptions, override: DigestOptions): DigestOptions {
  const merged: DigestOptions = { ...base };
  for (const key of ['defaultIgnoreFile', 'includeMetadata', 'followSymlinks', 'caseInsensitiveOrder'] as const) {
    const value = override[key];
    if (value !== undefined) merged[key] = value;
  }
  if (override.concurrency !== undefined) merged.concurrency = override.concurrency;
  if (override.fileSystem !== undefined) merged.fileSystem = override.fileSystem;

  merged.ignore = [...(base.ignore ?? []), ...(override.ignore ?? [])];
  merged.ignoreFiles = [...(base.ignoreFiles ?? []), ...(override.ignoreFiles ?? [])];
  return merged;
}
