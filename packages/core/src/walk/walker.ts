import path from 'node:path';
import type { BigIntStats } from 'node:fs';

import { TraversalError, errorCode } from '../errors.js';
import type { IgnoreMatcher } from '../ignore/matcher.js';
import { toRelativePath } from '../path/normalize.js';
import type { WalkFs } from './fs.js';
import { pathComparator } from './order.js';

const NANOS_PER_SECOND = 1_000_000_000n;

export interface FileMetadata {
  /** Unix `st_mode`; undefined where the platform has no meaningful mode bits. */
  mode: number | undefined;
  mtime: { seconds: bigint; nanoseconds: number };
}

export interface FileEntry {
  /** Normalized, root-relative path (`/` separators). */
  path: string;
  absolutePath: string;
  metadata?: FileMetadata;
}

export interface WalkConfig {
  root: string;
  matcher: IgnoreMatcher;
  followSymlinks: boolean;
  includeMetadata: boolean;
  caseInsensitiveOrder: boolean;
  fileSystem: WalkFs;
}

function readMetadata(st: BigIntStats): FileMetadata {
  let seconds = st.mtimeNs / NANOS_PER_SECOND;
  let nanos = st.mtimeNs % NANOS_PER_SECOND;
  if (nanos < 0n) {
    nanos += NANOS_PER_SECOND;
    seconds -= 1n;
  }

  return {
    mode: process.platform === 'win32' ? undefined : Number(st.mode),
    mtime: { seconds, nanoseconds: Number(nanos) }
  };
}

/** ELOOP: a chain of links that never reaches a real file or directory. */
function failure(filePath: string, rel: string, op: string, err: unknown): TraversalError {
  if (errorCode(err) === 'ELOOP') {
    return new TraversalError('cycle', filePath, `Symlink cycle detected at ${rel}`, { op, code: 'ELOOP' });
  }
  return TraversalError.io(filePath, op, err);
}

class TreeWalk {
  constructor(private readonly config: WalkConfig) {}

  async *run(): AsyncGenerator<FileEntry> {
    const { root, followSymlinks } = this.config;
    const rootId = followSymlinks ? await this.realpath(root, '.') : root;
    yield* this.directory(root, [rootId]);
  }

  private async readdir(dir: string): Promise<string[]> {
    try {
      return await this.config.fileSystem.readdir(dir);
    } catch (err) {
      throw TraversalError.io(dir, 'read directory', err);
    }
  }

  private async stat(filePath: string, rel: string, op: 'lstat' | 'stat'): Promise<BigIntStats> {
    try {
      const { fileSystem } = this.config;
      return await (op === 'lstat' ? fileSystem.lstat(filePath) : fileSystem.stat(filePath));
    } catch (err) {
      throw failure(filePath, rel, op, err);
    }
  }

  private async realpath(filePath: string, rel: string): Promise<string> {
    try {
      return await this.config.fileSystem.realpath(filePath);
    } catch (err) {
      throw failure(filePath, rel, 'resolve', err);
    }
  }

  private file(absolutePath: string, rel: string, st: BigIntStats): FileEntry {
    const entry: FileEntry = { path: rel, absolutePath };
    if (this.config.includeMetadata) entry.metadata = readMetadata(st);
    return entry;
  }

  /**
   * `ancestors` holds the real paths of the directories on the current descent chain; it is
   * only consulted when symlinks are followed.
   */
  private async *directory(dir: string, ancestors: string[]): AsyncGenerator<FileEntry> {
    const { root, matcher, followSymlinks } = this.config;

    for (const name of await this.readdir(dir)) {
      const full = path.join(dir, name);
      const rel = toRelativePath(root, full);

      // Pruned before any stat, so ignored subtrees are never visited.
      if (matcher.matches(rel)) continue;

      const st = await this.stat(full, rel, 'lstat');

      if (st.isSymbolicLink()) {
        if (!followSymlinks) continue;

        const target = await this.stat(full, rel, 'stat');
        if (target.isDirectory()) {
          const real = await this.realpath(full, rel);
          if (ancestors.includes(real)) {
            throw new TraversalError('cycle', full, `Symlink cycle detected at ${rel}`, { target: real });
          }
          yield* this.directory(full, [...ancestors, real]);
        } else if (target.isFile()) {
          yield this.file(full, rel, target);
        }
        continue;
      }

      if (st.isDirectory()) {
        const id = followSymlinks ? await this.realpath(full, rel) : full;
        yield* this.directory(full, [...ancestors, id]);
      } else if (st.isFile()) {
        yield this.file(full, rel, st);
      }
    }
  }
}

/**
 * Regular files below `config.root` that survive the ignore rules, in whatever order the
 * filesystem reports them. Each call starts a fresh traversal.
 */
export function iterateTree(config: WalkConfig): AsyncGenerator<FileEntry> {
  return new TreeWalk(config).run();
}

/** Drains a traversal and returns its entries in canonical path order. */
export async function walkTree(config: WalkConfig): Promise<FileEntry[]> {
  const entries: FileEntry[] = [];
  for await (const entry of iterateTree(config)) {
    entries.push(entry);
  }

  const compare = pathComparator(config.caseInsensitiveOrder);
  return entries.sort((a, b) => compare(a.path, b.path));
}
