import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { computeDigest, formatReport } from '../src/digest/computeDigest.js';
import { DOMAIN_TAG, encodeRecord } from '../src/digest/framer.js';
import { ConfigurationError, PatternError, TraversalError } from '../src/errors.js';
import { nodeWalkFs, type WalkFs } from '../src/walk/fs.js';
import { makeTempDir, recordingWalkFs, removeDir, reversedWalkFs, writeTree } from './helpers/tree.js';

const isWindows = process.platform === 'win32';

async function withTrees<T>(count: number, run: (...roots: string[]) => Promise<T>): Promise<T> {
  const roots: string[] = [];
  try {
    for (let i = 0; i < count; i += 1) roots.push(await makeTempDir('dirdigest-tree-'));
    return await run(...roots);
  } finally {
    for (const root of roots) await removeDir(root);
  }
}

function sha256(data: string): Buffer {
  return createHash('sha256').update(data).digest();
}

describe('computeDigest', () => {
  it('matches the framed digest of a.txt and sub/b.txt regardless of creation order', async () => {
    await withTrees(2, async (first, second) => {
      await writeTree(first, [
        ['a.txt', 'hello'],
        ['sub/b.txt', 'world']
      ]);
      await writeTree(second, [
        ['sub/b.txt', 'world'],
        ['a.txt', 'hello']
      ]);

      const expected = createHash('sha256')
        .update(DOMAIN_TAG)
        .update(encodeRecord('a.txt', sha256('hello')))
        .update(encodeRecord('sub/b.txt', sha256('world')))
        .digest('hex');

      const one = await computeDigest(first);
      const two = await computeDigest(second);

      expect(one.digest).toBe(expected);
      expect(two.digest).toBe(expected);
      expect(one.files).toEqual([
        { path: 'a.txt', contentHash: sha256('hello').toString('hex') },
        { path: 'sub/b.txt', contentHash: sha256('world').toString('hex') }
      ]);
    });
  });

  it('is deterministic across repeated runs and concurrency levels', async () => {
    await withTrees(1, async (root) => {
      await writeTree(
        root,
        Array.from({ length: 25 }, (_, i): [string, string] => [`d${i % 4}/f${i}.txt`, `content ${i}`])
      );

      const a = await computeDigest(root, { concurrency: 1 });
      const b = await computeDigest(root, { concurrency: 16 });
      const c = await computeDigest(root);

      expect(a.digest).toMatch(/^[0-9a-f]{64}$/);
      expect(b.digest).toBe(a.digest);
      expect(c.digest).toBe(a.digest);
    });
  });

  it('does not depend on the order directory entries are reported in', async () => {
    await withTrees(1, async (root) => {
      await writeTree(root, [
        ['x/1.txt', '1'],
        ['x/2.txt', '2'],
        ['y.txt', 'y'],
        ['a/b/c.txt', 'c']
      ]);

      const normal = await computeDigest(root);
      const reversed = await computeDigest(root, { fileSystem: reversedWalkFs });
      expect(reversed.digest).toBe(normal.digest);
    });
  });

  it('changes when a single byte of content changes', async () => {
    await withTrees(2, async (first, second) => {
      await writeTree(first, [['data.bin', new Uint8Array([1, 2, 3, 4])]]);
      await writeTree(second, [['data.bin', new Uint8Array([1, 2, 3, 5])]]);

      expect((await computeDigest(first)).digest).not.toBe((await computeDigest(second)).digest);
    });
  });

  it('changes when a file is renamed', async () => {
    await withTrees(1, async (root) => {
      await writeTree(root, [['a.txt', 'same']]);
      const before = await computeDigest(root);
      await fs.rename(path.join(root, 'a.txt'), path.join(root, 'c.txt'));
      const after = await computeDigest(root);

      expect(after.digest).not.toBe(before.digest);
    });
  });

  it('distinguishes trees whose paths and contents concatenate identically', async () => {
    await withTrees(2, async (first, second) => {
      await writeTree(first, [['ab', 'c']]);
      await writeTree(second, [['a', 'bc']]);

      expect((await computeDigest(first)).digest).not.toBe((await computeDigest(second)).digest);
    });
  });

  it('ignores build/** exactly as if build/ were absent', async () => {
    await withTrees(2, async (withBuild, withoutBuild) => {
      await writeTree(withBuild, [
        ['build/out.bin', 'compiled'],
        ['src/main.txt', 'main']
      ]);
      await writeTree(withoutBuild, [['src/main.txt', 'main']]);

      const ignored = await computeDigest(withBuild, { ignore: ['build/**'] });
      const absent = await computeDigest(withoutBuild);
      expect(ignored.digest).toBe(absent.digest);
      expect(ignored.files.map((f) => f.path)).toEqual(['src/main.txt']);
    });
  });

  it('folds mtime into the digest only when metadata is included', async () => {
    await withTrees(1, async (root) => {
      await writeTree(root, [['a.txt', 'hello']]);
      const file = path.join(root, 'a.txt');
      await fs.utimes(file, 1_600_000_000, 1_600_000_000);

      const plainBefore = await computeDigest(root);
      const metaBefore = await computeDigest(root, { includeMetadata: true });

      await fs.utimes(file, 1_600_000_100, 1_600_000_100);

      const plainAfter = await computeDigest(root);
      const metaAfter = await computeDigest(root, { includeMetadata: true });

      expect(plainAfter.digest).toBe(plainBefore.digest);
      expect(metaAfter.digest).not.toBe(metaBefore.digest);
      expect(metaBefore.digest).not.toBe(plainBefore.digest);
    });
  });

  it.skipIf(isWindows)('treats a tree holding only a symlink like an empty tree', async () => {
    await withTrees(3, async (linkOnly, empty, elsewhere) => {
      await writeTree(elsewhere, [['target.txt', 'target']]);
      await fs.symlink(path.join(elsewhere, 'target.txt'), path.join(linkOnly, 'link.txt'));

      const linked = await computeDigest(linkOnly);
      const nothing = await computeDigest(empty);

      expect(linked.digest).toBe(nothing.digest);
      expect(nothing.digest).toBe(createHash('sha256').update(DOMAIN_TAG).digest('hex'));

      const followed = await computeDigest(linkOnly, { followSymlinks: true });
      expect(followed.files).toEqual([{ path: 'link.txt', contentHash: sha256('target').toString('hex') }]);
    });
  });

  it('changes record order, and so the digest, under case-insensitive ordering', async () => {
    await withTrees(1, async (root) => {
      await writeTree(root, [
        ['B.txt', 'b'],
        ['a.txt', 'a']
      ]);

      const bytewise = await computeDigest(root);
      const folded = await computeDigest(root, { caseInsensitiveOrder: true });

      expect(bytewise.files.map((f) => f.path)).toEqual(['B.txt', 'a.txt']);
      expect(folded.files.map((f) => f.path)).toEqual(['a.txt', 'B.txt']);
      expect(folded.digest).not.toBe(bytewise.digest);
    });
  });

  it('applies the default ignore file unless disabled', async () => {
    await withTrees(1, async (root) => {
      await writeTree(root, [
        ['.dirdigestignore', '# local output\nbuild/**\n'],
        ['build/out.bin', 'compiled'],
        ['src/main.txt', 'main']
      ]);

      const auto = await computeDigest(root);
      const inline = await computeDigest(root, { defaultIgnoreFile: false, ignore: ['build/**'] });
      const disabled = await computeDigest(root, { defaultIgnoreFile: false });

      expect(auto.files.map((f) => f.path)).toEqual(['.dirdigestignore', 'src/main.txt']);
      expect(auto.digest).toBe(inline.digest);
      expect(disabled.files.map((f) => f.path)).toEqual(['.dirdigestignore', 'build/out.bin', 'src/main.txt']);
    });
  });

  it('rejects malformed patterns before touching the tree', async () => {
    await withTrees(1, async (root) => {
      await writeTree(root, [['a.txt', 'a']]);
      const recorder = recordingWalkFs();

      await expect(computeDigest(root, { ignore: ['src/[oops'], fileSystem: recorder })).rejects.toBeInstanceOf(
        PatternError
      );
      expect(recorder.readdirCalls).toEqual([]);
      expect(recorder.lstatCalls).toEqual([]);
    });
  });

  it('rejects a missing root as a configuration error', async () => {
    await withTrees(1, async (root) => {
      const err = await computeDigest(path.join(root, 'nope')).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConfigurationError);
      expect((err as ConfigurationError).reason).toBe('ROOT_INVALID');
    });
  });

  it('returns no digest when the walk fails part-way', async () => {
    await withTrees(1, async (root) => {
      await writeTree(root, [
        ['a.txt', 'a'],
        ['deep/b.txt', 'b']
      ]);
      const failing: WalkFs = {
        ...nodeWalkFs,
        lstat: async (filePath) => {
          if (filePath.endsWith('b.txt')) throw new Error('EIO: i/o error');
          return nodeWalkFs.lstat(filePath);
        }
      };

      const err = await computeDigest(root, { fileSystem: failing }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(TraversalError);
      expect((err as TraversalError).details).toMatchObject({ op: 'lstat', error: 'EIO: i/o error' });
    });
  });
});

describe('formatReport', () => {
  it('lists each file in digest order followed by the root digest', () => {
    const report = formatReport(
      {
        digest: 'f'.repeat(64),
        files: [
          { path: 'a.txt', contentHash: '1'.repeat(64) },
          { path: 'sub/b.txt', contentHash: '2'.repeat(64) }
        ]
      },
      'project'
    );

    expect(report).toBe(`${'1'.repeat(64)}  a.txt\n${'2'.repeat(64)}  sub/b.txt\n${'f'.repeat(64)}  project\n`);
  });

  it('labels the root digest with . by default', () => {
    expect(formatReport({ digest: 'ab', files: [] })).toBe('ab  .\n');
  });
});
