import { resolveConfig, type DigestOptions } from '../config/options.js';
import { walkTree } from '../walk/walker.js';
import { hashFileContent } from './contentHash.js';
import { DigestFramer } from './framer.js';
import { mapConcurrent } from './pool.js';

export interface HashedFile {
  path: string;
  /** SHA-256 of the raw file bytes, lowercase hex. */
  contentHash: string;
}

export interface DigestResult {
  /** Root digest, lowercase hex. */
  digest: string;
  /** Hashed files in the order their records were absorbed. */
  files: HashedFile[];
}

/**
 * Digest of every regular file below `rootPath` that survives the ignore rules.
 *
 * Configuration is resolved first, then the tree is walked and sorted, file contents are
 * hashed concurrently, and records are absorbed into the root accumulator in sorted order.
 * Any failure rejects the whole computation; no partial digest is returned.
 */
export async function computeDigest(rootPath: string, options: DigestOptions = {}): Promise<DigestResult> {
  const config = await resolveConfig(rootPath, options);
  const entries = await walkTree(config);

  const contentHashes = await mapConcurrent(entries, config.concurrency, (entry) =>
    hashFileContent(entry.absolutePath)
  );

  const framer = new DigestFramer({ includeMetadata: config.includeMetadata });
  const files = entries.map((entry, index): HashedFile => {
    const contentHash = contentHashes[index];
    framer.absorb(entry, contentHash);
    return { path: entry.path, contentHash: contentHash.toString('hex') };
  });

  return { digest: framer.digest(), files };
}

/**
 * `<content-hash>  <path>` per file in digest order, then `<root-digest>  <label>`.
 */
export function formatReport(result: DigestResult, label = '.'): string {
  const lines = result.files.map((f) => `${f.contentHash}  ${f.path}`);
  lines.push(`${result.digest}  ${label}`);
  return lines.join('\n') + '\n';
}
