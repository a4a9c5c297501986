/**
 * Deterministic directory-tree digests.
 *
 * @example
 * ```typescript
 * import { computeDigest, formatReport } from '@dirdigest/core';
 *
 * const result = await computeDigest('./dist', { ignore: ['coverage/**'] });
 * console.log(result.digest);
 * process.stdout.write(formatReport(result, './dist'));
 * ```
 */

export {
  ErrorReasons,
  DigestError,
  ConfigurationError,
  PatternError,
  TraversalError,
  PathError,
  InvariantError,
  type ErrorReason,
  type TraversalErrorKind
} from './errors.js';

export { toRelativePath, normalizePatternPath } from './path/normalize.js';

export { compileGlob } from './ignore/glob.js';
export { IgnoreMatcher } from './ignore/matcher.js';
export {
  DEFAULT_IGNORE_FILE,
  parseIgnoreFile,
  loadIgnoreFile,
  type LoadIgnoreFileOptions
} from './ignore/ignoreFile.js';

export { nodeWalkFs, type WalkFs } from './walk/fs.js';
export {
  comparePathBytes,
  comparePathsCaseInsensitive,
  pathComparator,
  type PathComparator
} from './walk/order.js';
export {
  iterateTree,
  walkTree,
  type FileEntry,
  type FileMetadata,
  type WalkConfig
} from './walk/walker.js';

export { HASH_ALGORITHM, CHUNK_SIZE, hashFileContent } from './digest/contentHash.js';
export { DOMAIN_TAG, MODE_UNAVAILABLE, DigestFramer, encodeRecord, type FramerOptions } from './digest/framer.js';
export { mapConcurrent } from './digest/pool.js';
export { computeDigest, formatReport, type DigestResult, type HashedFile } from './digest/computeDigest.js';

export {
  DEFAULT_CONCURRENCY,
  MAX_CONCURRENCY,
  resolveConfig,
  mergeDigestOptions,
  type DigestOptions,
  type ResolvedConfig
} from './config/options.js';
export { parseConfigFile, loadConfigFile } from './config/file.js';
