import { createHash, type Hash } from 'node:crypto';

import { InvariantError } from '../errors.js';
import type { FileEntry, FileMetadata } from '../walk/walker.js';
import { HASH_ALGORITHM } from './contentHash.js';

/**
 * Absorbed once before any record. Bump the version whenever record framing changes so
 * digests from different formats can never coincide.
 */
export const DOMAIN_TAG = 'dirdigest-v1\0';

/** Written in place of the mode where the platform has none. */
export const MODE_UNAVAILABLE = 0xffffffff;

const FILE_TAG = Buffer.from('F\0', 'latin1');
const PATH_END = Buffer.from([0]);
const METADATA_TAG = Buffer.from('\0M\0', 'latin1');

function encodeMetadata(metadata: FileMetadata): Buffer {
  const buf = Buffer.alloc(16);
  buf.writeUInt32LE(metadata.mode === undefined ? MODE_UNAVAILABLE : metadata.mode >>> 0, 0);
  buf.writeBigInt64LE(metadata.mtime.seconds, 4);
  buf.writeUInt32LE(metadata.mtime.nanoseconds, 12);
  return buf;
}

/**
 * One framed record:
 *
 *   "F" NUL <path bytes> NUL <32-byte content hash> [ NUL "M" NUL <mode u32le> <secs i64le> <nanos u32le> ]
 *
 * The path is the only variable-length field and is NUL-terminated; paths never contain NUL.
 */
export function encodeRecord(filePath: string, contentHash: Uint8Array, metadata?: FileMetadata): Buffer {
  const parts: Uint8Array[] = [FILE_TAG, Buffer.from(filePath, 'utf8'), PATH_END, contentHash];
  if (metadata) {
    parts.push(METADATA_TAG, encodeMetadata(metadata));
  }
  return Buffer.concat(parts);
}

export interface FramerOptions {
  includeMetadata: boolean;
}

/** Owns the root accumulator. Records must be absorbed in canonical path order. */
export class DigestFramer {
  private readonly root: Hash = createHash(HASH_ALGORITHM);
  private readonly includeMetadata: boolean;
  private result?: string;

  constructor(opts: FramerOptions) {
    this.includeMetadata = opts.includeMetadata;
    this.root.update(DOMAIN_TAG, 'utf8');
  }

  absorb(entry: Pick<FileEntry, 'path' | 'metadata'>, contentHash: Uint8Array): void {
    if (this.result !== undefined) {
      throw new InvariantError('DigestFramer already finalized');
    }

    let metadata: FileMetadata | undefined;
    if (this.includeMetadata) {
      if (!entry.metadata) {
        throw new InvariantError(`Metadata missing for ${entry.path}`, { path: entry.path });
      }
      metadata = entry.metadata;
    }

    this.root.update(encodeRecord(entry.path, contentHash, metadata));
  }

  /** Finalizes on first call; later calls return the same lowercase hex digest. */
  digest(): string {
    if (this.result === undefined) {
      this.result = this.root.digest('hex');
    }
    return this.result;
  }
}
