import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

import { TraversalError } from '../errors.js';

export const HASH_ALGORITHM = 'sha256';

/** Read size for streamed hashing; files are never held in memory whole. */
export const CHUNK_SIZE = 64 * 1024;

/** Raw SHA-256 of a file's bytes. The read stream is closed on success and on failure. */
export async function hashFileContent(filePath: string): Promise<Buffer> {
  const h = createHash(HASH_ALGORITHM);

  await new Promise<void>((resolve, reject) => {
    const stream = createReadStream(filePath, { highWaterMark: CHUNK_SIZE });
    stream.on('data', (chunk) => h.update(chunk));
    stream.on('error', (err) => {
      stream.destroy();
      reject(TraversalError.io(filePath, 'read', err));
    });
    stream.on('end', () => {
      resolve();
    });
  });

  return h.digest();
}
