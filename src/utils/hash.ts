import { closeSync, openSync, readSync } from 'node:fs';
import { createHash } from 'node:crypto';

const CHUNK_SIZE = 128 * 1024;

/** SHA-1 of a file's bytes, read sequentially in fixed-size chunks. */
export function fileSha1(filePath: string): string {
  const hash = createHash('sha1');
  const buffer = Buffer.alloc(CHUNK_SIZE);
  const fd = openSync(filePath, 'r');
  try {
    let read: number;
    while ((read = readSync(fd, buffer, 0, CHUNK_SIZE, null)) > 0) {
      hash.update(buffer.subarray(0, read));
    }
  } finally {
    closeSync(fd);
  }
  return hash.digest('hex');
}
