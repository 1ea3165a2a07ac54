import { openSync, readSync, closeSync } from 'fs';
import { createHash } from 'crypto';
import { HashIOError } from './errors.js';
import { Hasher } from './types.js';

export interface HashOptions {
  algorithm?: string;
  chunkSize?: number;
}

export const DEFAULT_HASH_ALGORITHM = 'md5';
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Digest a file's bytes, reading fixed-size chunks so memory stays bounded
 * whatever the file size. Throws HashIOError when the file cannot be read.
 */
export function hashFile(filePath: string, options: HashOptions = {}): string {
  const digest = createHash(options.algorithm ?? DEFAULT_HASH_ALGORITHM);
  const buffer = Buffer.alloc(options.chunkSize ?? DEFAULT_CHUNK_SIZE);

  let fd: number;
  try {
    fd = openSync(filePath, 'r');
  } catch (error) {
    throw new HashIOError(filePath, error);
  }

  try {
    let bytesRead = readSync(fd, buffer, 0, buffer.length, null);
    while (bytesRead > 0) {
      digest.update(buffer.subarray(0, bytesRead));
      bytesRead = readSync(fd, buffer, 0, buffer.length, null);
    }
  } catch (error) {
    throw new HashIOError(filePath, error);
  } finally {
    closeSync(fd);
  }

  return digest.digest('hex');
}

export function createHasher(options: HashOptions = {}): Hasher {
  return (filePath: string) => hashFile(filePath, options);
}
