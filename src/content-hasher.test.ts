import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createHasher, hashFile } from './content-hasher.js';
import { HashIOError } from './errors.js';

describe('hashFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'organizer-hash-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return the md5 hex digest by default', () => {
    const filePath = join(dir, 'hello.txt');
    writeFileSync(filePath, 'hello');
    expect(hashFile(filePath)).toBe('5d41402abc4b2a76b9719d911017c592');
  });

  it('should give the same digest whatever the chunk size', () => {
    const filePath = join(dir, 'hello.txt');
    writeFileSync(filePath, 'hello');
    expect(hashFile(filePath, { chunkSize: 2 })).toBe('5d41402abc4b2a76b9719d911017c592');
  });

  it('should digest empty files', () => {
    const filePath = join(dir, 'empty.txt');
    writeFileSync(filePath, '');
    expect(hashFile(filePath)).toBe('d41d8cd98f00b204e9800998ecf8427e');
  });

  it('should use the configured algorithm', () => {
    const filePath = join(dir, 'hello.txt');
    writeFileSync(filePath, 'hello');
    const hasher = createHasher({ algorithm: 'sha256' });
    expect(hasher(filePath)).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });

  it('should throw HashIOError for unreadable paths', () => {
    const missing = join(dir, 'missing.bin');
    expect(() => hashFile(missing)).toThrow(HashIOError);
    expect(() => hashFile(dir)).toThrow(HashIOError);
  });
});
