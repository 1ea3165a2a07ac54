import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { deriveExtension, describeFile, fileStem, scanDirectory, tokenizeName } from './directory-scanner.js';
import { InvalidRootError } from './errors.js';
import { NO_EXTENSION } from './types.js';

describe('file naming helpers', () => {
  it('should lowercase the last suffix', () => {
    expect(deriveExtension('Photo.JPG')).toBe('.jpg');
    expect(deriveExtension('archive.tar.gz')).toBe('.gz');
  });

  it('should use the sentinel for names without a suffix', () => {
    expect(deriveExtension('README')).toBe(NO_EXTENSION);
    expect(deriveExtension('.env')).toBe(NO_EXTENSION);
    expect(deriveExtension('trailing.')).toBe(NO_EXTENSION);
  });

  it('should cut the stem at the last dot', () => {
    expect(fileStem('archive.tar.gz')).toBe('archive.tar');
    expect(fileStem('README')).toBe('README');
  });

  it('should split the stem on whitespace', () => {
    expect(tokenizeName('quarterly  report final.pdf')).toEqual(['quarterly', 'report', 'final']);
    expect(describeFile('/data/My Notes.txt')).toEqual({
      path: '/data/My Notes.txt',
      name: 'My Notes.txt',
      extension: '.txt',
      nameTokens: ['My', 'Notes'],
    });
  });
});

describe('scanDirectory', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'organizer-scan-'));
    writeFileSync(join(root, 'a.txt'), 'top');
    writeFileSync(join(root, 'B.md'), '# b');
    writeFileSync(join(root, 'notes'), 'plain');
    writeFileSync(join(root, '.env'), 'KEY=test-secret');
    mkdirSync(join(root, 'sub'));
    writeFileSync(join(root, 'sub', 'a.txt'), 'nested');
    writeFileSync(join(root, 'sub', 'c.TXT'), 'c');
    symlinkSync(join(root, 'does-not-exist'), join(root, 'broken-link'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should list top-level files in name order', () => {
    const result = scanDirectory(root);
    expect(result.root).toBe(root);
    expect(result.recursive).toBe(false);
    expect(result.files.map(file => file.name)).toEqual(['.env', 'B.md', 'a.txt', 'notes']);
    expect(result.duplicates).toEqual([]);
  });

  it('should record broken links as skipped', () => {
    const result = scanDirectory(root);
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0].path).toBe(join(root, 'broken-link'));
    expect(result.skipped[0].reason).toContain(`Cannot read ${join(root, 'broken-link')}`);
  });

  it('should descend into subfolders and collect name collisions as duplicates', () => {
    const result = scanDirectory(root, { recursive: true });
    expect(result.files.map(file => file.path)).toEqual([
      join(root, '.env'),
      join(root, 'B.md'),
      join(root, 'a.txt'),
      join(root, 'notes'),
      join(root, 'sub', 'c.TXT'),
    ]);
    expect(result.duplicates).toEqual([join(root, 'sub', 'a.txt')]);
    expect(result.files[4].extension).toBe('.txt');
  });

  it('should include links that point at files', () => {
    symlinkSync(join(root, 'B.md'), join(root, 'link.md'));
    const names = scanDirectory(root).files.map(file => file.name);
    expect(names).toContain('link.md');
  });

  it('should reject roots that are missing or not directories', () => {
    expect(() => scanDirectory(join(root, 'missing'))).toThrow(InvalidRootError);
    expect(() => scanDirectory(join(root, 'a.txt'))).toThrow('not a directory');
  });
});
