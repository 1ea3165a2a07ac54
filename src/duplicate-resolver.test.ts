import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  existsSync,
  lstatSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  readFileSync,
  rmSync,
  symlinkSync,
  writeFileSync,
} from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { resolveDuplicates } from './duplicate-resolver.js';
import { HashIOError } from './errors.js';
import { resolveLabels } from './labels.js';

describe('resolveDuplicates', () => {
  let root: string;
  let duplicates: string[];

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'organizer-resolve-'));
    mkdirSync(join(root, 'sub1'));
    mkdirSync(join(root, 'sub2'));
    writeFileSync(join(root, 'a.txt'), 'original');
    writeFileSync(join(root, 'sub1', 'a.txt'), 'first copy');
    writeFileSync(join(root, 'sub2', 'a.txt'), 'second copy');
    duplicates = [join(root, 'sub1', 'a.txt'), join(root, 'sub2', 'a.txt')];
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it('should do nothing for an empty list', () => {
    const report = resolveDuplicates([], root);
    expect(report).toEqual({ root, folder: null, candidates: 0, moves: [] });
    expect(existsSync(join(root, 'Duplicates'))).toBe(false);
  });

  it('should number duplicates from their position in the list', () => {
    const report = resolveDuplicates(duplicates, root);

    expect(report.folder).toBe(join(root, 'Duplicates'));
    expect(report.moves.map(move => move.destinationPath)).toEqual([
      join(root, 'Duplicates', 'Dupe0_a.txt'),
      join(root, 'Duplicates', 'Dupe1_a.txt'),
    ]);
    expect(readFileSync(join(root, 'Duplicates', 'Dupe1_a.txt'), 'utf8')).toBe('second copy');
    expect(readFileSync(join(root, 'a.txt'), 'utf8')).toBe('original');
  });

  it('should count up past names already in the folder', () => {
    mkdirSync(join(root, 'Duplicates'));
    writeFileSync(join(root, 'Duplicates', 'Dupe0_a.txt'), 'earlier run');

    const report = resolveDuplicates(duplicates, root);

    expect(report.moves.map(move => move.destinationPath)).toEqual([
      join(root, 'Duplicates', 'Dupe1_a.txt'),
      join(root, 'Duplicates', 'Dupe2_a.txt'),
    ]);
    expect(readFileSync(join(root, 'Duplicates', 'Dupe0_a.txt'), 'utf8')).toBe('earlier run');
  });

  it('should use the configured folder and prefix', () => {
    const labels = resolveLabels({ duplicatesFolder: 'Copies', duplicatePrefix: 'Copy' });
    resolveDuplicates(duplicates, root, { labels });
    expect(readdirSync(join(root, 'Copies')).sort()).toEqual(['Copy0_a.txt', 'Copy1_a.txt']);
  });

  it('should only move content matches when checking contents', () => {
    writeFileSync(join(root, 'sub2', 'a.txt'), 'first copy');
    mkdirSync(join(root, 'sub3'));
    writeFileSync(join(root, 'sub3', 'a.txt'), 'unrelated');

    const report = resolveDuplicates([...duplicates, join(root, 'sub3', 'a.txt')], root, { checkContents: true });

    expect(report.candidates).toBe(3);
    expect(report.moves.map(move => move.sourcePath)).toEqual(duplicates);
    expect(existsSync(join(root, 'sub3', 'a.txt'))).toBe(true);
  });

  it('should still create the folder when no content match survives', () => {
    const report = resolveDuplicates(duplicates, root, { checkContents: true });
    expect(report.moves).toEqual([]);
    expect(readdirSync(join(root, 'Duplicates'))).toEqual([]);
  });

  it('should treat a dangling link as a taken name', () => {
    mkdirSync(join(root, 'Duplicates'));
    symlinkSync(join(root, 'nowhere'), join(root, 'Duplicates', 'Dupe0_a.txt'));

    const report = resolveDuplicates(duplicates, root);

    expect(report.moves.map(move => move.destinationPath)).toEqual([
      join(root, 'Duplicates', 'Dupe1_a.txt'),
      join(root, 'Duplicates', 'Dupe2_a.txt'),
    ]);
    expect(lstatSync(join(root, 'Duplicates', 'Dupe0_a.txt')).isSymbolicLink()).toBe(true);
  });

  it('should not create the folder when hashing fails', () => {
    const vanished = join(root, 'sub3', 'a.txt');
    expect(() => resolveDuplicates([...duplicates, vanished], root, { checkContents: true })).toThrow(HashIOError);
    expect(existsSync(join(root, 'Duplicates'))).toBe(false);
  });

  it('should record every move as failed when the folder cannot be created', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    writeFileSync(join(root, 'Duplicates'), 'in the way');

    const report = resolveDuplicates(duplicates, root);

    expect(report.folder).toBe(join(root, 'Duplicates'));
    expect(report.moves.map(move => move.status)).toEqual(['failed', 'failed']);
    expect(report.moves[0].reason).toContain(`Error moving ${duplicates[0]} to ${join(root, 'Duplicates')}`);
    expect(duplicates.every(duplicate => existsSync(duplicate))).toBe(true);
  });
});
