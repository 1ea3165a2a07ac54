import fs from 'fs';
import path from 'path';
import { InvalidRootError, ScanEntryError } from './errors.js';
import { Logger } from './logger.js';
import { FileDescriptor, NO_EXTENSION, ScanResult, SkippedEntry } from './types.js';

const logger = new Logger({ context: 'scanner' });

export interface ScanOptions {
  recursive?: boolean;
}

/**
 * Lowercased suffix from the last dot, or NO_EXTENSION.
 * Dot-files such as ".env" carry no extension.
 */
export function deriveExtension(name: string): string {
  const ext = path.extname(name).toLowerCase();
  return ext === '' || ext === '.' ? NO_EXTENSION : ext;
}

export function fileStem(name: string): string {
  const lastDot = name.lastIndexOf('.');
  return lastDot === -1 ? name : name.slice(0, lastDot);
}

export function tokenizeName(name: string): string[] {
  return fileStem(name).split(/\s+/).filter(Boolean);
}

export function describeFile(filePath: string): FileDescriptor {
  const name = path.basename(filePath);
  return {
    path: filePath,
    name,
    extension: deriveExtension(name),
    nameTokens: tokenizeName(name),
  };
}

function byName(left: fs.Dirent, right: fs.Dirent): number {
  if (left.name < right.name) return -1;
  if (left.name > right.name) return 1;
  return 0;
}

function assertDirectory(rootAbs: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(rootAbs);
  } catch {
    throw new InvalidRootError(rootAbs, 'not found');
  }
  if (!stats.isDirectory()) {
    throw new InvalidRootError(rootAbs, 'not a directory');
  }
  try {
    fs.accessSync(rootAbs, fs.constants.R_OK | fs.constants.X_OK);
  } catch {
    throw new InvalidRootError(rootAbs, 'cannot be listed');
  }
}

/**
 * Regular files under root in deterministic depth-first order: each
 * directory's entries sorted by name, subdirectories entered where they sort.
 */
function* walkFiles(
  directory: string,
  recursive: boolean,
  skipped: SkippedEntry[],
): Generator<string> {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    const entryError = new ScanEntryError(directory, error);
    skipped.push({ path: directory, reason: entryError.message });
    logger.debug(entryError.message);
    return;
  }

  for (const entry of entries.sort(byName)) {
    const entryPath = path.join(directory, entry.name);

    if (entry.isFile()) {
      yield entryPath;
      continue;
    }

    if (entry.isDirectory()) {
      if (recursive) {
        yield* walkFiles(entryPath, recursive, skipped);
      }
      continue;
    }

    if (entry.isSymbolicLink()) {
      try {
        if (fs.statSync(entryPath).isFile()) {
          yield entryPath;
        }
      } catch (error) {
        const entryError = new ScanEntryError(entryPath, error);
        skipped.push({ path: entryPath, reason: entryError.message });
        logger.debug(entryError.message);
      }
    }
  }
}

/**
 * List the files under root. The first file seen with a given base name
 * becomes the descriptor; every later file sharing that name is a duplicate.
 */
export function scanDirectory(root: string, options: ScanOptions = {}): ScanResult {
  const rootAbs = path.resolve(root);
  const recursive = options.recursive ?? false;
  assertDirectory(rootAbs);

  const files: FileDescriptor[] = [];
  const duplicates: string[] = [];
  const skipped: SkippedEntry[] = [];
  const seenNames = new Set<string>();

  for (const filePath of walkFiles(rootAbs, recursive, skipped)) {
    const name = path.basename(filePath);
    if (seenNames.has(name)) {
      duplicates.push(filePath);
      continue;
    }
    seenNames.add(name);
    files.push(describeFile(filePath));
  }

  logger.debug(`Scanned ${rootAbs}`, {
    recursive,
    files: files.length,
    duplicates: duplicates.length,
    skipped: skipped.length,
  });

  return { root: rootAbs, recursive, files, duplicates, skipped };
}
