import fs from 'fs';
import path from 'path';
import { MoveError } from './errors.js';
import { refineDuplicates } from './grouping-strategies.js';
import { DEFAULT_LABELS } from './labels.js';
import { Logger } from './logger.js';
import { movePath, pathExists } from './safe-move.js';
import { DuplicateReport, Hasher, MoveRecord, OrganizerLabels } from './types.js';

const logger = new Logger({ context: 'duplicates' });

export interface ResolveDuplicatesOptions {
  checkContents?: boolean;
  labels?: OrganizerLabels;
  hasher?: Hasher;
}

/**
 * "<prefix><counter>_<name>" inside folder, counter starting at the
 * duplicate's ordinal and incremented until the name is free.
 */
export function duplicateDestination(folder: string, baseName: string, ordinal: number, prefix: string): string {
  let counter = ordinal;
  let candidate = path.join(folder, `${prefix}${counter}_${baseName}`);
  while (pathExists(candidate)) {
    counter++;
    candidate = path.join(folder, `${prefix}${counter}_${baseName}`);
  }
  return candidate;
}

/**
 * Relocate duplicates into the duplicates folder under root.
 *
 * With checkContents the name-collision list is narrowed to files sharing
 * a digest with another candidate; the folder is still created when that
 * leaves nothing to move. Hash failures propagate before anything is
 * created; a folder or move failure is logged and recorded per file.
 */
export function resolveDuplicates(
  duplicates: string[],
  root: string,
  options: ResolveDuplicatesOptions = {},
): DuplicateReport {
  const labels = options.labels ?? DEFAULT_LABELS;
  const rootAbs = path.resolve(root);

  if (duplicates.length === 0) {
    return { root: rootAbs, folder: null, candidates: 0, moves: [] };
  }

  const survivors = refineDuplicates(duplicates, {
    checkContents: options.checkContents,
    hasher: options.hasher,
  });

  const folder = path.join(rootAbs, labels.duplicatesFolder);
  try {
    fs.mkdirSync(folder, { recursive: true });
  } catch (error) {
    const moves = survivors.map((sourcePath): MoveRecord => {
      const moveError = new MoveError(sourcePath, folder, error);
      logger.error(moveError.message, moveError);
      return { kind: 'file', sourcePath, destinationPath: folder, status: 'failed', reason: moveError.message };
    });
    if (moves.length === 0) {
      logger.error(`Cannot create ${folder}`, error instanceof Error ? error : undefined);
    }
    return { root: rootAbs, folder, candidates: duplicates.length, moves };
  }

  const moves: MoveRecord[] = survivors.map((sourcePath, ordinal): MoveRecord => {
    const destinationPath = duplicateDestination(folder, path.basename(sourcePath), ordinal, labels.duplicatePrefix);
    try {
      movePath(sourcePath, destinationPath);
      return { kind: 'file', sourcePath, destinationPath, status: 'applied' };
    } catch (error) {
      const moveError = new MoveError(sourcePath, destinationPath, error);
      logger.error(moveError.message, moveError);
      return { kind: 'file', sourcePath, destinationPath, status: 'failed', reason: moveError.message };
    }
  });

  logger.info(`Moved ${moves.filter(move => move.status === 'applied').length} of ${survivors.length} duplicates`, {
    candidates: duplicates.length,
    folder,
  });

  return { root: rootAbs, folder, candidates: duplicates.length, moves };
}
