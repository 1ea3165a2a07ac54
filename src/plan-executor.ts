/**
 * Plan executor: applies a grouping suggestion to the filesystem, then
 * optionally reconciles the directories the moves left empty.
 */

import fs from 'fs';
import path from 'path';
import { MoveError } from './errors.js';
import { DEFAULT_LABELS } from './labels.js';
import { Logger } from './logger.js';
import { safeDeleteEmptyFolder, safeMoveFile, safeMoveFolder } from './safe-move.js';
import { GroupingSuggestion, MoveRecord, OrganizeReport, OrganizerLabels } from './types.js';

const logger = new Logger({ context: 'organize' });

export interface OrganizeOptions {
  recursive?: boolean;
  cleanupEmpty?: boolean;
  deleteEmpty?: boolean;
  root?: string;
  labels?: OrganizerLabels;
}

function resolveRoot(suggestion: GroupingSuggestion, root?: string): string | null {
  if (root) {
    return path.resolve(root);
  }
  for (const paths of suggestion.values()) {
    if (paths.length > 0) {
      return path.dirname(path.resolve(paths[0]));
    }
  }
  return null;
}

function listEntries(directory: string): fs.Dirent[] | null {
  try {
    return fs.readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    logger.warn(`Cannot list ${directory}`, { reason: error instanceof Error ? error.message : String(error) });
    return null;
  }
}

function isEmptyDirectory(directory: string): boolean {
  const entries = listEntries(directory);
  return entries !== null && entries.length === 0;
}

/**
 * Visit empty directories under root bottom-up. Emptiness is checked after
 * the children were visited, so a parent emptied by its child's removal is
 * visited too. The root and the excluded subtree are never visited.
 */
function walkEmptyDirectories(
  directory: string,
  root: string,
  excluded: string | null,
  visit: (emptyDirectory: string) => void,
): void {
  const entries = listEntries(directory);
  if (!entries) return;

  const subdirectories = entries
    .filter(entry => entry.isDirectory())
    .map(entry => path.join(directory, entry.name))
    .sort();

  for (const subdirectory of subdirectories) {
    if (subdirectory === excluded) continue;
    walkEmptyDirectories(subdirectory, root, excluded, visit);
  }

  if (directory !== root && isEmptyDirectory(directory)) {
    visit(directory);
  }
}

function hasEmptyDirectory(root: string, excluded: string | null): boolean {
  let found = false;
  walkEmptyDirectories(root, root, excluded, () => {
    found = true;
  });
  return found;
}

function reconcileEmptyFolders(
  root: string,
  deleteEmpty: boolean,
  labels: OrganizerLabels,
  report: OrganizeReport,
): void {
  const emptyFoldersPath = path.join(root, labels.emptyFolders);
  const excluded = deleteEmpty ? null : emptyFoldersPath;

  if (!hasEmptyDirectory(root, excluded)) {
    logger.debug('No empty folders found');
    return;
  }

  if (deleteEmpty) {
    report.emptyFolders.mode = 'delete';
    walkEmptyDirectories(root, root, null, emptyDirectory => {
      report.emptyFolders.found++;
      report.emptyFolders.deleted.push(safeDeleteEmptyFolder(emptyDirectory));
    });
    return;
  }

  try {
    fs.mkdirSync(emptyFoldersPath, { recursive: true });
  } catch (error) {
    logger.error(
      `Cannot create ${emptyFoldersPath}; empty folders left in place`,
      error instanceof Error ? error : undefined,
    );
    return;
  }

  report.emptyFolders.mode = 'relocate';
  report.emptyFolders.destination = emptyFoldersPath;
  walkEmptyDirectories(root, root, emptyFoldersPath, emptyDirectory => {
    report.emptyFolders.found++;
    report.emptyFolders.relocated.push(safeMoveFolder(emptyDirectory, emptyFoldersPath));
  });
}

function failGroup(paths: string[], destination: string, cause: unknown): MoveRecord[] {
  return paths.map((sourcePath): MoveRecord => {
    const moveError = new MoveError(sourcePath, destination, cause);
    logger.error(moveError.message, moveError);
    return {
      kind: 'file',
      sourcePath,
      destinationPath: destination,
      status: 'failed',
      reason: moveError.message,
    };
  });
}

/**
 * Move every file of the suggestion into its destination folder under root.
 * A label equal to root means "no new folder". A failed move is logged and
 * recorded; the remaining moves still run and nothing is rolled back.
 */
export function organizeFiles(suggestion: GroupingSuggestion, options: OrganizeOptions = {}): OrganizeReport {
  const labels = options.labels ?? DEFAULT_LABELS;
  const root = resolveRoot(suggestion, options.root);

  const report: OrganizeReport = {
    root: root ?? '',
    moves: [],
    emptyFolders: { found: 0, mode: 'none', deleted: [], relocated: [] },
  };

  if (!root) {
    return report;
  }

  for (const [label, paths] of suggestion) {
    // The root entry may carry the root as the caller spelled it.
    const isRootLabel = label === options.root || (path.isAbsolute(label) && path.resolve(label) === root);
    const destination = isRootLabel ? root : path.join(root, label);

    try {
      fs.mkdirSync(destination, { recursive: true });
    } catch (error) {
      report.moves.push(...failGroup(paths, destination, error));
      continue;
    }

    for (const filePath of paths) {
      report.moves.push(safeMoveFile(filePath, destination));
    }
  }

  if (options.recursive && options.cleanupEmpty) {
    reconcileEmptyFolders(root, options.deleteEmpty ?? false, labels, report);
  }

  const failed = report.moves.filter(move => move.status === 'failed').length;
  logger.info(`Organized ${report.moves.length - failed} of ${report.moves.length} files under ${root}`, {
    failed,
    emptyFolders: report.emptyFolders.found,
  });

  return report;
}
