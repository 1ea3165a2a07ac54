import fs from 'fs';
import path from 'path';
import { DeleteError, MoveError } from './errors.js';
import { Logger } from './logger.js';
import { DeleteRecord, MoveRecord } from './types.js';

const logger = new Logger({ context: 'file-ops' });

/**
 * True for anything at targetPath, dangling symlinks included.
 */
export function pathExists(targetPath: string): boolean {
  try {
    fs.lstatSync(targetPath);
    return true;
  } catch {
    return false;
  }
}

function isCrossDeviceError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EXDEV';
}

/**
 * First free destination for baseName in folder: "name.ext", then
 * "name_1.ext", "name_2.ext", ... Every candidate is checked again, so a
 * run that left "name_1.ext" behind moves on to "name_2.ext".
 */
export function nextFreePath(folder: string, baseName: string, prefix = ''): string {
  const { name, ext } = path.parse(baseName);
  let candidate = path.join(folder, `${prefix}${baseName}`);
  let counter = 1;
  while (pathExists(candidate)) {
    candidate = path.join(folder, `${prefix}${name}_${counter}${ext}`);
    counter++;
  }
  return candidate;
}

/**
 * Rename, falling back to copy + remove when source and destination sit on
 * different devices.
 */
export function movePath(sourcePath: string, destinationPath: string): void {
  try {
    fs.renameSync(sourcePath, destinationPath);
  } catch (error) {
    if (!isCrossDeviceError(error)) {
      throw error;
    }
    fs.cpSync(sourcePath, destinationPath, { recursive: true, errorOnExist: true, force: false });
    fs.rmSync(sourcePath, { recursive: true });
  }
}

function moveWithRecord(
  kind: MoveRecord['kind'],
  sourcePath: string,
  destinationPath: string,
): MoveRecord {
  try {
    movePath(sourcePath, destinationPath);
    logger.debug(`Moved ${kind} ${sourcePath} -> ${destinationPath}`);
    return { kind, sourcePath, destinationPath, status: 'applied' };
  } catch (error) {
    const moveError = new MoveError(sourcePath, destinationPath, error);
    logger.error(moveError.message, moveError);
    return { kind, sourcePath, destinationPath, status: 'failed', reason: moveError.message };
  }
}

/**
 * Move a file into destinationFolder without overwriting anything there.
 * Failures are logged and returned as a failed record, never thrown.
 */
export function safeMoveFile(sourcePath: string, destinationFolder: string, prefix = ''): MoveRecord {
  const baseName = path.basename(sourcePath);
  const inPlace = path.join(destinationFolder, `${prefix}${baseName}`);
  if (path.resolve(inPlace) === path.resolve(sourcePath)) {
    return {
      kind: 'file',
      sourcePath,
      destinationPath: inPlace,
      status: 'skipped',
      reason: 'Already in destination folder',
    };
  }

  return moveWithRecord('file', sourcePath, nextFreePath(destinationFolder, baseName, prefix));
}

/**
 * Move a whole directory into destinationFolder as a subdirectory.
 */
export function safeMoveFolder(sourcePath: string, destinationFolder: string): MoveRecord {
  const destinationPath = nextFreePath(destinationFolder, path.basename(sourcePath));
  return moveWithRecord('folder', sourcePath, destinationPath);
}

/**
 * Remove a directory only if it is empty.
 */
export function safeDeleteEmptyFolder(folderPath: string): DeleteRecord {
  try {
    fs.rmdirSync(folderPath);
    logger.debug(`Deleted empty folder ${folderPath}`);
    return { path: folderPath, status: 'applied' };
  } catch (error) {
    const deleteError = new DeleteError(folderPath, error);
    logger.error(deleteError.message, deleteError);
    return { path: folderPath, status: 'failed', reason: deleteError.message };
  }
}
