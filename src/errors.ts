import { AppError } from './logger.js';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class InvalidRootError extends AppError {
  constructor(readonly rootPath: string, reason: string) {
    super(`Invalid root directory ${rootPath}: ${reason}`, 'INVALID_ROOT', 2, { rootPath });
    this.name = 'InvalidRootError';
  }
}

/**
 * A single directory entry that could not be statted or listed during a scan.
 * Recorded on the scan result, never thrown out of the scanner.
 */
export class ScanEntryError extends AppError {
  constructor(readonly entryPath: string, cause: unknown) {
    super(`Cannot read ${entryPath}: ${describeCause(cause)}`, 'SCAN_ENTRY_ERROR', 1, { entryPath });
    this.name = 'ScanEntryError';
  }
}

export class HashIOError extends AppError {
  constructor(readonly filePath: string, cause: unknown) {
    super(`Cannot hash ${filePath}: ${describeCause(cause)}`, 'HASH_IO_ERROR', 1, { filePath });
    this.name = 'HashIOError';
  }
}

export class MoveError extends AppError {
  constructor(
    readonly sourcePath: string,
    readonly destinationPath: string,
    cause: unknown,
  ) {
    super(
      `Error moving ${sourcePath} to ${destinationPath}: ${describeCause(cause)}`,
      'MOVE_ERROR',
      1,
      { sourcePath, destinationPath },
    );
    this.name = 'MoveError';
  }
}

export class DeleteError extends AppError {
  constructor(readonly folderPath: string, cause: unknown) {
    super(`Error deleting folder ${folderPath}: ${describeCause(cause)}`, 'DELETE_ERROR', 1, { folderPath });
    this.name = 'DeleteError';
  }
}

export class ConfigError extends AppError {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, 'CONFIG_ERROR', 2, { problems });
    this.name = 'ConfigError';
  }
}
