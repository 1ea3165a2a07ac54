/**
 * Core types shared by the scanner, strategies and executors
 */

/** Extension sentinel for files whose name carries no suffix. */
export const NO_EXTENSION = '.no_extension';

/**
 * One canonical (first seen) file per base name within a scan
 */
export interface FileDescriptor {
  path: string;
  name: string;
  /** Lowercased suffix with its dot, or NO_EXTENSION */
  extension: string;
  nameTokens: string[];
}

export interface SkippedEntry {
  path: string;
  reason: string;
}

export interface ScanResult {
  root: string;
  recursive: boolean;
  files: FileDescriptor[];
  /** Name-collision duplicates in traversal order, not yet checked by content */
  duplicates: string[];
  skipped: SkippedEntry[];
}

/**
 * Destination label -> source paths. A label is a folder name under the
 * scan root, or the root path itself for files that stay where they are.
 */
export type GroupingSuggestion = Map<string, string[]>;

/**
 * Folder and file name sentinels
 */
export interface OrganizerLabels {
  typePrefix: string;
  noExtension: string;
  similarPrefix: string;
  oneFolder: string;
  duplicatesFolder: string;
  duplicatePrefix: string;
  emptyFolders: string;
}

export interface OrganizerOptions {
  recursive: boolean;
  checkContents: boolean;
  cleanupEmpty: boolean;
  deleteEmpty: boolean;
}

export type Hasher = (filePath: string) => string;

export type OperationStatus = 'applied' | 'skipped' | 'failed';

export interface MoveRecord {
  kind: 'file' | 'folder';
  sourcePath: string;
  destinationPath: string;
  status: OperationStatus;
  reason?: string;
}

export interface DeleteRecord {
  path: string;
  status: OperationStatus;
  reason?: string;
}

export interface OrganizeReport {
  root: string;
  moves: MoveRecord[];
  emptyFolders: {
    found: number;
    mode: 'none' | 'delete' | 'relocate';
    destination?: string;
    deleted: DeleteRecord[];
    relocated: MoveRecord[];
  };
}

export interface DuplicateReport {
  root: string;
  folder: string | null;
  candidates: number;
  moves: MoveRecord[];
}
