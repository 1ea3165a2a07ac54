#!/usr/bin/env node
/**
 * Folder organizer CLI
 */

import { config } from 'dotenv';
import { existsSync, realpathSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ConfigManager, createExampleConfig, DEFAULT_CONFIG_PATH, OrganizerConfig } from './config.js';
import { createHasher } from './content-hasher.js';
import { ConfigError } from './errors.js';
import { analyzeFolder, formatAnalysisReport } from './folder-analysis.js';
import { createStrategy, GroupingStrategyKind } from './grouping-strategies.js';
import { AppError, configureLogging, handleError, isLogLevel } from './logger.js';
import { OrganizerSession } from './organizer-session.js';
import { DuplicateReport, GroupingSuggestion, OperationStatus, OrganizeReport, OrganizerOptions } from './types.js';

config({ override: false });

export type CliCommand = 'analyze' | 'organize' | 'duplicates' | 'init-config';
export type CliMode = 'preview' | 'apply';
export type OrganizeTarget = 'type' | 'similarity' | 'one-folder';

export interface CliOptions {
  command: CliCommand;
  /** Folder to organize, or the output path for init-config */
  target?: string;
  by: OrganizeTarget;
  mode: CliMode;
  json: boolean;
  configPath?: string;
  recursive?: boolean;
  checkContents?: boolean;
  cleanupEmpty?: boolean;
  deleteEmpty?: boolean;
}

export const USAGE = [
  'Usage: folder-organizer <command> <dir> [options]',
  '',
  'Commands:',
  '  analyze                         Show what each grouping would do',
  '  organize --by <kind>            Group files by type, similarity or one-folder',
  '  duplicates                      Move same-named duplicates into one folder',
  '  init-config [path]              Write an example configuration file',
  '',
  'Options:',
  '  --recursive                     Include subfolders',
  '  --contents                      Compare file contents instead of names',
  '  --cleanup-empty                 Relocate folders left empty (with --recursive)',
  '  --delete-empty                  Delete empty folders instead of relocating them',
  '  --config <path>                 Configuration file (YAML or JSON)',
  '  --mode preview|apply            Preview (default) or perform the moves',
  '  --json                          Print machine-readable output',
].join('\n');

const COMMANDS: readonly CliCommand[] = ['analyze', 'organize', 'duplicates', 'init-config'];

const STRATEGY_FOR_TARGET: Record<OrganizeTarget, GroupingStrategyKind> = {
  type: 'type',
  similarity: 'similarity',
  'one-folder': 'consolidate',
};

function usageError(message: string): AppError {
  return new AppError(`${message}\n\n${USAGE}`, 'USAGE_ERROR', 2);
}

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some(command => command === value);
}

function isOrganizeTarget(value: string | undefined): value is OrganizeTarget {
  return value === 'type' || value === 'similarity' || value === 'one-folder';
}

export function parseArgs(argv: string[]): CliOptions {
  const [command, ...rest] = argv;
  if (!command || !isCommand(command)) {
    throw usageError(command ? `Unknown command: ${command}` : 'Missing command');
  }

  const options: CliOptions = { command, by: 'type', mode: 'preview', json: false };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (arg === '--by') {
      const value = rest[++i];
      if (!isOrganizeTarget(value)) {
        throw usageError(`Invalid --by value: ${value}`);
      }
      options.by = value;
      continue;
    }

    if (arg === '--mode') {
      const value = rest[++i];
      if (value !== 'preview' && value !== 'apply') {
        throw usageError(`Invalid --mode value: ${value}`);
      }
      options.mode = value;
      continue;
    }

    if (arg === '--config') {
      const value = rest[++i];
      if (!value) {
        throw usageError('Missing value for --config');
      }
      options.configPath = value;
      continue;
    }

    if (arg === '--recursive') {
      options.recursive = true;
      continue;
    }

    if (arg === '--contents') {
      options.checkContents = true;
      continue;
    }

    if (arg === '--cleanup-empty') {
      options.cleanupEmpty = true;
      continue;
    }

    if (arg === '--delete-empty') {
      options.deleteEmpty = true;
      continue;
    }

    if (arg === '--json') {
      options.json = true;
      continue;
    }

    if (arg.startsWith('--') || options.target !== undefined) {
      throw usageError(`Unknown argument: ${arg}`);
    }
    options.target = arg;
  }

  if (command !== 'init-config' && !options.target) {
    throw usageError('Missing directory argument');
  }

  return options;
}

/**
 * Command-line flags win over the configured defaults.
 */
export function resolveOrganizerOptions(options: CliOptions, defaults: OrganizerOptions): OrganizerOptions {
  return {
    recursive: options.recursive ?? defaults.recursive,
    checkContents: options.checkContents ?? defaults.checkContents,
    cleanupEmpty: options.cleanupEmpty ?? defaults.cleanupEmpty,
    deleteEmpty: options.deleteEmpty ?? defaults.deleteEmpty,
  };
}

function loadConfig(configPath: string | undefined): OrganizerConfig {
  const manager = new ConfigManager(configPath ?? DEFAULT_CONFIG_PATH);
  const { valid, errors } = manager.validate();
  if (!valid) {
    throw new ConfigError(errors);
  }
  return manager.getAll();
}

export function formatSuggestion(title: string, suggestion: GroupingSuggestion, root: string): string {
  if (suggestion.size === 0) {
    return `By ${title}: nothing to move`;
  }
  const lines = [`By ${title}:`];
  for (const [label, paths] of suggestion) {
    lines.push(`  ${label === root ? 'Main Directory' : label}: ${paths.length} files`);
    for (const filePath of paths) {
      lines.push(`    ${filePath}`);
    }
  }
  return lines.join('\n');
}

export function formatOrganizeReport(report: OrganizeReport): string {
  const applied = report.moves.filter(move => move.status === 'applied').length;
  const skipped = report.moves.filter(move => move.status === 'skipped').length;
  const failed = report.moves.filter(move => move.status === 'failed');

  const lines = [`Moved ${applied} of ${report.moves.length} files under ${report.root}`];
  if (skipped > 0) {
    lines.push(`Already in place: ${skipped}`);
  }
  for (const move of failed) {
    lines.push(`Failed: ${move.reason ?? move.sourcePath}`);
  }

  const { emptyFolders } = report;
  if (emptyFolders.mode === 'delete') {
    const deleted = emptyFolders.deleted.filter(record => record.status === 'applied').length;
    lines.push(`Deleted ${deleted} of ${emptyFolders.found} empty folders`);
  } else if (emptyFolders.mode === 'relocate') {
    const relocated = emptyFolders.relocated.filter(record => record.status === 'applied').length;
    lines.push(`Moved ${relocated} of ${emptyFolders.found} empty folders to ${emptyFolders.destination ?? report.root}`);
  }
  return lines.join('\n');
}

export function formatDuplicateReport(report: DuplicateReport): string {
  if (!report.folder) {
    return 'No duplicates found';
  }
  const applied = report.moves.filter(move => move.status === 'applied').length;
  const lines = [`Moved ${applied} of ${report.candidates} duplicates to ${report.folder}`];
  for (const move of report.moves) {
    if (move.status === 'failed') {
      lines.push(`Failed: ${move.reason ?? move.sourcePath}`);
    }
  }
  return lines.join('\n');
}

function hasFailures(report: OrganizeReport | DuplicateReport): boolean {
  const records: Array<{ status: OperationStatus }> = 'emptyFolders' in report
    ? [...report.moves, ...report.emptyFolders.relocated, ...report.emptyFolders.deleted]
    : report.moves;
  return records.some(record => record.status === 'failed');
}

function toJSON(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, entry: unknown) => (entry instanceof Map ? Object.fromEntries(entry) : entry),
    2,
  );
}

/**
 * Run one command. Output goes through write; the return value is the
 * process exit code.
 */
export function runCli(argv: string[], write: (text: string) => void = text => console.log(text)): number {
  const options = parseArgs(argv);

  if (options.command === 'init-config') {
    const outputPath = options.target ?? './folder-organizer.example.yaml';
    createExampleConfig(outputPath);
    write(`Example config written to ${outputPath}`);
    return 0;
  }

  const settings = loadConfig(options.configPath);
  const envLevel = process.env.LOG_LEVEL;
  configureLogging({
    level: isLogLevel(envLevel) ? envLevel : settings.logLevel,
    file: settings.logFile,
  });

  const root = path.resolve(options.target ?? '.');
  const organizerOptions = resolveOrganizerOptions(options, settings.defaults);
  const hasher = createHasher(settings.hashing);

  if (options.command === 'analyze') {
    const analysis = analyzeFolder(root, {
      recursive: organizerOptions.recursive,
      checkContents: organizerOptions.checkContents,
      labels: settings.labels,
      similarityThreshold: settings.similarity.threshold,
      hasher,
    });
    write(options.json ? toJSON(analysis) : formatAnalysisReport(analysis));
    return 0;
  }

  const session = new OrganizerSession(root, organizerOptions, {
    labels: settings.labels,
    similarityThreshold: settings.similarity.threshold,
    hasher,
  });

  if (options.command === 'organize') {
    const kind = STRATEGY_FOR_TARGET[options.by];
    if (options.mode === 'preview') {
      const suggestion = session.suggest(kind);
      const scanRoot = session.currentScan?.root ?? root;
      write(options.json ? toJSON(suggestion) : formatSuggestion(createStrategy(kind).title, suggestion, scanRoot));
      return 0;
    }
    const report = session.organize(kind);
    write(options.json ? toJSON(report) : formatOrganizeReport(report));
    return hasFailures(report) ? 1 : 0;
  }

  if (options.mode === 'preview') {
    const suggestion = session.suggestDuplicates();
    write(options.json ? toJSON(suggestion) : formatSuggestion('Duplicate', suggestion, root));
    return 0;
  }
  const report = session.moveDuplicates();
  write(options.json ? toJSON(report) : formatDuplicateReport(report));
  return hasFailures(report) ? 1 : 0;
}

function main(): void {
  try {
    process.exitCode = runCli(process.argv.slice(2));
  } catch (error) {
    const appError = handleError(error, 'cli');
    process.exitCode = appError.exitCode;
  }
}

const currentScriptPath = fileURLToPath(import.meta.url);
// Installed bins are symlinks, so compare resolved paths.
const invokedArg = process.argv[1] ? path.resolve(process.argv[1]) : '';
const invokedScriptPath = invokedArg && existsSync(invokedArg) ? realpathSync(invokedArg) : '';

if (invokedScriptPath && currentScriptPath === invokedScriptPath) {
  main();
}
