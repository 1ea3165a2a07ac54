/**
 * Grouping strategies: pure mappings from scanned files to a suggestion of
 * destination label -> source paths. Nothing here touches the filesystem
 * except through the hasher, and only when content checking is enabled.
 */

import { statSync } from 'fs';
import path from 'path';
import { hashFile } from './content-hasher.js';
import { HashIOError } from './errors.js';
import { DEFAULT_LABELS, typeLabel } from './labels.js';
import { contentSimilarity, DEFAULT_SIMILARITY_THRESHOLD, nameSimilarity } from './similarity.js';
import { FileDescriptor, GroupingSuggestion, Hasher, OrganizerLabels } from './types.js';

export interface TypeGroupingOptions {
  recursive?: boolean;
  root?: string;
  labels?: OrganizerLabels;
}

/**
 * Partition files by extension. In a recursive scan, extensions seen only
 * once are folded into a single entry keyed by the resolved root: no folder
 * is made for a lone file type.
 */
export function groupByType(files: FileDescriptor[], options: TypeGroupingOptions = {}): GroupingSuggestion {
  const labels = options.labels ?? DEFAULT_LABELS;
  const byType = new Map<string, string[]>();
  for (const file of files) {
    const paths = byType.get(file.extension) ?? [];
    paths.push(file.path);
    byType.set(file.extension, paths);
  }

  const suggestions: GroupingSuggestion = new Map();
  const rootKey = options.recursive && options.root ? path.resolve(options.root) : null;

  for (const [extension, paths] of byType) {
    if (rootKey && paths.length === 1) {
      const rootPaths = suggestions.get(rootKey) ?? [];
      rootPaths.push(paths[0]);
      suggestions.set(rootKey, rootPaths);
      continue;
    }
    suggestions.set(typeLabel(extension, labels), paths);
  }

  return suggestions;
}

export interface SimilarityGroupingOptions {
  checkContents?: boolean;
  threshold?: number;
  labels?: OrganizerLabels;
  hasher?: Hasher;
}

/**
 * Greedy single-pass clustering. Each unprocessed file seeds a group and
 * pulls in every later unprocessed file scoring at or above the threshold.
 * Order-dependent; a file joins at most one group.
 */
export function groupBySimilarity(
  files: FileDescriptor[],
  options: SimilarityGroupingOptions = {},
): GroupingSuggestion {
  const labels = options.labels ?? DEFAULT_LABELS;
  const threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const checkContents = options.checkContents ?? false;
  const hasher = options.hasher ?? ((filePath: string) => hashFile(filePath));

  const digests = new Map<string, string>();
  const keyOf = (file: FileDescriptor): string => {
    if (!checkContents) return file.name;
    let digest = digests.get(file.path);
    if (digest === undefined) {
      digest = hasher(file.path);
      digests.set(file.path, digest);
    }
    return digest;
  };
  const score = checkContents ? contentSimilarity : nameSimilarity;

  const suggestions: GroupingSuggestion = new Map();
  const processed = new Set<string>();
  let groupCounter = 1;

  files.forEach((seed, index) => {
    if (processed.has(seed.path)) return;

    const group = [seed.path];
    const seedKey = keyOf(seed);

    for (const candidate of files.slice(index + 1)) {
      if (processed.has(candidate.path)) continue;
      if (score(seedKey, keyOf(candidate)) >= threshold) {
        group.push(candidate.path);
        processed.add(candidate.path);
      }
    }

    if (group.length > 1) {
      suggestions.set(`${labels.similarPrefix}${groupCounter}`, group);
      groupCounter++;
    }
    processed.add(seed.path);
  });

  return suggestions;
}

export function groupIntoOneFolder(
  files: FileDescriptor[],
  options: { labels?: OrganizerLabels } = {},
): GroupingSuggestion {
  const labels = options.labels ?? DEFAULT_LABELS;
  if (files.length === 0) {
    return new Map();
  }
  return new Map([[labels.oneFolder, files.map(file => file.path)]]);
}

export interface DuplicateGroupingOptions {
  checkContents?: boolean;
  labels?: OrganizerLabels;
  hasher?: Hasher;
}

function fileSize(filePath: string): number {
  try {
    return statSync(filePath).size;
  } catch (error) {
    throw new HashIOError(filePath, error);
  }
}

/**
 * Name-collision duplicates that should actually be relocated.
 * Without content checking every candidate is trusted. With it, only files
 * sharing a digest with another candidate survive; empty files are never
 * hashed and never survive.
 */
export function refineDuplicates(duplicates: string[], options: DuplicateGroupingOptions = {}): string[] {
  if (!options.checkContents) {
    return [...duplicates];
  }

  const hasher = options.hasher ?? ((filePath: string) => hashFile(filePath));
  const byDigest = new Map<string, string[]>();
  for (const candidate of duplicates) {
    if (fileSize(candidate) === 0) continue;
    const digest = hasher(candidate);
    const group = byDigest.get(digest) ?? [];
    group.push(candidate);
    byDigest.set(digest, group);
  }

  return [...byDigest.values()].filter(group => group.length > 1).flat();
}

/**
 * Preview of what the duplicate resolver would relocate.
 */
export function groupByDuplicate(duplicates: string[], options: DuplicateGroupingOptions = {}): GroupingSuggestion {
  const labels = options.labels ?? DEFAULT_LABELS;
  const refined = refineDuplicates(duplicates, options);
  if (refined.length === 0) {
    return new Map();
  }
  return new Map([[labels.duplicatesFolder, refined]]);
}

export type GroupingStrategyKind = 'type' | 'similarity' | 'consolidate';

export const GROUPING_STRATEGY_KINDS: readonly GroupingStrategyKind[] = ['type', 'similarity', 'consolidate'];

export interface StrategyContext {
  root: string;
  recursive: boolean;
  checkContents: boolean;
  labels: OrganizerLabels;
  similarityThreshold?: number;
  hasher?: Hasher;
}

export interface GroupingStrategy {
  readonly kind: GroupingStrategyKind;
  readonly title: string;
  suggest(files: FileDescriptor[], context: StrategyContext): GroupingSuggestion;
}

export class ByTypeStrategy implements GroupingStrategy {
  readonly kind = 'type';
  readonly title = 'Type';

  suggest(files: FileDescriptor[], context: StrategyContext): GroupingSuggestion {
    return groupByType(files, {
      recursive: context.recursive,
      root: context.root,
      labels: context.labels,
    });
  }
}

export class BySimilarityStrategy implements GroupingStrategy {
  readonly kind = 'similarity';
  readonly title = 'Similarity';

  suggest(files: FileDescriptor[], context: StrategyContext): GroupingSuggestion {
    return groupBySimilarity(files, {
      checkContents: context.checkContents,
      threshold: context.similarityThreshold,
      labels: context.labels,
      hasher: context.hasher,
    });
  }
}

export class ConsolidateStrategy implements GroupingStrategy {
  readonly kind = 'consolidate';
  readonly title = 'Move Files into One Folder';

  suggest(files: FileDescriptor[], context: StrategyContext): GroupingSuggestion {
    return groupIntoOneFolder(files, { labels: context.labels });
  }
}

export function createStrategy(kind: GroupingStrategyKind): GroupingStrategy {
  switch (kind) {
    case 'type':
      return new ByTypeStrategy();
    case 'similarity':
      return new BySimilarityStrategy();
    case 'consolidate':
      return new ConsolidateStrategy();
    default: {
      const exhaustive: never = kind;
      throw new Error(`Unsupported grouping strategy ${String(exhaustive)}`);
    }
  }
}

export function isGroupingStrategyKind(value: string): value is GroupingStrategyKind {
  return GROUPING_STRATEGY_KINDS.some(kind => kind === value);
}
