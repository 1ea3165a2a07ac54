/**
 * Folder analysis: one scan, every strategy's suggestion, and a
 * recommendation for which one to apply.
 */

import path from 'path';
import { scanDirectory } from './directory-scanner.js';
import {
  createStrategy,
  GROUPING_STRATEGY_KINDS,
  groupByDuplicate,
  GroupingStrategyKind,
  StrategyContext,
} from './grouping-strategies.js';
import { DEFAULT_LABELS } from './labels.js';
import { GroupingSuggestion, Hasher, OrganizerLabels, ScanResult } from './types.js';

export interface AnalyzeOptions {
  recursive?: boolean;
  checkContents?: boolean;
  labels?: OrganizerLabels;
  similarityThreshold?: number;
  hasher?: Hasher;
}

export interface StrategySuggestion {
  kind: GroupingStrategyKind;
  title: string;
  suggestion: GroupingSuggestion;
}

export interface FolderAnalysis {
  scan: ScanResult;
  strategies: StrategySuggestion[];
  duplicatePreview: GroupingSuggestion;
  /** [extension, count] sorted by extension */
  extensionCounts: Array<[string, number]>;
  recommendation: GroupingStrategyKind;
}

const RECOMMENDATION_TEXT: Record<GroupingStrategyKind, string> = {
  type: "'Type' - Best for organizing varied file types.",
  similarity: "'Similarity' - Good for grouping similar filenames.",
  consolidate: "'Move Files into One Folder' - Simplest consolidation into one folder.",
};

export function countExtensions(scan: ScanResult): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const file of scan.files) {
    counts.set(file.extension, (counts.get(file.extension) ?? 0) + 1);
  }
  return [...counts.entries()].sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));
}

function suggestionFor(strategies: StrategySuggestion[], kind: GroupingStrategyKind): GroupingSuggestion {
  return strategies.find(strategy => strategy.kind === kind)?.suggestion ?? new Map();
}

/**
 * "type" when there are more than two type entries; "similarity" when
 * there is more than one similar group and fewer than half the files are
 * left out of them; otherwise "consolidate".
 */
export function recommendStrategy(fileCount: number, byType: GroupingSuggestion, bySimilarity: GroupingSuggestion): GroupingStrategyKind {
  if (byType.size > 2) {
    return 'type';
  }
  let grouped = 0;
  for (const paths of bySimilarity.values()) {
    grouped += paths.length;
  }
  if (bySimilarity.size > 1 && fileCount - grouped < Math.floor(fileCount / 2)) {
    return 'similarity';
  }
  return 'consolidate';
}

export function analyzeFolder(root: string, options: AnalyzeOptions = {}): FolderAnalysis {
  const scan = scanDirectory(root, { recursive: options.recursive });
  const context: StrategyContext = {
    root: scan.root,
    recursive: scan.recursive,
    checkContents: options.checkContents ?? false,
    labels: options.labels ?? DEFAULT_LABELS,
    similarityThreshold: options.similarityThreshold,
    hasher: options.hasher,
  };

  const strategies = GROUPING_STRATEGY_KINDS.map((kind): StrategySuggestion => {
    const strategy = createStrategy(kind);
    return { kind, title: strategy.title, suggestion: strategy.suggest(scan.files, context) };
  });

  const duplicatePreview = groupByDuplicate(scan.duplicates, {
    checkContents: context.checkContents,
    labels: context.labels,
    hasher: context.hasher,
  });

  return {
    scan,
    strategies,
    duplicatePreview,
    extensionCounts: countExtensions(scan),
    recommendation: recommendStrategy(
      scan.files.length,
      suggestionFor(strategies, 'type'),
      suggestionFor(strategies, 'similarity'),
    ),
  };
}

export function formatAnalysisReport(analysis: FolderAnalysis): string {
  const { scan } = analysis;
  const scope = scan.recursive ? 'Recursive' : 'Top-Level Only';
  const lines: string[] = [
    `Analysis Results of ${scan.files.length + scan.duplicates.length} Total Files (${scope}):`,
    `Unique Files: ${scan.files.length}, Duplicates Found: ${scan.duplicates.length}`,
    '',
    'You Currently Have:',
  ];

  for (const [extension, count] of analysis.extensionCounts) {
    lines.push(`${count} ${extension} file(s)`);
  }

  if (scan.duplicates.length > 0) {
    lines.push('', 'Duplicates (Not Yet Sorted):', ...scan.duplicates);
  }

  if (scan.skipped.length > 0) {
    lines.push('', 'Skipped Entries:');
    for (const entry of scan.skipped) {
      lines.push(`${entry.path}: ${entry.reason}`);
    }
  }

  lines.push('', 'Organization Options:');
  for (const { title, suggestion } of analysis.strategies) {
    if (suggestion.size === 0) continue;

    const groups = [...suggestion.keys()].filter(label => label !== scan.root).length;
    const largest = Math.max(...[...suggestion.values()].map(paths => paths.length));
    lines.push(`By ${title} (${groups} groups, largest: ${largest}):`);

    for (const [label, paths] of suggestion) {
      const samples = paths.slice(0, 2).map(filePath => path.basename(filePath)).join(', ');
      const name = label === scan.root ? 'Main Directory' : label;
      lines.push(`  ${name}: ${paths.length} files (e.g., ${samples})`);
    }
  }

  lines.push('', `Recommendation: ${RECOMMENDATION_TEXT[analysis.recommendation]}`);
  return lines.join('\n');
}
