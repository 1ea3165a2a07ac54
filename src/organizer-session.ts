import { scanDirectory } from './directory-scanner.js';
import { resolveDuplicates } from './duplicate-resolver.js';
import { createStrategy, groupByDuplicate, GroupingStrategyKind, StrategyContext } from './grouping-strategies.js';
import { DEFAULT_LABELS } from './labels.js';
import { organizeFiles } from './plan-executor.js';
import {
  DuplicateReport,
  GroupingSuggestion,
  Hasher,
  OrganizeReport,
  OrganizerLabels,
  OrganizerOptions,
  ScanResult,
} from './types.js';

export interface SessionSettings {
  labels?: OrganizerLabels;
  similarityThreshold?: number;
  hasher?: Hasher;
}

/**
 * Holds one folder's scan between a preview and its execution. Executing
 * drops the scan, so the next suggestion sees the filesystem as it is now.
 */
export class OrganizerSession {
  private lastScan: ScanResult | null = null;
  private readonly labels: OrganizerLabels;

  constructor(
    readonly root: string,
    readonly options: OrganizerOptions,
    private readonly settings: SessionSettings = {},
  ) {
    this.labels = settings.labels ?? DEFAULT_LABELS;
  }

  get currentScan(): ScanResult | null {
    return this.lastScan;
  }

  scan(): ScanResult {
    this.lastScan = scanDirectory(this.root, { recursive: this.options.recursive });
    return this.lastScan;
  }

  private ensureScan(): ScanResult {
    return this.lastScan ?? this.scan();
  }

  private context(scan: ScanResult): StrategyContext {
    return {
      root: scan.root,
      recursive: scan.recursive,
      checkContents: this.options.checkContents,
      labels: this.labels,
      similarityThreshold: this.settings.similarityThreshold,
      hasher: this.settings.hasher,
    };
  }

  suggest(kind: GroupingStrategyKind): GroupingSuggestion {
    const scan = this.ensureScan();
    return createStrategy(kind).suggest(scan.files, this.context(scan));
  }

  suggestDuplicates(): GroupingSuggestion {
    const scan = this.ensureScan();
    return groupByDuplicate(scan.duplicates, {
      checkContents: this.options.checkContents,
      labels: this.labels,
      hasher: this.settings.hasher,
    });
  }

  organize(kind: GroupingStrategyKind): OrganizeReport {
    const scan = this.ensureScan();
    const suggestion = createStrategy(kind).suggest(scan.files, this.context(scan));
    try {
      return organizeFiles(suggestion, {
        root: scan.root,
        recursive: this.options.recursive,
        cleanupEmpty: this.options.cleanupEmpty,
        deleteEmpty: this.options.deleteEmpty,
        labels: this.labels,
      });
    } finally {
      this.lastScan = null;
    }
  }

  moveDuplicates(): DuplicateReport {
    const scan = this.ensureScan();
    try {
      return resolveDuplicates(scan.duplicates, scan.root, {
        checkContents: this.options.checkContents,
        labels: this.labels,
        hasher: this.settings.hasher,
      });
    } finally {
      this.lastScan = null;
    }
  }
}
