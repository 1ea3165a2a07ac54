/**
 * Public API
 */

export * from './types.js';
export * from './errors.js';
export { DEFAULT_LABELS, resolveLabels, typeLabel } from './labels.js';
export { Logger, logger, AppError, handleError, configureLogging, getLoggingSettings } from './logger.js';
export type { LogLevel, LogEntry, LoggerOptions, LoggingSettings } from './logger.js';
export {
  ConfigManager,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  createExampleConfig,
  getConfig,
  mergeConfig,
} from './config.js';
export type { OrganizerConfig, SimilarityConfig, HashingConfig } from './config.js';
export { hashFile, createHasher, DEFAULT_HASH_ALGORITHM, DEFAULT_CHUNK_SIZE } from './content-hasher.js';
export type { HashOptions } from './content-hasher.js';
export { scanDirectory, describeFile, deriveExtension, fileStem, tokenizeName } from './directory-scanner.js';
export type { ScanOptions } from './directory-scanner.js';
export { contentSimilarity, nameSimilarity, stemSimilarity, DEFAULT_SIMILARITY_THRESHOLD } from './similarity.js';
export {
  groupByType,
  groupBySimilarity,
  groupIntoOneFolder,
  groupByDuplicate,
  refineDuplicates,
  createStrategy,
  isGroupingStrategyKind,
  GROUPING_STRATEGY_KINDS,
  ByTypeStrategy,
  BySimilarityStrategy,
  ConsolidateStrategy,
} from './grouping-strategies.js';
export type { GroupingStrategy, GroupingStrategyKind, StrategyContext } from './grouping-strategies.js';
export { safeMoveFile, safeMoveFolder, safeDeleteEmptyFolder, nextFreePath } from './safe-move.js';
export { organizeFiles } from './plan-executor.js';
export type { OrganizeOptions } from './plan-executor.js';
export { resolveDuplicates } from './duplicate-resolver.js';
export type { ResolveDuplicatesOptions } from './duplicate-resolver.js';
export { analyzeFolder, formatAnalysisReport, recommendStrategy } from './folder-analysis.js';
export type { AnalyzeOptions, FolderAnalysis, StrategySuggestion } from './folder-analysis.js';
export { OrganizerSession } from './organizer-session.js';
export type { SessionSettings } from './organizer-session.js';
