/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { getHashes } from 'crypto';
import YAML from 'js-yaml';
import { logger, isLogLevel, LogLevel } from './logger.js';
import { DEFAULT_LABELS } from './labels.js';
import { OrganizerLabels, OrganizerOptions } from './types.js';

export interface SimilarityConfig {
  threshold: number;
}

export interface HashingConfig {
  algorithm: string;
  chunkSize: number;
}

export interface OrganizerConfig {
  labels: OrganizerLabels;
  defaults: OrganizerOptions;
  similarity: SimilarityConfig;
  hashing: HashingConfig;
  logLevel: LogLevel;
  logFile: string | null;
}

export const DEFAULT_CONFIG_PATH = './folder-organizer.yaml';

export const DEFAULT_CONFIG: OrganizerConfig = {
  labels: { ...DEFAULT_LABELS },
  defaults: {
    recursive: false,
    checkContents: false,
    cleanupEmpty: false,
    deleteEmpty: false
  },
  similarity: {
    threshold: 60
  },
  hashing: {
    algorithm: 'md5',
    chunkSize: 64 * 1024
  },
  logLevel: 'info',
  logFile: null
};

function cloneConfig(config: OrganizerConfig): OrganizerConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickStrings<K extends string>(source: Record<string, unknown>, keys: readonly K[]): Partial<Record<K, string>> {
  const picked: Partial<Record<K, string>> = {};
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string') picked[key] = value;
  }
  return picked;
}

function pickBooleans<K extends string>(source: Record<string, unknown>, keys: readonly K[]): Partial<Record<K, boolean>> {
  const picked: Partial<Record<K, boolean>> = {};
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'boolean') picked[key] = value;
  }
  return picked;
}

const LABEL_KEYS: readonly (keyof OrganizerLabels)[] = [
  'typePrefix',
  'noExtension',
  'similarPrefix',
  'oneFolder',
  'duplicatesFolder',
  'duplicatePrefix',
  'emptyFolders',
];
const OPTION_KEYS = ['recursive', 'checkContents', 'cleanupEmpty', 'deleteEmpty'] as const;

/**
 * Merge a parsed config document over a base config (document values take precedence).
 * Unknown keys and values of the wrong type are ignored.
 */
export function mergeConfig(base: OrganizerConfig, raw: unknown): OrganizerConfig {
  const merged = cloneConfig(base);
  if (!isRecord(raw)) return merged;

  if (isRecord(raw.labels)) {
    merged.labels = { ...merged.labels, ...pickStrings(raw.labels, LABEL_KEYS) };
  }

  if (isRecord(raw.defaults)) {
    merged.defaults = { ...merged.defaults, ...pickBooleans(raw.defaults, OPTION_KEYS) };
  }

  if (isRecord(raw.similarity) && typeof raw.similarity.threshold === 'number') {
    merged.similarity.threshold = raw.similarity.threshold;
  }

  if (isRecord(raw.hashing)) {
    if (typeof raw.hashing.algorithm === 'string') merged.hashing.algorithm = raw.hashing.algorithm;
    if (typeof raw.hashing.chunkSize === 'number') merged.hashing.chunkSize = raw.hashing.chunkSize;
  }

  if (isLogLevel(raw.logLevel)) {
    merged.logLevel = raw.logLevel;
  }

  if (typeof raw.logFile === 'string' || raw.logFile === null) {
    merged.logFile = raw.logFile;
  }

  return merged;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: OrganizerConfig;
  private configPath: string;
  private isDirty = false;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): OrganizerConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath }
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.debug(`Loaded configuration from ${this.configPath}`);

      return mergeConfig(DEFAULT_CONFIG, parsed);
    } catch (error) {
      logger.warn(
        `Failed to load config: ${error instanceof Error ? error.message : String(error)}`
      );
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Get complete configuration
   */
  getAll(): OrganizerConfig {
    return cloneConfig(this.config);
  }

  get<K extends keyof OrganizerConfig>(key: K): OrganizerConfig[K] {
    return structuredClone(this.config[key]);
  }

  set<K extends keyof OrganizerConfig>(key: K, value: OrganizerConfig[K]): void {
    this.config[key] = value;
    this.isDirty = true;

    logger.debug(`Config updated: ${key}`, { value });
  }

  /**
   * Save configuration to file
   */
  save(): void {
    if (!this.isDirty) return;

    try {
      mkdirSync(dirname(this.configPath), { recursive: true });
      let content: string;

      if (this.configPath.endsWith('.json')) {
        content = JSON.stringify(this.config, null, 2);
      } else {
        content = YAML.dump(this.config, { indent: 2 });
      }

      writeFileSync(this.configPath, content);
      this.isDirty = false;

      logger.info(`Configuration saved to ${this.configPath}`);
    } catch (error) {
      logger.error(
        `Failed to save config: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.isDirty = true;
    logger.info('Configuration reset to defaults');
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (const key of LABEL_KEYS) {
      const value = this.config.labels[key];
      if (value.trim().length === 0) {
        errors.push(`Label "${key}" must not be empty`);
      } else if (/[\\/]/.test(value) || value === '.' || value === '..') {
        errors.push(`Label "${key}" must be a plain folder or file name`);
      }
    }

    const { threshold } = this.config.similarity;
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 100) {
      errors.push('Similarity threshold must be between 0 and 100');
    }

    const { chunkSize, algorithm } = this.config.hashing;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      errors.push('Hashing chunk size must be a positive integer');
    }

    if (!getHashes().includes(algorithm.toLowerCase())) {
      errors.push(`Unsupported hashing algorithm: ${algorithm}`);
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Export configuration as JSON
   */
  toJSON(): string {
    return JSON.stringify(this.config, null, 2);
  }

  /**
   * Export configuration as YAML
   */
  toYAML(): string {
    return YAML.dump(this.config);
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}

/**
 * Global config instance
 */
let globalConfig: ConfigManager | null = null;

/**
 * Get or create global config instance
 */
export function getConfig(path?: string): ConfigManager {
  if (!globalConfig || (path && globalConfig.getPath() !== path)) {
    globalConfig = new ConfigManager(path);
  }
  return globalConfig;
}

/**
 * Create example config file
 */
export function createExampleConfig(outputPath: string = './folder-organizer.example.yaml'): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  const content = YAML.dump(DEFAULT_CONFIG);
  writeFileSync(outputPath, content);
  logger.info(`Example config created at ${outputPath}`);
}
