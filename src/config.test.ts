import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import YAML from 'js-yaml';
import { ConfigManager, DEFAULT_CONFIG, createExampleConfig, getConfig, mergeConfig } from './config.js';

describe('ConfigManager', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'organizer-config-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(configDir, { recursive: true, force: true });
  });

  describe('Initialization', () => {
    it('should load defaults if the file does not exist', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      expect(manager.getAll()).toEqual(DEFAULT_CONFIG);
    });

    it('should fall back to defaults on an unsupported extension', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const configPath = join(configDir, 'config.toml');
      writeFileSync(configPath, 'labels = 1');
      const manager = new ConfigManager(configPath);
      expect(manager.getAll()).toEqual(DEFAULT_CONFIG);
    });

    it('should fall back to defaults on malformed JSON', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const configPath = join(configDir, 'config.json');
      writeFileSync(configPath, '{ not json');
      expect(new ConfigManager(configPath).getAll()).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('YAML and JSON Configuration', () => {
    it('should merge a YAML document over the defaults', () => {
      const configPath = join(configDir, 'config.yaml');
      writeFileSync(
        configPath,
        [
          'labels:',
          '  duplicatesFolder: Copies',
          'defaults:',
          '  recursive: true',
          'similarity:',
          '  threshold: 75',
        ].join('\n'),
      );

      const config = new ConfigManager(configPath).getAll();
      expect(config.labels.duplicatesFolder).toBe('Copies');
      expect(config.labels.typePrefix).toBe('Type ');
      expect(config.defaults.recursive).toBe(true);
      expect(config.defaults.checkContents).toBe(false);
      expect(config.similarity.threshold).toBe(75);
      expect(config.hashing).toEqual({ algorithm: 'md5', chunkSize: 65536 });
    });

    it('should load a JSON document', () => {
      const configPath = join(configDir, 'config.json');
      writeFileSync(configPath, JSON.stringify({ hashing: { algorithm: 'sha256' }, logLevel: 'warn' }));

      const config = new ConfigManager(configPath).getAll();
      expect(config.hashing.algorithm).toBe('sha256');
      expect(config.logLevel).toBe('warn');
    });

    it('should save changes and read them back', () => {
      const configPath = join(configDir, 'nested', 'config.yaml');
      const manager = new ConfigManager(configPath);
      manager.set('similarity', { threshold: 80 });
      manager.save();

      expect(new ConfigManager(configPath).get('similarity')).toEqual({ threshold: 80 });
    });

    it('should not write anything when nothing changed', () => {
      const configPath = join(configDir, 'untouched.yaml');
      new ConfigManager(configPath).save();
      expect(() => readFileSync(configPath)).toThrow();
    });

    it('should hand out copies', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      manager.get('labels').oneFolder = 'Changed';
      expect(manager.get('labels').oneFolder).toBe('One Folder');
    });

    it('should reset to defaults', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      manager.set('logLevel', 'debug');
      manager.reset();
      expect(manager.get('logLevel')).toBe('info');
    });
  });

  describe('mergeConfig', () => {
    it('should ignore unknown keys and values of the wrong type', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, {
        labels: { oneFolder: 42, emptyFolders: 'Hollow', unknown: 'x' },
        defaults: { recursive: 'yes' },
        logLevel: 'verbose',
        logFile: 'organizer.log',
      });
      expect(merged.labels.oneFolder).toBe('One Folder');
      expect(merged.labels.emptyFolders).toBe('Hollow');
      expect(merged.defaults.recursive).toBe(false);
      expect(merged.logLevel).toBe('info');
      expect(merged.logFile).toBe('organizer.log');
    });

    it('should return a copy of the base for non-object documents', () => {
      const merged = mergeConfig(DEFAULT_CONFIG, 'just text');
      expect(merged).toEqual(DEFAULT_CONFIG);
      expect(merged).not.toBe(DEFAULT_CONFIG);
    });
  });

  describe('Validation', () => {
    it('should accept the defaults', () => {
      expect(new ConfigManager(join(configDir, 'missing.yaml')).validate()).toEqual({ valid: true, errors: [] });
    });

    it('should report every invalid value', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      manager.set('labels', { ...DEFAULT_CONFIG.labels, oneFolder: '', duplicatesFolder: 'a/b', emptyFolders: '..' });
      manager.set('similarity', { threshold: 120 });
      manager.set('hashing', { algorithm: 'not-a-hash', chunkSize: 0 });

      expect(manager.validate().errors).toEqual([
        'Label "oneFolder" must not be empty',
        'Label "duplicatesFolder" must be a plain folder or file name',
        'Label "emptyFolders" must be a plain folder or file name',
        'Similarity threshold must be between 0 and 100',
        'Hashing chunk size must be a positive integer',
        'Unsupported hashing algorithm: not-a-hash',
      ]);
    });
  });

  describe('Helpers', () => {
    it('should write an example config that loads back as the defaults', () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const outputPath = join(configDir, 'example.yaml');
      createExampleConfig(outputPath);

      expect(YAML.load(readFileSync(outputPath, 'utf8'))).toEqual(DEFAULT_CONFIG);
      expect(new ConfigManager(outputPath).getAll()).toEqual(DEFAULT_CONFIG);
    });

    it('should render the settings as YAML', () => {
      const manager = new ConfigManager(join(configDir, 'render.yaml'));
      expect(YAML.load(manager.toYAML())).toEqual(DEFAULT_CONFIG);
    });

    it('should reuse the global manager for the same path', () => {
      const configPath = join(configDir, 'global.yaml');
      expect(getConfig(configPath)).toBe(getConfig(configPath));
      expect(getConfig(join(configDir, 'other.yaml')).getPath()).toBe(join(configDir, 'other.yaml'));
    });
  });
});
