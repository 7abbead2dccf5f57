import { join } from 'path';
import { PkUpdatesConfig, PkUpdatesDirectories } from '../types/index.js';
import { CONFIG_DEFAULTS, FILE_PATTERNS } from '../constants/index.js';
import { readJsonOrJsoncFile, writeTextFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getPkUpdatesDirectories } from './directory.js';

/**
 * Configuration management for the pkupdates CLI
 * Supports both JSON and JSONC formats
 */

const DEFAULT_CONFIG: PkUpdatesConfig = { ...CONFIG_DEFAULTS };

type ConfigKey = keyof PkUpdatesConfig;

function renderDefaultConfig(config: PkUpdatesConfig): string {
  return [
    '{',
    '  // Minutes a refreshed cache is reused by checks that are not forced',
    `  "cacheMaxAgeMinutes": ${config.cacheMaxAgeMinutes},`,
    '  // Allow automatic checks on battery power',
    `  "checkOnBattery": ${config.checkOnBattery},`,
    '  // Allow automatic checks on metered connections',
    `  "checkOnMobile": ${config.checkOnMobile},`,
    '  // Retry installs that need untrusted packages without the trusted-only flag',
    `  "retryUntrusted": ${config.retryUntrusted}`,
    '}',
    ''
  ].join('\n');
}

/**
 * Validate a parsed config file and merge it over the defaults.
 * Unknown keys are ignored with a debug line.
 */
export function parseConfig(raw: unknown, source: string): PkUpdatesConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Invalid configuration structure in ${source}`, { source });
  }

  const config: PkUpdatesConfig = { ...DEFAULT_CONFIG };
  for (const [key, value] of Object.entries(raw)) {
    if (key === 'cacheMaxAgeMinutes') {
      if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
        throw new ConfigError(`'${key}' must be a non-negative number`, { source, key, value });
      }
      config.cacheMaxAgeMinutes = value;
    } else if (key === 'checkOnBattery' || key === 'checkOnMobile' || key === 'retryUntrusted') {
      if (typeof value !== 'boolean') {
        throw new ConfigError(`'${key}' must be true or false`, { source, key, value });
      }
      config[key] = value;
    } else {
      logger.debug(`Ignoring unknown config key '${key}'`, { source });
    }
  }
  return config;
}

class ConfigManager {
  private config: PkUpdatesConfig | null = null;
  private readonly dirs: PkUpdatesDirectories;

  constructor(dirs: PkUpdatesDirectories = getPkUpdatesDirectories()) {
    this.dirs = dirs;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
      const path = join(this.dirs.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file, create default if it doesn't exist
   */
  async load(): Promise<PkUpdatesConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = { ...DEFAULT_CONFIG };
      await this.writeDefault(join(this.dirs.config, FILE_PATTERNS.DEFAULT_CONFIG_FILE));
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration: ${configPath}`, { configPath, error });
    }
    this.config = parseConfig(raw, configPath);
    return this.config;
  }

  private async writeDefault(path: string): Promise<void> {
    try {
      await writeTextFile(path, renderDefaultConfig(DEFAULT_CONFIG));
    } catch (error) {
      // Read-only home: keep running on defaults
      logger.warn(`Could not write default configuration to ${path}`, { error });
    }
  }
}

export { ConfigManager };
