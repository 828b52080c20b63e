/**
 * Admission Control - Configuration Loader
 * Handles loading, validation, and hot-reloading of configuration
 */

import fs from 'fs';
import path from 'path';

import * as chokidar from 'chokidar';
import { parse as parseYaml } from 'yaml';

import { compileRuleIndex, type RuleIndex } from '../rate-limiter/rules/rule-index.js';
import type { BanPolicy, RateRuleInput } from '../rate-limiter/types.js';
import { ConfigError, toErrorMessage } from '../utils/errors.js';
import { getEnvBool, getEnvInt, getEnvString } from '../utils/helpers.js';
import logger, { logConfig } from '../utils/logger.js';

import { formatValidationErrors, safeValidateConfig, type AdmissionConfig } from './schema.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Validated settings together with the rule index compiled from them
 */
export interface LoadedConfig {
  config: AdmissionConfig;
  ruleIndex: RuleIndex;
}

export type ConfigChangeCallback = (next: LoadedConfig, previous: LoadedConfig) => void;

const DEFAULT_CONFIG_PATH = './config/admission.yaml';

// Settings read once at startup; a hot reload only swaps rules and exempt paths
const RESTART_FIELDS = [
  'failureMode',
  'store',
  'keyPrefix',
  'storeTimeoutMs',
  'trustProxy',
  'redis',
  'enableBans',
  'siteBan',
  'banOffenses',
  'banLength',
  'banMaxLength',
  'banCounterTtl',
] as const;

// =============================================================================
// Parsing Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse YAML or JSON text by file extension
 */
export function parseConfigText(content: string, extension: string): unknown {
  switch (extension.toLowerCase()) {
    case '.yaml':
    case '.yml':
      return parseYaml(content);
    case '.json':
      return JSON.parse(content);
    default:
      throw new ConfigError(`Unsupported config file format: ${extension}`);
  }
}

/**
 * Overlay environment variables on raw file content, before validation
 */
export function applyEnvOverrides(raw: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };

  const failureMode = getEnvString('ADMISSION_FAILURE_MODE');
  if (failureMode !== undefined) {
    merged.failureMode = failureMode.toLowerCase();
  }
  const siteBan = getEnvBool('ADMISSION_SITE_BAN');
  if (siteBan !== undefined) {
    merged.siteBan = siteBan;
  }
  const keyPrefix = getEnvString('ADMISSION_KEY_PREFIX');
  if (keyPrefix !== undefined) {
    merged.keyPrefix = keyPrefix;
  }

  const redis: Record<string, unknown> = isRecord(raw.redis) ? { ...raw.redis } : {};
  const host = getEnvString('REDIS_HOST');
  if (host !== undefined) {
    redis.host = host;
  }
  const port = getEnvInt('REDIS_PORT');
  if (port !== undefined) {
    redis.port = port;
  }
  const password = getEnvString('REDIS_PASSWORD');
  if (password !== undefined) {
    redis.password = password;
  }
  const db = getEnvInt('REDIS_DB');
  if (db !== undefined) {
    redis.db = db;
  }
  const tls = getEnvBool('REDIS_TLS');
  if (tls !== undefined) {
    redis.tls = tls;
  }
  merged.redis = redis;

  return merged;
}

/**
 * Validate raw configuration and compile its rules. Throws ConfigError
 * listing every problem found.
 */
export function buildConfig(raw: unknown): LoadedConfig {
  const source = raw === null || raw === undefined ? {} : raw;
  if (!isRecord(source)) {
    throw new ConfigError('Invalid configuration', ['configuration must be a mapping']);
  }

  const result = safeValidateConfig(applyEnvOverrides(source));
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatValidationErrors(result.error));
  }

  const config = result.data;
  const ruleIndex = compileRuleIndex(toRuleInputs(config), config.exempt);

  return { config, ruleIndex };
}

export function toRuleInputs(config: AdmissionConfig): RateRuleInput[] {
  return Object.entries(config.rules).map(([pattern, rule]) => ({
    pattern,
    limit: rule.limit,
    periodSeconds: rule.periodSeconds,
    strategy: rule.strategy,
  }));
}

export function toBanPolicy(config: AdmissionConfig): BanPolicy {
  return {
    banOffenses: config.banOffenses,
    banLength: config.banLength,
    banMaxLength: config.banMaxLength,
    banCounterTtl: config.banCounterTtl,
  };
}

// =============================================================================
// Configuration Loader Class
// =============================================================================

export class ConfigLoader {
  private configPath: string;
  private watcher: chokidar.FSWatcher | null = null;
  private current: LoadedConfig | null = null;
  private changeCallbacks: ConfigChangeCallback[] = [];

  constructor(configPath?: string) {
    this.configPath =
      configPath ?? getEnvString('ADMISSION_CONFIG_PATH', DEFAULT_CONFIG_PATH) ?? DEFAULT_CONFIG_PATH;
  }

  /**
   * Load configuration from file and environment variables.
   * A missing file leaves everything to defaults and the environment.
   */
  public async load(): Promise<LoadedConfig> {
    let raw: unknown = {};

    if (fs.existsSync(this.configPath)) {
      const content = await fs.promises.readFile(this.configPath, 'utf-8');
      try {
        raw = parseConfigText(content, path.extname(this.configPath));
      } catch (error) {
        if (error instanceof ConfigError) {
          throw error;
        }
        throw new ConfigError(`Failed to parse ${this.configPath}`, [toErrorMessage(error)]);
      }
      logConfig('Configuration file loaded', { path: this.configPath });
    } else {
      logConfig('No config file found, using defaults and environment variables', {
        path: this.configPath,
      });
    }

    const loaded = buildConfig(raw);
    this.current = loaded;
    return loaded;
  }

  /**
   * Start watching config file for changes
   */
  public startWatching(): void {
    if (this.watcher !== null) {
      return;
    }

    if (!fs.existsSync(this.configPath)) {
      logConfig('Config file does not exist, hot reload disabled', { path: this.configPath });
      return;
    }

    this.watcher = chokidar.watch(this.configPath, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 500,
        pollInterval: 100,
      },
    });

    this.watcher.on('change', () => {
      void this.reload();
    });

    logConfig('Hot reload enabled, watching config file', { path: this.configPath });
  }

  /**
   * Stop watching config file
   */
  public async stopWatching(): Promise<void> {
    if (this.watcher !== null) {
      await this.watcher.close();
      this.watcher = null;
      logConfig('Hot reload disabled');
    }
  }

  /**
   * Re-read the file and notify listeners. An invalid file is logged and
   * the previous configuration stays in force.
   */
  public async reload(): Promise<boolean> {
    const previous = this.current;

    let next: LoadedConfig;
    try {
      next = await this.load();
    } catch (error) {
      logger.error('Failed to reload configuration, keeping previous rules', {
        path: this.configPath,
        error: toErrorMessage(error),
      });
      return false;
    }

    if (previous === null) {
      return true;
    }

    const restartFields = this.getChangedFields(previous.config, next.config);
    logConfig('Configuration reloaded', { rules: next.ruleIndex.size });
    if (restartFields.length > 0) {
      logger.warn('Changed settings take effect after a restart', { fields: restartFields });
    }

    for (const callback of this.changeCallbacks) {
      try {
        callback(next, previous);
      } catch (error) {
        logger.error('Error in config change callback', { error: toErrorMessage(error) });
      }
    }

    return true;
  }

  /**
   * Startup-only settings that differ between two configurations
   */
  private getChangedFields(previous: AdmissionConfig, next: AdmissionConfig): string[] {
    return RESTART_FIELDS.filter(
      (field) => JSON.stringify(previous[field]) !== JSON.stringify(next[field])
    );
  }

  /**
   * Register a callback for config changes
   */
  public onConfigChange(callback: ConfigChangeCallback): void {
    this.changeCallbacks.push(callback);
  }

  /**
   * Remove a config change callback
   */
  public removeConfigChangeCallback(callback: ConfigChangeCallback): void {
    const index = this.changeCallbacks.indexOf(callback);
    if (index !== -1) {
      this.changeCallbacks.splice(index, 1);
    }
  }

  /**
   * Get current configuration
   */
  public getConfig(): LoadedConfig {
    if (this.current === null) {
      throw new Error('Configuration not loaded. Call load() first.');
    }
    return this.current;
  }

  public getConfigPath(): string {
    return this.configPath;
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createConfigLoader(configPath?: string): ConfigLoader {
  return new ConfigLoader(configPath);
}

export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  return new ConfigLoader(configPath).load();
}

export default ConfigLoader;
