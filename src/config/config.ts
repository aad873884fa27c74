/**
 * Creative Orchestrator — Configuration Management
 *
 * Loads and validates the engine configuration. Policy snapshots are not
 * configuration: they reach the PolicyStore as parsed documents.
 *
 * @module config
 * @version 1.0.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { type Config, ConfigSchema, LogLevelSchema, type Result, ok, err } from '../types/index.js';

export const CONFIG_ENV_VAR = 'CREATIVE_ORCHESTRATOR_CONFIG';

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const DEFAULT_BASE_DIR = path.join(os.homedir(), '.creative-orchestrator');

export const DEFAULT_CONFIG: Config = {
  logging: {
    level: 'info',
  },
  orchestration: {
    default_deadline_ms: 300_000,
    validation_enabled: true,
  },
  paths: {
    base_dir: DEFAULT_BASE_DIR,
    config_file: 'config.json',
  },
};

// ═══════════════════════════════════════════════════════════════════════════
// PATH UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function expandPath(inputPath: string): string {
  if (inputPath.startsWith('~/')) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === '~') {
    return os.homedir();
  }
  return inputPath;
}

export function getBaseDir(config?: Partial<Config>): string {
  return expandPath(config?.paths?.base_dir ?? DEFAULT_CONFIG.paths.base_dir);
}

export function getConfigPath(config?: Partial<Config>): string {
  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return expandPath(fromEnv);
  }
  return path.join(getBaseDir(config), config?.paths?.config_file ?? DEFAULT_CONFIG.paths.config_file);
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADING
// ═══════════════════════════════════════════════════════════════════════════

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load configuration from file, merge with defaults.
 * LOG_LEVEL in the environment wins over the file.
 */
export function loadConfig(customPath?: string): Result<Config, Error> {
  try {
    const configPath = expandPath(customPath ?? getConfigPath());

    let userConfig: Record<string, unknown> = {};

    if (fs.existsSync(configPath)) {
      const content = fs.readFileSync(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (!isPlainObject(parsed)) {
        return err(new Error(`Invalid configuration: ${configPath} must contain a JSON object`));
      }
      userConfig = parsed;
    }

    const merged = deepMerge(DEFAULT_CONFIG, userConfig);

    const envLevel = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
    if (envLevel.success && isPlainObject(merged.logging)) {
      merged.logging = { ...merged.logging, level: envLevel.data };
    }

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      return err(new Error(`Invalid configuration: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SINGLETON PATTERN
// ═══════════════════════════════════════════════════════════════════════════

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig === null) {
    const result = loadConfig();
    cachedConfig = result.success ? result.data : DEFAULT_CONFIG;
  }
  return cachedConfig;
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function reloadConfig(): Result<Config, Error> {
  clearConfigCache();
  const result = loadConfig();
  if (result.success) {
    cachedConfig = result.data;
  }
  return result;
}
