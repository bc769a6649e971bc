/**
 * YAML Configuration Loader
 *
 * Resolves configuration from, lowest to highest precedence:
 * built-in defaults, a YAML file, YELLOW_* environment variables and
 * command-line overrides. The YAML file supports ${VAR} and ${VAR:-default}
 * substitution.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { isLogLevel } from '../logging/logger';
import {
  type ConfigOverrides,
  ConfigError,
  type ValidationError,
  type YellowConfig,
  type YellowConfigFile,
} from './types';
import { toConfigFile, validateConfig } from './validator';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_CONFIG: YellowConfig = {
  storagePath: '.yellow.json',
  logFile: '.yellow.log',
  logLevel: 'info',
  retentionDays: 7,
};

export interface LoadConfigOptions {
  /** Explicit config file; it must exist */
  configPath?: string;
  env?: Record<string, string | undefined>;
  overrides?: ConfigOverrides;
  cwd?: string;
  home?: string;
}

export interface LoadedConfig {
  config: YellowConfig;
  /** File the configuration came from, if any */
  source: string | null;
  warnings: ValidationError[];
}

// ============================================================================
// Loader Functions
// ============================================================================

/**
 * Config files searched when no path is given, in order.
 */
export function defaultConfigPaths(cwd: string, home: string): string[] {
  return [
    path.join(cwd, '.yellow.yaml'),
    path.join(cwd, '.yellow.yml'),
    path.join(home, '.config', 'yellow', 'config.yaml'),
  ];
}

/**
 * Parse YAML content with environment variable substitution
 *
 * @throws ConfigError if the YAML is malformed
 */
export function parseYamlContent(
  content: string,
  filePath: string,
  env: Record<string, string | undefined> = process.env
): unknown {
  const substituted = content.replace(/\$\{([^}]+)\}/g, (_match, expr: string) => {
    const [varName = '', defaultValue] = expr.split(':-');
    return env[varName.trim()] ?? defaultValue?.trim() ?? '';
  });

  try {
    return parseYaml(substituted) ?? {};
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse YAML config ${filePath}: ${reason}`, filePath);
  }
}

/**
 * Load and validate a configuration file.
 *
 * @returns The file's settings, or null when no path was given and none of
 *   the default locations exist
 * @throws ConfigError if an explicit path is missing or the file is invalid
 */
export function loadConfigFile(
  options: LoadConfigOptions = {}
): { file: YellowConfigFile; source: string; warnings: ValidationError[] } | null {
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? os.homedir();
  const resolvedPath = resolveConfigPath(options.configPath, cwd, home);

  if (!resolvedPath) {
    if (options.configPath) {
      throw new ConfigError(`Config file not found: ${options.configPath}`, options.configPath);
    }
    return null;
  }

  const content = fs.readFileSync(resolvedPath, 'utf-8');
  const parsed = parseYamlContent(content, resolvedPath, options.env ?? process.env);
  const validation = validateConfig(parsed);

  if (!validation.valid) {
    const errorMessages = validation.errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n');
    throw new ConfigError(
      `Invalid configuration in ${resolvedPath}:\n${errorMessages}`,
      resolvedPath,
      validation.errors
    );
  }

  return { file: toConfigFile(parsed), source: resolvedPath, warnings: validation.warnings };
}

/**
 * Settings taken from YELLOW_FILE, YELLOW_LOG_FILE and YELLOW_LOG_LEVEL.
 * An empty YELLOW_LOG_FILE disables file logging.
 *
 * @throws ConfigError on an unknown log level
 */
export function envOverrides(env: Record<string, string | undefined>): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  if (env.YELLOW_FILE) {
    overrides.storagePath = env.YELLOW_FILE;
  }
  if (env.YELLOW_LOG_FILE !== undefined) {
    overrides.logFile = env.YELLOW_LOG_FILE === '' ? null : env.YELLOW_LOG_FILE;
  }
  if (env.YELLOW_LOG_LEVEL) {
    const level = env.YELLOW_LOG_LEVEL.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`Invalid YELLOW_LOG_LEVEL: ${env.YELLOW_LOG_LEVEL}`);
    }
    overrides.logLevel = level;
  }

  return overrides;
}

/**
 * Layer file settings, environment and overrides over the defaults.
 */
export function resolveConfig(
  file: YellowConfigFile,
  env: ConfigOverrides = {},
  overrides: ConfigOverrides = {},
  home: string = os.homedir()
): YellowConfig {
  const merged: YellowConfig = {
    ...DEFAULT_CONFIG,
    ...file,
    ...env,
    ...overrides,
  };

  return {
    ...merged,
    storagePath: expandHome(merged.storagePath, home),
    logFile: merged.logFile === null ? null : expandHome(merged.logFile, home),
  };
}

/**
 * Load, validate and resolve the configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const home = options.home ?? os.homedir();
  const loaded = loadConfigFile(options);

  return {
    config: resolveConfig(loaded?.file ?? {}, envOverrides(env), options.overrides, home),
    source: loaded?.source ?? null,
    warnings: loaded?.warnings ?? [],
  };
}

// ============================================================================
// Helper Functions
// ============================================================================

function resolveConfigPath(configPath: string | undefined, cwd: string, home: string): string | null {
  if (configPath) {
    const resolved = path.resolve(cwd, expandHome(configPath, home));
    return fs.existsSync(resolved) ? resolved : null;
  }

  for (const candidate of defaultConfigPaths(cwd, home)) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  return null;
}

/**
 * Expand a leading ~ to the home directory.
 */
export function expandHome(filePath: string, home: string): string {
  if (filePath === '~') return home;
  if (filePath.startsWith('~/')) return path.join(home, filePath.slice(2));
  return filePath;
}
