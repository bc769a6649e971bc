/**
 * Configuration Schema Validator
 *
 * Validates parsed YAML configuration against the expected schema.
 * Returns detailed error messages with field paths.
 */

import { LOG_LEVELS, isLogLevel } from '../logging/logger';
import type { ValidationError, ValidationResult, YellowConfigFile } from './types';

const VALID_KEYS = ['storagePath', 'logFile', 'logLevel', 'retentionDays'];

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed configuration object
 *
 * @param config - The parsed YAML configuration
 * @returns Validation result with errors and warnings
 */
export function validateConfig(config: unknown): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationError[] = [];

  if (!isObject(config)) {
    errors.push({
      path: '',
      message: 'Configuration must be an object',
      expected: 'object',
      actual: Array.isArray(config) ? 'array' : typeof config,
    });
    return { valid: false, errors, warnings };
  }

  if (config.storagePath !== undefined) {
    if (typeof config.storagePath !== 'string') {
      errors.push({
        path: 'storagePath',
        message: 'storagePath must be a string',
        expected: 'string',
        actual: typeof config.storagePath,
      });
    } else if (config.storagePath.trim() === '') {
      errors.push({
        path: 'storagePath',
        message: 'storagePath must not be empty',
        expected: 'non-empty string',
        actual: config.storagePath,
      });
    }
  }

  if (
    config.logFile !== undefined &&
    config.logFile !== null &&
    typeof config.logFile !== 'string'
  ) {
    errors.push({
      path: 'logFile',
      message: 'logFile must be a string or null',
      expected: 'string | null',
      actual: typeof config.logFile,
    });
  }

  if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
    errors.push({
      path: 'logLevel',
      message: `Invalid log level: ${String(config.logLevel)}`,
      expected: LOG_LEVELS.join(' | '),
      actual: config.logLevel,
    });
  }

  if (config.retentionDays !== undefined) {
    if (typeof config.retentionDays !== 'number' || Number.isNaN(config.retentionDays)) {
      errors.push({
        path: 'retentionDays',
        message: 'retentionDays must be a number',
        expected: 'number',
        actual: typeof config.retentionDays,
      });
    } else if (config.retentionDays <= 0) {
      errors.push({
        path: 'retentionDays',
        message: 'retentionDays must be positive',
        expected: '> 0',
        actual: config.retentionDays,
      });
    }
  }

  for (const key of Object.keys(config)) {
    if (!VALID_KEYS.includes(key)) {
      warnings.push({
        path: key,
        message: `Unknown field: ${key}`,
      });
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Narrow a validated object to the config file shape.
 */
export function toConfigFile(config: unknown): YellowConfigFile {
  const result: YellowConfigFile = {};
  if (!isObject(config)) return result;

  if (typeof config.storagePath === 'string') result.storagePath = config.storagePath;
  if (typeof config.logFile === 'string' || config.logFile === null) {
    result.logFile = config.logFile;
  }
  if (isLogLevel(config.logLevel)) result.logLevel = config.logLevel;
  if (typeof config.retentionDays === 'number') result.retentionDays = config.retentionDays;

  return result;
}
