/**
 * Configuration Types
 */

import type { LogLevel } from '../logging/logger';

/**
 * Configuration as written in .yellow.yaml. Every key is optional.
 */
export interface YellowConfigFile {
  /** Path of the memo file */
  storagePath?: string;
  /** Path of the log file; null disables file logging */
  logFile?: string | null;
  logLevel?: LogLevel;
  /** Days a deleted memo is kept before the load-time purge */
  retentionDays?: number;
}

/**
 * Fully resolved configuration (defaults applied)
 */
export interface YellowConfig {
  storagePath: string;
  logFile: string | null;
  logLevel: LogLevel;
  retentionDays: number;
}

/**
 * Values taken from the command line; they win over file and environment.
 */
export type ConfigOverrides = Partial<YellowConfig>;

export interface ValidationError {
  /** Path to the field with error (e.g., 'retentionDays') */
  path: string;
  message: string;
  /** Expected type or value */
  expected?: string;
  /** Actual value received */
  actual?: unknown;
}

export interface ValidationResult {
  valid: boolean;
  /** List of validation errors (empty if valid) */
  errors: ValidationError[];
  /** Warnings that don't prevent loading */
  warnings: ValidationError[];
}

/**
 * Thrown when the configuration file is missing, unparsable or invalid.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    public readonly errors: ValidationError[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
