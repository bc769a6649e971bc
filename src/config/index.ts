/**
 * Configuration Module
 */

export {
  DEFAULT_CONFIG,
  defaultConfigPaths,
  envOverrides,
  expandHome,
  loadConfig,
  loadConfigFile,
  parseYamlContent,
  resolveConfig,
  type LoadConfigOptions,
  type LoadedConfig,
} from './loader';
export * from './types';
export { validateConfig } from './validator';
