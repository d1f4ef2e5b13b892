/**
 * Configuration module for docschema.toml parsing.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  CONFIG_FILE_NAME,
  ConfigParseError,
  loadConfigFile,
  parseConfig,
  toEngineOptions,
} from './parser.js';
export type { Config, LoggingConfig, PartialConfig, ValidationConfig } from './types.js';
export { DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_VALIDATION } from './defaults.js';
export { EnvCoercionError, applyEnvOverrides, readEnvOverrides } from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
