/**
 * Default configuration values.
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, ValidationConfig } from './types.js';

/**
 * Default validation settings.
 */
export const DEFAULT_VALIDATION: ValidationConfig = {
  strict_raises: false,
  redundancy_sensitivity: 'low',
  contract_mandatory_for_classes: false,
};

/**
 * Default logging settings.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
};

/**
 * Configuration used when no docschema.toml is present.
 */
export const DEFAULT_CONFIG: Config = {
  validation: DEFAULT_VALIDATION,
  logging: DEFAULT_LOGGING,
};
