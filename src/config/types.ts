/**
 * Type definitions for docschema.toml configuration.
 *
 * @packageDocumentation
 */

import type { RedundancySensitivity } from '../contracts/redundancy.js';

/**
 * Validation settings.
 */
export interface ValidationConfig {
  /** Treat unverified RAISES entries as errors and fail the element. */
  strict_raises: boolean;
  /** Sensitivity of the redundancy heuristic. */
  redundancy_sensitivity: RedundancySensitivity;
  /** Require a CONTRACTS block on every class. */
  contract_mandatory_for_classes: boolean;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  /** Emit debug-level log entries. */
  debug: boolean;
}

/**
 * Complete configuration.
 */
export interface Config {
  validation: ValidationConfig;
  logging: LoggingConfig;
}

/**
 * Configuration with every field optional, used for overrides.
 */
export interface PartialConfig {
  validation?: Partial<ValidationConfig>;
  logging?: Partial<LoggingConfig>;
}
