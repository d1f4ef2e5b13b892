/**
 * TOML configuration parser for docschema.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import type { EngineOptions } from '../engine/engine.js';
import type { RedundancySensitivity } from '../contracts/redundancy.js';
import { isFileNotFound, safeReadTextFile } from '../utils/safe-fs.js';
import { DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_VALIDATION } from './defaults.js';
import type { Config, LoggingConfig, ValidationConfig } from './types.js';

/**
 * Name of the configuration file looked up by callers.
 */
export const CONFIG_FILE_NAME = 'docschema.toml';

const SENSITIVITIES: readonly RedundancySensitivity[] = ['low', 'high'];

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a table, or absent.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @throws ConfigParseError if value is present but not a table.
 */
function validateTable(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${fieldPath}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a recognized redundancy sensitivity.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @throws ConfigParseError if value is not `low` or `high`.
 */
export function validateSensitivity(value: unknown, fieldPath: string): RedundancySensitivity {
  const match = SENSITIVITIES.find((sensitivity) => sensitivity === value);
  if (match === undefined) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${SENSITIVITIES.join(', ')}, got ${JSON.stringify(value)}`
    );
  }
  return match;
}

function parseValidation(raw: Record<string, unknown> | undefined): ValidationConfig {
  const result: ValidationConfig = { ...DEFAULT_VALIDATION };
  if (raw === undefined) {
    return result;
  }

  if ('strict_raises' in raw) {
    result.strict_raises = validateBoolean(raw.strict_raises, 'validation.strict_raises');
  }
  if ('redundancy_sensitivity' in raw) {
    result.redundancy_sensitivity = validateSensitivity(
      raw.redundancy_sensitivity,
      'validation.redundancy_sensitivity'
    );
  }
  if ('contract_mandatory_for_classes' in raw) {
    result.contract_mandatory_for_classes = validateBoolean(
      raw.contract_mandatory_for_classes,
      'validation.contract_mandatory_for_classes'
    );
  }

  return result;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw !== undefined && 'debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [validation]
 * strict_raises = true
 * redundancy_sensitivity = "high"
 * `);
 * console.log(config.validation.strict_raises); // true
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${cause.message}`, cause);
  }

  return {
    validation: parseValidation(validateTable(parsed.validation, 'validation')),
    logging: parseLogging(validateTable(parsed.logging, 'logging')),
  };
}

/**
 * Reads and parses a configuration file. A missing file yields the
 * defaults.
 *
 * @param filePath - Path to docschema.toml.
 * @throws ConfigParseError for invalid content.
 */
export async function loadConfigFile(filePath: string): Promise<Config> {
  let content: string;
  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    if (isFileNotFound(error)) {
      return { validation: { ...DEFAULT_CONFIG.validation }, logging: { ...DEFAULT_CONFIG.logging } };
    }
    throw error;
  }
  return parseConfig(content);
}

/**
 * Maps configuration onto engine options.
 *
 * @param config - Parsed configuration.
 */
export function toEngineOptions(config: Config): EngineOptions {
  return {
    strictRaises: config.validation.strict_raises,
    redundancySensitivity: config.validation.redundancy_sensitivity,
    contractMandatoryForClasses: config.validation.contract_mandatory_for_classes,
  };
}
