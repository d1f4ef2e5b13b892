/**
 * Environment variable overrides for configuration.
 *
 * DOCSCHEMA_* variables override configuration values at runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  if (TRUTHY.includes(trimmed)) {
    return true;
  }
  if (FALSY.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

/**
 * Environment variables and the override each one applies.
 */
const ENV_VAR_APPLIERS: Record<string, (overrides: PartialConfig, value: string, envVar: string) => void> = {
  DOCSCHEMA_STRICT_RAISES: (overrides, value, envVar) => {
    overrides.validation = { ...overrides.validation, strict_raises: coerceToBoolean(value, envVar) };
  },
  DOCSCHEMA_REDUNDANCY_SENSITIVITY: (overrides, value, envVar) => {
    const sensitivity = value.trim().toLowerCase();
    if (sensitivity !== 'low' && sensitivity !== 'high') {
      throw new EnvCoercionError(envVar, value, "'low' | 'high'");
    }
    overrides.validation = { ...overrides.validation, redundancy_sensitivity: sensitivity };
  },
  DOCSCHEMA_CONTRACT_MANDATORY_FOR_CLASSES: (overrides, value, envVar) => {
    overrides.validation = {
      ...overrides.validation,
      contract_mandatory_for_classes: coerceToBoolean(value, envVar),
    };
  },
  DOCSCHEMA_DEBUG: (overrides, value, envVar) => {
    overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
}

/**
 * Reads DOCSCHEMA_* environment variables into configuration overrides.
 * Empty values are ignored.
 *
 * @param env - The environment to read from (defaults to process.env).
 * @returns Overrides and the variables that produced them.
 * @throws EnvCoercionError if a variable holds an invalid value.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ DOCSCHEMA_STRICT_RAISES: 'yes' });
 * console.log(overrides.validation?.strict_raises); // true
 * ```
 */
export function readEnvOverrides(env: EnvRecord = process.env): EnvOverrideResult {
  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];

  for (const [envVar, apply] of Object.entries(ENV_VAR_APPLIERS)) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }
    apply(overrides, value, envVar);
    appliedVars.push(envVar);
  }

  return { overrides, appliedVars };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment to read from (defaults to process.env).
 * @returns A new configuration with environment values taking precedence.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return {
    validation: { ...config.validation, ...overrides.validation },
    logging: { ...config.logging, ...overrides.logging },
  };
}
