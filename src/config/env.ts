/**
 * Environment variable parsing helpers
 *
 * Shared by every config module. Invalid values never throw here: they are
 * reported with a warning under the caller's log tag and replaced by the
 * default. Modules that need hard failures validate the loaded config.
 *
 * @module config/env
 */

/**
 * Application environment types
 */
export type Environment = 'development' | 'staging' | 'production' | 'test';

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production', 'test'];

/**
 * Read a trimmed environment variable, treating blank values as unset
 */
export function readEnv(name: string): string | undefined {
  const value = process.env[name];
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Parse an integer in [min, max]
 */
export function parseInteger(
  value: string | undefined,
  defaultValue: number,
  min: number,
  max: number,
  name: string,
  tag: string
): number {
  if (!value) {
    return defaultValue;
  }

  const parsed = Number.parseInt(value, 10);

  if (Number.isNaN(parsed)) {
    console.warn(`[${tag}] Invalid ${name} "${value}", using default: ${defaultValue}`);
    return defaultValue;
  }

  if (parsed < min || parsed > max) {
    console.warn(
      `[${tag}] ${name} ${parsed} out of range [${min}, ${max}], using default: ${defaultValue}`
    );
    return defaultValue;
  }

  return parsed;
}

/**
 * Parse a boolean flag (true/false, 1/0, yes/no)
 */
export function parseBoolean(
  value: string | undefined,
  defaultValue: boolean,
  name: string,
  tag: string
): boolean {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.toLowerCase();

  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }

  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }

  console.warn(`[${tag}] Invalid boolean ${name} "${value}", using default: ${defaultValue}`);
  return defaultValue;
}

/**
 * Parse one of a closed set of string values, case-insensitively
 */
export function parseChoice<T extends string>(
  value: string | undefined,
  choices: readonly T[],
  defaultValue: T,
  name: string,
  tag: string
): T {
  if (!value) {
    return defaultValue;
  }

  const match = choices.find((choice) => choice.toLowerCase() === value.toLowerCase());

  if (match === undefined) {
    console.warn(
      `[${tag}] Invalid ${name} "${value}", using default "${defaultValue}". Valid values: ${choices.join(', ')}`
    );
    return defaultValue;
  }

  return match;
}

/**
 * Current environment from NODE_ENV
 */
export function getEnvironment(): Environment {
  return parseChoice(readEnv('NODE_ENV'), ENVIRONMENTS, 'development', 'NODE_ENV', 'CONFIG');
}
