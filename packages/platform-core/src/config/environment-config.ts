/**
 * Environment Configuration Utilities
 *
 * Environment variable lookup and parsing with typed defaults.
 */

export type EnvSource = Record<string, string | undefined>;

/**
 * Get configuration with type safety and defaults.
 *
 * Numbers are parsed with `Number()`, so fractional values survive; an
 * unparseable number comes back as `NaN` for the caller's schema to reject.
 */
export function getConfig(key: string, defaultValue: number, env?: EnvSource): number;
export function getConfig(key: string, defaultValue: boolean, env?: EnvSource): boolean;
export function getConfig(key: string, defaultValue: string, env?: EnvSource): string;
export function getConfig(
  key: string,
  defaultValue: string | number | boolean,
  env: EnvSource = process.env
): string | number | boolean {
  const value = env[key];

  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  if (typeof defaultValue === 'boolean') {
    return value.toLowerCase() === 'true';
  }

  if (typeof defaultValue === 'number') {
    return Number(value.trim());
  }

  return value;
}

/**
 * Get optional configuration - undefined when unset or blank
 */
export function getOptionalConfig(key: string, env: EnvSource = process.env): string | undefined {
  const value = env[key];
  return value && value.trim() !== '' ? value : undefined;
}
