/**
 * Environment Variable Utilities
 *
 * Typed access to environment variables with default value support.
 */

/**
 * Get an environment variable with a default value
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set or empty
 *
 * @example
 * const logLevel = getEnvWithDefault('LOG_LEVEL', 'info');
 */
export function getEnvWithDefault(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value || defaultValue;
}

/**
 * Get an optional environment variable (returns undefined if not set or empty)
 *
 * @example
 * const inputRoot = getEnvOptional('BENCH_INPUT_ROOT');
 */
export function getEnvOptional(key: string): string | undefined {
  const value = process.env[key];
  return value ? value : undefined;
}
