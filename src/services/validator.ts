import { ConfigurationError, type Result, err, ok } from '../errors';

/** Required values, keyed by environment variable name */
export type ConfigurationSet = Readonly<Record<string, string>>;

/**
 * Check the required keys in order and stop at the first one that is unset or
 * blank. Nothing is installed or written before this passes.
 */
export function validateEnvironment(
  requiredKeys: readonly string[],
  env: NodeJS.ProcessEnv,
): Result<ConfigurationSet, ConfigurationError> {
  const values: Record<string, string> = {};

  for (const key of requiredKeys) {
    const value = env[key];
    if (value === undefined || value.trim() === '') {
      return err(new ConfigurationError(`${key} not set`));
    }
    values[key] = value;
  }

  return ok(values);
}
