import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import dotenv from 'dotenv';
import { ProvisionConfigSchema, type ProvisionConfig } from './schema';
import { ConfigurationError, errorMessage } from '../errors';

export const CONFIG_FILE_NAME = 'provision.yaml';

/**
 * Find provision.yaml.
 * Priority: PROVISION_CONFIG env > {cwd}/provision.yaml. Returns null when
 * neither exists, in which case every setting takes its default.
 */
export function findConfigPath(cwd: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (env.PROVISION_CONFIG) {
    const explicit = path.resolve(cwd, env.PROVISION_CONFIG);
    if (!fs.existsSync(explicit)) {
      throw new ConfigurationError(`PROVISION_CONFIG points to a missing file: ${explicit}`);
    }
    return explicit;
  }

  const candidate = path.join(cwd, CONFIG_FILE_NAME);
  return fs.existsSync(candidate) ? candidate : null;
}

/**
 * Parse and validate a raw config object (already loaded from YAML).
 */
export function parseConfig(raw: unknown, source = CONFIG_FILE_NAME): ProvisionConfig {
  // An empty YAML document loads as undefined
  const parseResult = ProvisionConfigSchema.safeParse(raw ?? {});

  if (!parseResult.success) {
    const errors = parseResult.error.errors
      .map(e => `  - ${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid configuration in ${source}:\n${errors}`);
  }

  return parseResult.data;
}

/**
 * Load the provisioning configuration, falling back to defaults when no file exists.
 */
export function loadConfig(cwd: string, env: NodeJS.ProcessEnv = process.env): ProvisionConfig {
  const configPath = findConfigPath(cwd, env);
  if (!configPath) {
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to read ${configPath}: ${errorMessage(error)}`, { cause: error });
  }

  return parseConfig(raw, configPath);
}

/**
 * Load {cwd}/.env into the given environment. Values already set win.
 * Returns the path that was loaded, or null when there is no .env file.
 */
export function loadDotenv(cwd: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const envPath = path.join(cwd, '.env');
  if (!fs.existsSync(envPath)) return null;

  const parsed = dotenv.parse(fs.readFileSync(envPath));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return envPath;
}
