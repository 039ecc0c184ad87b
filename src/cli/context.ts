import { type HostTarget, type ProvisionConfig, createHostTarget, loadConfig, loadDotenv } from '../config';
import type { ProvisionAbort } from '../services/provisioner';
import { fail, info } from '../utils/output';

export interface CliContext {
  workDir: string;
  config: ProvisionConfig;
  host: HostTarget;
}

/**
 * Load .env and provision.yaml from the invocation directory and describe the real host.
 */
export function loadContext(workDir: string = process.cwd()): CliContext {
  const envPath = loadDotenv(workDir);
  if (envPath) info(`Loaded ${envPath}`);

  const config = loadConfig(workDir);
  return { workDir, config, host: createHostTarget(config, workDir) };
}

/**
 * Report an aborted run and rethrow its error for the top-level handler.
 */
export function abortWith(aborted: ProvisionAbort): never {
  console.log('');
  fail(`Aborted after ${aborted.state} (${aborted.error.kind} error)`);
  throw aborted.error;
}
