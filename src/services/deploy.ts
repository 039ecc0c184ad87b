import * as path from 'path';
import { spawnSync } from 'child_process';
import { type Result, ok } from '../errors';
import type { ProvisionAbort, ProvisionReport } from './provisioner';

/**
 * Runs the external deployment routine and returns its exit code.
 */
export type DeployDelegate = (args: string[]) => number;

export function createDeployDelegate(command: string, workDir: string): DeployDelegate {
  // Bare names go through PATH, anything with a slash is relative to workDir
  const executable = command.includes('/') ? path.resolve(workDir, command) : command;

  return (args) => {
    const result = spawnSync(executable, args, { cwd: workDir, stdio: 'inherit' });
    if (result.error) {
      throw new Error(`Failed to run ${command}: ${result.error.message}`);
    }
    // Killed by a signal
    return result.status ?? 1;
  };
}

export interface DeployOutcome {
  report: ProvisionReport;
  exitCode: number;
}

/**
 * Provision first, then hand the untouched argument list to the deployment
 * routine. The delegate never runs when provisioning aborts.
 */
export async function provisionThenDeploy(
  provision: () => Promise<Result<ProvisionReport, ProvisionAbort>>,
  deploy: DeployDelegate,
  args: string[],
): Promise<Result<DeployOutcome, ProvisionAbort>> {
  const provisioned = await provision();
  if (!provisioned.ok) return provisioned;

  return ok({ report: provisioned.value, exitCode: deploy(args) });
}
