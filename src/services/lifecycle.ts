import type { Supervisor, UnitWriteResult } from '../adapters/supervisor';
import { SupervisorError, type SupervisorStep, type Result, err, errorMessage, ok } from '../errors';
import { describeCommandError } from '../adapters/shell';
import { success } from '../utils/output';

/**
 * Write the unit definition through the supervisor.
 */
export async function installUnit(
  supervisor: Supervisor,
  name: string,
  content: string,
): Promise<Result<UnitWriteResult, SupervisorError>> {
  try {
    return ok(await supervisor.writeUnit(name, content));
  } catch (error) {
    return err(new SupervisorError('write-unit', `Failed to write unit ${name}: ${errorMessage(error)}`, { cause: error }));
  }
}

/**
 * Reindex, enable at boot, restart now. The first failure stops the sequence:
 * enabling or restarting after a failed reindex would act on a stale definition.
 */
export async function activateUnit(supervisor: Supervisor, name: string): Promise<Result<void, SupervisorError>> {
  const steps: Array<{ step: SupervisorStep; label: string; action: () => Promise<void> }> = [
    { step: 'reindex', label: 'Reloaded unit index', action: () => supervisor.reindex() },
    { step: 'enable', label: `Enabled ${name} at boot`, action: () => supervisor.enable(name) },
    { step: 'restart', label: `Restarted ${name}`, action: () => supervisor.restart(name) },
  ];

  for (const { step, label, action } of steps) {
    try {
      await action();
    } catch (error) {
      return err(new SupervisorError(step, `Supervisor ${step} failed for ${name}: ${describeCommandError(error)}`, { cause: error }));
    }
    success(label);
  }

  return ok(undefined);
}
