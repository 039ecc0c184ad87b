import type { HostTarget } from '../config/host';
import type { ProvisionConfig } from '../config/schema';
import { ConfigurationError, type ProvisionError, type Result, err, errorMessage, ok } from '../errors';
import type { UnitWriteResult } from '../adapters/supervisor';
import { type ConfigurationSet, validateEnvironment } from './validator';
import { type DependencyReport, installDependencies } from './installer';
import { type RenderedConfig, renderConfiguration } from './renderer';
import { generateUnit, unitSpecFor } from './unitGenerator';
import { activateUnit, installUnit } from './lifecycle';
import { header, info, success } from '../utils/output';

/**
 * Start -> Validated -> DependenciesReady -> ConfigRendered -> UnitWritten -> Running.
 * Any stage can abort; there is no way back into the sequence except a fresh run.
 */
export type ProvisionState =
  | 'Start'
  | 'Validated'
  | 'DependenciesReady'
  | 'ConfigRendered'
  | 'UnitWritten'
  | 'Running';

export interface ProvisionReport {
  values: ConfigurationSet;
  dependencies: DependencyReport;
  config: RenderedConfig;
  unit: UnitWriteResult;
}

export interface ProvisionAbort {
  /** Last state reached before the failing transition */
  state: ProvisionState;
  error: ProvisionError;
}

export interface ProvisionOptions {
  env?: NodeJS.ProcessEnv;
  onTransition?: (state: ProvisionState) => void;
}

export async function runProvisioning(
  config: ProvisionConfig,
  host: HostTarget,
  options: ProvisionOptions = {},
): Promise<Result<ProvisionReport, ProvisionAbort>> {
  const env = options.env ?? process.env;
  let state: ProvisionState = 'Start';

  const advance = (next: ProvisionState) => {
    state = next;
    options.onTransition?.(next);
  };
  const abort = (error: ProvisionError) => err<ProvisionAbort>({ state, error });

  header('Environment');
  const values = validateEnvironment(config.required_env, env);
  if (!values.ok) return abort(values.error);
  success(`Required variables set: ${config.required_env.join(', ')}`);
  advance('Validated');

  header('Dependencies');
  const dependencies = await installDependencies(host, config.templating, config.proxy);
  if (!dependencies.ok) return abort(dependencies.error);
  advance('DependenciesReady');

  header('Configuration');
  const rendered = renderConfiguration(host.templatePath, host.configPath, env);
  if (!rendered.ok) return abort(rendered.error);
  if (rendered.value.changed) {
    success(`Rendered ${host.configPath}`);
  } else {
    info(`Unchanged ${host.configPath}`);
  }
  advance('ConfigRendered');

  header('Service Unit');
  let unitContent: string;
  try {
    unitContent = generateUnit(unitSpecFor(config.unit, host.binDir, config.proxy.binary, host.configPath));
  } catch (error) {
    return abort(new ConfigurationError(`Invalid unit settings: ${errorMessage(error)}`, { cause: error }));
  }
  const unit = await installUnit(host.supervisor, host.unitName, unitContent);
  if (!unit.ok) return abort(unit.error);
  if (unit.value.changed) {
    success(`Wrote ${unit.value.location}`);
  } else {
    info(`Unchanged ${unit.value.location}`);
  }
  advance('UnitWritten');

  header('Supervisor');
  const activated = await activateUnit(host.supervisor, host.unitName);
  if (!activated.ok) return abort(activated.error);
  advance('Running');

  return ok({
    values: values.value,
    dependencies: dependencies.value,
    config: rendered.value,
    unit: unit.value,
  });
}
