import { generateUnit, unitSpecFor } from '../services/unitGenerator';
import { installUnit } from '../services/lifecycle';
import { loadContext } from './context';
import { info, success } from '../utils/output';

/**
 * Write the service unit without touching the supervisor's runtime state.
 *   --print   print the unit instead of writing it
 */
export async function runUnit(args: string[]): Promise<void> {
  const { config, host } = loadContext();
  const content = generateUnit(unitSpecFor(config.unit, host.binDir, config.proxy.binary, host.configPath));

  if (args.includes('--print')) {
    process.stdout.write(content);
    return;
  }

  const written = await installUnit(host.supervisor, host.unitName, content);
  if (!written.ok) throw written.error;

  if (written.value.changed) {
    success(`Wrote ${written.value.location}`);
  } else {
    info(`Unchanged ${written.value.location}`);
  }
  info(`Run "caddy-provision provision" to reload ${host.supervisor.getType()} and restart the unit.`);
}
