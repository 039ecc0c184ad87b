import { runProvisioning } from '../services/provisioner';
import { createDeployDelegate, provisionThenDeploy } from '../services/deploy';
import { abortWith, loadContext } from './context';
import { BOLD, CYAN, DIM, GREEN, NC } from '../utils/output';

function banner(title: string): void {
  console.log('');
  console.log(`${BOLD}${CYAN}${title}${NC}`);
}

export async function runProvision(): Promise<void> {
  const { config, host } = loadContext();

  banner('Provisioning reverse proxy');
  const result = await runProvisioning(config, host);
  if (!result.ok) abortWith(result.error);

  console.log('');
  console.log(`  ${GREEN}${BOLD}${config.proxy.binary} configured and running (${host.unitName}.service)${NC}`);
  console.log('');
}

/**
 * Provision the proxy, then run the deployment routine with our arguments.
 * Exits with the deployment routine's status.
 */
export async function runInstall(args: string[]): Promise<void> {
  const { config, host, workDir } = loadContext();
  const deploy = createDeployDelegate(config.deploy.command, workDir);

  banner('Provisioning reverse proxy');
  const result = await provisionThenDeploy(
    () => runProvisioning(config, host),
    (deployArgs) => {
      console.log('');
      console.log(`${DIM}Handing off to ${config.deploy.command} ${deployArgs.join(' ')}${NC}`);
      console.log('');
      return deploy(deployArgs);
    },
    args,
  );
  if (!result.ok) abortWith(result.error);

  process.exitCode = result.value.exitCode;
}
