import * as fs from 'fs';
import * as path from 'path';
import { loadContext } from './context';
import { BOLD, DIM, GREEN, NC, RED, YELLOW } from '../utils/output';
import { VERSION } from '../version';

function row(ok: boolean, label: string, detail: string): void {
  const icon = ok ? `${GREEN}✓${NC}` : `${RED}✗${NC}`;
  console.log(`  ${icon} ${label.padEnd(22)} ${DIM}${detail}${NC}`);
}

export async function runStatus(): Promise<void> {
  const { config, host } = loadContext();
  const binaryPath = path.join(host.binDir, config.proxy.binary);
  const onPath = host.runner.exists(config.proxy.binary);
  const state = await host.supervisor.getState(host.unitName);

  console.log('');
  console.log(`  ${BOLD}caddy-provision${NC} ${DIM}v${VERSION}${NC}`);
  console.log('');

  row(host.runner.exists(config.templating.command), config.templating.command, config.templating.package);
  row(onPath || fs.existsSync(binaryPath), config.proxy.binary, onPath ? 'on PATH' : binaryPath);
  row(fs.existsSync(host.configPath), 'configuration', host.configPath);
  row(state.installed, 'unit file', `${host.unitName}.service`);
  row(state.enabled, 'enabled at boot', host.supervisor.getType());
  row(state.active, 'active', state.active ? 'running' : 'stopped');
  console.log('');

  for (const key of config.required_env) {
    if (!process.env[key]?.trim()) {
      console.log(`  ${YELLOW}!${NC} ${key} is not set`);
    }
  }
}
