import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SystemdSupervisor } from '../src/adapters/supervisor';
import { RecordingRunner, makeTempDir } from './helpers';

describe('SystemdSupervisor', () => {
  let root: string;
  let unitDir: string;
  let runner: RecordingRunner;
  let supervisor: SystemdSupervisor;

  beforeEach(() => {
    root = makeTempDir();
    unitDir = path.join(root, 'etc', 'systemd', 'system');
    runner = new RecordingRunner();
    supervisor = new SystemdSupervisor(runner, unitDir);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('writes <name>.service into the unit directory', async () => {
    const result = await supervisor.writeUnit('caddy', '[Unit]\n');

    expect(result).toEqual({ location: path.join(unitDir, 'caddy.service'), changed: true });
    expect(fs.readFileSync(path.join(unitDir, 'caddy.service'), 'utf-8')).toBe('[Unit]\n');
    expect(await supervisor.writeUnit('caddy', '[Unit]\n')).toEqual({
      location: path.join(unitDir, 'caddy.service'),
      changed: false,
    });
  });

  it('issues systemctl commands', async () => {
    await supervisor.reindex();
    await supervisor.enable('caddy');
    await supervisor.restart('caddy');

    expect(runner.calls).toEqual([
      'systemctl daemon-reload',
      'systemctl enable caddy',
      'systemctl restart caddy',
    ]);
  });

  it('propagates systemctl failures', async () => {
    runner.fail('systemctl daemon-reload', 'Access denied');

    await expect(supervisor.reindex()).rejects.toThrow('Command failed: systemctl daemon-reload');
  });

  it('reads unit state from is-enabled and is-active', async () => {
    runner.on('systemctl', (args) => (args[0] === 'is-enabled' ? 'enabled' : 'active'));
    await supervisor.writeUnit('caddy', '[Unit]\n');

    expect(await supervisor.getState('caddy')).toEqual({ installed: true, enabled: true, active: true });
  });

  it('treats non-zero systemctl queries as negative answers', async () => {
    runner.fail('systemctl is-active', 'inactive');

    expect(await supervisor.getState('caddy')).toEqual({ installed: false, enabled: false, active: false });
  });
});
