import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDeployDelegate, provisionThenDeploy } from '../src/services/deploy';
import { runProvisioning } from '../src/services/provisioner';
import { parseConfig } from '../src/config/loader';
import { TEST_ENV, type TestHost, makeHost, makeTempDir, silenceConsole } from './helpers';

const config = parseConfig({});

describe('provisionThenDeploy', () => {
  let root: string;
  let host: TestHost;

  beforeEach(() => {
    silenceConsole();
    root = makeTempDir();
    host = makeHost(root);
    fs.writeFileSync(host.templatePath, '${DOMAIN} {\n\ttls {env.CLOUDFLARE_API_TOKEN}\n}\n');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('runs the deploy routine with the original arguments after provisioning', async () => {
    const order: string[] = [];
    const deploy = vi.fn((_args: string[]) => {
      order.push('deploy');
      expect(fs.readFileSync(host.configPath, 'utf-8')).toContain('tls tok123');
      return 0;
    });

    const result = await provisionThenDeploy(
      async () => {
        const provisioned = await runProvisioning(config, host, { env: { ...TEST_ENV } });
        order.push('provisioned');
        return provisioned;
      },
      deploy,
      ['--profile', 'prod', 'a b'],
    );

    expect(result.ok && result.value.exitCode).toBe(0);
    expect(order).toEqual(['provisioned', 'deploy']);
    expect(deploy).toHaveBeenCalledWith(['--profile', 'prod', 'a b']);
    expect(await host.supervisor.getState('caddy')).toEqual({ installed: true, enabled: true, active: true });
  });

  it('passes through the deploy exit code', async () => {
    const result = await provisionThenDeploy(
      () => runProvisioning(config, host, { env: { ...TEST_ENV } }),
      () => 3,
      [],
    );

    expect(result.ok && result.value.exitCode).toBe(3);
  });

  it('never deploys when provisioning fails', async () => {
    const deploy = vi.fn(() => 0);
    const env: NodeJS.ProcessEnv = { ...TEST_ENV };
    delete env.CLOUDFLARE_API_TOKEN;

    const result = await provisionThenDeploy(() => runProvisioning(config, host, { env }), deploy, []);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.error.message).toBe('CLOUDFLARE_API_TOKEN not set');
    expect(deploy).not.toHaveBeenCalled();
    expect(fs.existsSync(host.configPath)).toBe(false);
  });
});

describe('createDeployDelegate', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('runs a relative command from the working directory and returns its status', () => {
    const script = path.join(root, 'deploy.sh');
    fs.writeFileSync(script, '#!/bin/sh\n[ "$1" = "--profile" ] && [ "$2" = "a b" ] && exit 7\nexit 1\n', { mode: 0o755 });

    const deploy = createDeployDelegate('./deploy.sh', root);

    expect(deploy(['--profile', 'a b'])).toBe(7);
  });

  it('throws when the command cannot be started', () => {
    const deploy = createDeployDelegate('./missing.sh', root);

    expect(() => deploy([])).toThrow('Failed to run ./missing.sh');
  });
});
