import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { vi } from 'vitest';
import type { CommandRunner, RunOptions } from '../src/adapters/shell';
import type { Downloader } from '../src/adapters/download';
import { InMemorySupervisor } from '../src/adapters/supervisor';
import type { HostTarget } from '../src/config/host';

type Handler = (args: string[], options: RunOptions) => string;

/**
 * Command runner double: records every call, answers PATH lookups from a
 * fixed set and fails commands on request.
 */
export class RecordingRunner implements CommandRunner {
  readonly calls: string[] = [];
  readonly lookups: string[] = [];
  private available: Set<string>;
  private handlers = new Map<string, Handler>();
  private failing = new Map<string, string>();

  constructor(available: string[] = []) {
    this.available = new Set(available);
  }

  on(command: string, handler: Handler): this {
    this.handlers.set(command, handler);
    return this;
  }

  /** Fail any call whose "command args" line starts with prefix */
  fail(prefix: string, stderr = `${prefix}: failed`): this {
    this.failing.set(prefix, stderr);
    return this;
  }

  run(command: string, args: string[], options: RunOptions = {}): string {
    const line = [command, ...args].join(' ');
    this.calls.push(line);
    for (const [prefix, stderr] of this.failing) {
      if (line.startsWith(prefix)) {
        throw Object.assign(new Error(`Command failed: ${line}`), { stderr });
      }
    }
    const handler = this.handlers.get(command);
    return handler ? handler(args, options) : '';
  }

  exists(command: string): boolean {
    this.lookups.push(command);
    return this.available.has(command);
  }
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'caddy-provision-'));
}

export interface TestHost extends HostTarget {
  runner: RecordingRunner;
  supervisor: InMemorySupervisor;
}

/**
 * A host rooted in a temp dir with doubles for every capability.
 * The downloader writes a placeholder archive; the tar handler "extracts" the
 * binary by creating it in the bin dir.
 */
export function makeHost(root: string, overrides: Partial<TestHost> = {}): TestHost {
  const workDir = path.join(root, 'work');
  fs.mkdirSync(workDir, { recursive: true });
  const binDir = path.join(root, 'usr', 'local', 'bin');

  const runner = new RecordingRunner(['envsubst']).on('tar', (args) => {
    const dir = args[args.indexOf('-C') + 1];
    const name = args[args.length - 1];
    fs.writeFileSync(path.join(dir, name), '#!/bin/sh\n', { mode: 0o755 });
    return '';
  });

  const download: Downloader = vi.fn(async (_url: string, dest: string) => {
    fs.writeFileSync(dest, 'archive');
  });

  return {
    workDir,
    templatePath: path.join(workDir, 'Caddyfile'),
    configPath: path.join(root, 'etc', 'caddy', 'Caddyfile'),
    binDir,
    unitName: 'caddy',
    tmpDir: root,
    platform: { os: 'linux', arch: 'x64' },
    runner,
    supervisor: new InMemorySupervisor(),
    download,
    ...overrides,
  };
}

export const TEST_ENV = {
  DOMAIN: 'example.com',
  LETSENCRYPT_EMAIL: 'ops@example.com',
  CLOUDFLARE_API_TOKEN: 'tok123',
};

export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => {});
}
