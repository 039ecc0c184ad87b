import * as os from 'os';
import * as path from 'path';
import type { ProvisionConfig } from './schema';
import { type CommandRunner, ShellRunner } from '../adapters/shell';
import { type Supervisor, SystemdSupervisor } from '../adapters/supervisor';
import { type Downloader, downloadFile } from '../adapters/download';

export interface HostPlatform {
  os: NodeJS.Platform;
  arch: string;
}

/**
 * Everything the routine touches on the host. Real runs get absolute system
 * paths and systemd; tests point the paths into a temp dir and swap the
 * capabilities for doubles.
 */
export interface HostTarget {
  /** Invocation directory; the template and deploy command resolve against it */
  workDir: string;
  templatePath: string;
  configPath: string;
  binDir: string;
  unitName: string;
  tmpDir: string;
  platform: HostPlatform;
  runner: CommandRunner;
  supervisor: Supervisor;
  download: Downloader;
}

export function createHostTarget(config: ProvisionConfig, workDir: string = process.cwd()): HostTarget {
  const runner = new ShellRunner();
  return {
    workDir,
    templatePath: path.resolve(workDir, config.template),
    configPath: config.host.config_path,
    binDir: config.host.bin_dir,
    unitName: config.host.unit_name,
    tmpDir: os.tmpdir(),
    platform: { os: os.platform(), arch: os.arch() },
    runner,
    supervisor: new SystemdSupervisor(runner, config.host.unit_dir),
    download: downloadFile,
  };
}
