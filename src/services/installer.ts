import * as fs from 'fs';
import * as path from 'path';
import type { HostPlatform, HostTarget } from '../config/host';
import type { ProxyConfig, TemplatingConfig } from '../config/schema';
import { DependencyError, type Result, err, errorMessage, ok } from '../errors';
import { describeCommandError, formatCommand } from '../adapters/shell';
import { info, success } from '../utils/output';

export type ToolStatus = 'present' | 'installed';

export interface DependencyReport {
  templating: ToolStatus;
  proxy: ToolStatus;
}

const SUPPORTED_OS: Partial<Record<NodeJS.Platform, string>> = {
  linux: 'linux',
  darwin: 'darwin',
  freebsd: 'freebsd',
};

const SUPPORTED_ARCH: Record<string, { arch: string; arm?: string }> = {
  x64: { arch: 'amd64' },
  arm64: { arch: 'arm64' },
  arm: { arch: 'arm', arm: '7' },
};

/**
 * Build the download URL for a proxy build with the configured plugins
 * for the given platform.
 */
export function buildDownloadUrl(proxy: ProxyConfig, platform: HostPlatform): Result<string, DependencyError> {
  const os = SUPPORTED_OS[platform.os];
  if (!os) {
    return err(new DependencyError(`Unsupported operating system: ${platform.os}. Supported: ${Object.keys(SUPPORTED_OS).join(', ')}`));
  }
  const target = SUPPORTED_ARCH[platform.arch];
  if (!target) {
    return err(new DependencyError(`Unsupported architecture: ${platform.arch}. Supported: ${Object.keys(SUPPORTED_ARCH).join(', ')}`));
  }

  const url = new URL(proxy.download_url);
  url.searchParams.set('os', os);
  url.searchParams.set('arch', target.arch);
  if (target.arm) url.searchParams.set('arm', target.arm);
  for (const plugin of proxy.plugins) {
    url.searchParams.append('p', plugin);
  }
  return ok(url.toString());
}

/**
 * Install the templating utility through the package manager when it is
 * not on PATH.
 */
export function ensureTemplatingUtility(host: HostTarget, templating: TemplatingConfig): Result<ToolStatus, DependencyError> {
  if (host.runner.exists(templating.command)) {
    info(`${templating.command} already installed`);
    return ok('present');
  }

  const commands: Array<[string, string[]]> = [
    [templating.package_manager, ['update', '-y']],
    [templating.package_manager, ['install', '-y', templating.package]],
  ];

  for (const [command, args] of commands) {
    try {
      host.runner.run(command, args, { inherit: true });
    } catch (error) {
      return err(new DependencyError(`${formatCommand(command, args)} failed: ${describeCommandError(error)}`, { cause: error }));
    }
  }

  success(`Installed ${templating.package} (${templating.command})`);
  return ok('installed');
}

/**
 * Download and extract the proxy build when the binary is neither on PATH
 * nor already in the install directory.
 */
export async function ensureProxyBinary(host: HostTarget, proxy: ProxyConfig): Promise<Result<ToolStatus, DependencyError>> {
  const target = path.join(host.binDir, proxy.binary);
  if (host.runner.exists(proxy.binary) || fs.existsSync(target)) {
    info(`${proxy.binary} already installed`);
    return ok('present');
  }

  const url = buildDownloadUrl(proxy, host.platform);
  if (!url.ok) return url;

  info(`Installing ${proxy.binary} with ${proxy.plugins.join(', ') || 'no plugins'}...`);
  const archive = path.join(host.tmpDir, `${proxy.binary}-${process.pid}-${Date.now()}.tar.gz`);

  try {
    try {
      await host.download(url.value, archive, { timeoutMs: proxy.download_timeout_ms });
    } catch (error) {
      return err(new DependencyError(`Failed to download ${url.value}: ${errorMessage(error)}`, { cause: error }));
    }

    try {
      fs.mkdirSync(host.binDir, { recursive: true });
      host.runner.run('tar', ['-xzf', archive, '-C', host.binDir, proxy.binary]);
    } catch (error) {
      return err(new DependencyError(`Failed to extract ${proxy.binary} into ${host.binDir}: ${describeCommandError(error)}`, { cause: error }));
    }
  } finally {
    fs.rmSync(archive, { force: true });
  }

  if (!fs.existsSync(target)) {
    return err(new DependencyError(`Archive did not contain ${proxy.binary}`));
  }

  success(`Installed ${target}`);
  return ok('installed');
}

export async function installDependencies(
  host: HostTarget,
  templating: TemplatingConfig,
  proxy: ProxyConfig,
): Promise<Result<DependencyReport, DependencyError>> {
  const templatingStatus = ensureTemplatingUtility(host, templating);
  if (!templatingStatus.ok) return templatingStatus;

  const proxyStatus = await ensureProxyBinary(host, proxy);
  if (!proxyStatus.ok) return proxyStatus;

  return ok({ templating: templatingStatus.value, proxy: proxyStatus.value });
}
