import * as path from 'path';
import type { UnitConfig } from '../config/schema';

export interface UnitSpec extends UnitConfig {
  /** Absolute path of the proxy executable */
  execPath: string;
  /** Absolute path of the rendered configuration */
  configPath: string;
}

export function unitSpecFor(unit: UnitConfig, binDir: string, binary: string, configPath: string): UnitSpec {
  return { ...unit, execPath: path.join(binDir, binary), configPath };
}

/**
 * Generate the systemd unit for the proxy.
 *
 * The proxy runs in the foreground under Type=notify with the environment
 * exposed to the config (--environ), reloads in place on ExecReload, and is
 * only respawned after an abnormal exit.
 */
export function generateUnit(spec: UnitSpec): string {
  if (!Number.isInteger(spec.timeout_stop_sec) || spec.timeout_stop_sec <= 0) {
    throw new RangeError(`TimeoutStopSec must be a positive whole number of seconds, got ${spec.timeout_stop_sec}`);
  }
  if (!Number.isInteger(spec.limit_nofile) || spec.limit_nofile <= 0) {
    throw new RangeError(`LimitNOFILE must be a positive integer, got ${spec.limit_nofile}`);
  }

  return `[Unit]
Description=${spec.description}
After=network-online.target
Requires=network-online.target

[Service]
Type=notify
ExecStart=${spec.execPath} run --environ --config ${spec.configPath}
ExecReload=${spec.execPath} reload --config ${spec.configPath}
TimeoutStopSec=${spec.timeout_stop_sec}s
LimitNOFILE=${spec.limit_nofile}
Restart=${spec.restart}

[Install]
WantedBy=multi-user.target
`;
}
