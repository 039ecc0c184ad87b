import * as fs from 'fs';
import * as path from 'path';
import type { CommandRunner } from '../shell';
import type { Supervisor, UnitState, UnitWriteResult } from './types';
import { writeFileIfChanged } from '../../utils/files';

/**
 * systemd adapter. Unit files go to the configured unit directory and every
 * state change goes through systemctl.
 */
export class SystemdSupervisor implements Supervisor {
  private runner: CommandRunner;
  private unitDir: string;

  constructor(runner: CommandRunner, unitDir: string) {
    this.runner = runner;
    this.unitDir = unitDir;
  }

  unitPath(name: string): string {
    return path.join(this.unitDir, `${name}.service`);
  }

  async writeUnit(name: string, content: string): Promise<UnitWriteResult> {
    const location = this.unitPath(name);
    const changed = writeFileIfChanged(location, content);
    return { location, changed };
  }

  async reindex(): Promise<void> {
    this.runner.run('systemctl', ['daemon-reload']);
  }

  async enable(name: string): Promise<void> {
    this.runner.run('systemctl', ['enable', name]);
  }

  async restart(name: string): Promise<void> {
    this.runner.run('systemctl', ['restart', name]);
  }

  async getState(name: string): Promise<UnitState> {
    return {
      installed: fs.existsSync(this.unitPath(name)),
      enabled: this.query('is-enabled', name) === 'enabled',
      active: this.query('is-active', name) === 'active',
    };
  }

  getType(): string {
    return 'systemd';
  }

  // is-enabled / is-active exit non-zero for the negative answers
  private query(verb: string, name: string): string {
    try {
      return this.runner.run('systemctl', [verb, name]);
    } catch {
      return '';
    }
  }
}
