import type { SupervisorStep } from '../../errors';
import type { Supervisor, UnitState, UnitWriteResult } from './types';

/**
 * In-process supervisor double. Mirrors systemd's rule that enable/restart
 * act on the indexed definition, so a skipped reindex shows up as an error.
 */
export class InMemorySupervisor implements Supervisor {
  /** Unit files as written */
  readonly units = new Map<string, string>();
  /** Unit definitions as of the last reindex */
  readonly indexed = new Map<string, string>();
  readonly enabled = new Set<string>();
  /** Running unit -> definition it was started with */
  readonly running = new Map<string, string>();
  readonly restarts = new Map<string, number>();
  readonly calls: string[] = [];

  private failing = new Set<SupervisorStep>();

  /** Make the given step throw on its next and later calls */
  failOn(step: SupervisorStep): this {
    this.failing.add(step);
    return this;
  }

  async writeUnit(name: string, content: string): Promise<UnitWriteResult> {
    this.record('write-unit', name);
    const changed = this.units.get(name) !== content;
    this.units.set(name, content);
    return { location: `memory://${name}.service`, changed };
  }

  async reindex(): Promise<void> {
    this.record('reindex');
    this.indexed.clear();
    for (const [name, content] of this.units) {
      this.indexed.set(name, content);
    }
  }

  async enable(name: string): Promise<void> {
    this.record('enable', name);
    this.requireIndexed(name);
    this.enabled.add(name);
  }

  async restart(name: string): Promise<void> {
    this.record('restart', name);
    this.running.set(name, this.requireIndexed(name));
    this.restarts.set(name, (this.restarts.get(name) ?? 0) + 1);
  }

  async getState(name: string): Promise<UnitState> {
    return {
      installed: this.units.has(name),
      enabled: this.enabled.has(name),
      active: this.running.has(name),
    };
  }

  getType(): string {
    return 'memory';
  }

  private record(step: SupervisorStep, name?: string): void {
    this.calls.push(name ? `${step} ${name}` : step);
    if (this.failing.has(step)) {
      throw new Error(`simulated ${step} failure`);
    }
  }

  private requireIndexed(name: string): string {
    const definition = this.indexed.get(name);
    if (definition === undefined) {
      throw new Error(`Unit ${name}.service not found`);
    }
    return definition;
  }
}
