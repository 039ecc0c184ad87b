/**
 * Interface for process-supervisor adapters.
 * The lifecycle controller drives the proxy unit exclusively through this.
 */
export interface Supervisor {
  /**
   * Write (or overwrite) a unit definition
   */
  writeUnit(name: string, content: string): Promise<UnitWriteResult>;

  /**
   * Reload the supervisor's unit index so new definitions are picked up
   */
  reindex(): Promise<void>;

  /**
   * Start the unit automatically on boot
   */
  enable(name: string): Promise<void>;

  /**
   * Restart the unit now (starts it if stopped)
   */
  restart(name: string): Promise<void>;

  /**
   * Current registration state of a unit
   */
  getState(name: string): Promise<UnitState>;

  /**
   * Get the supervisor type
   */
  getType(): string;
}

export interface UnitWriteResult {
  location: string;
  changed: boolean;
}

export interface UnitState {
  installed: boolean;
  enabled: boolean;
  active: boolean;
}
