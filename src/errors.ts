export type ProvisionErrorKind = 'configuration' | 'dependency' | 'rendering' | 'supervisor';

/**
 * Base class for every failure the provisioning routine can report.
 * The `kind` tag lets callers branch without instanceof chains.
 */
export class ProvisionError extends Error {
  readonly kind: ProvisionErrorKind;

  constructor(kind: ProvisionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** A required value is missing, or provision.yaml is invalid. */
export class ConfigurationError extends ProvisionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
  }
}

/** Package install, archive download or extraction failed. */
export class DependencyError extends ProvisionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('dependency', message, options);
  }
}

/**
 * The template references values the environment does not supply.
 * Kept as a configuration error subtype: the fix is always in the environment.
 */
export class RenderError extends ConfigurationError {
  readonly kind: ProvisionErrorKind = 'rendering';
  readonly unresolved: string[];

  constructor(message: string, unresolved: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.unresolved = unresolved;
  }
}

export type SupervisorStep = 'write-unit' | 'reindex' | 'enable' | 'restart';

export class SupervisorError extends ProvisionError {
  readonly step: SupervisorStep;

  constructor(step: SupervisorStep, message: string, options?: { cause?: unknown }) {
    super('supervisor', message, options);
    this.step = step;
  }
}

export type Result<T, E = ProvisionError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
