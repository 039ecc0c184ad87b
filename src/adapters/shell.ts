import { execFileSync } from 'child_process';

export interface RunOptions {
  /** Written to the child's stdin */
  input?: string;
  cwd?: string;
  /** Stream output to the terminal instead of capturing it */
  inherit?: boolean;
}

/**
 * Runs host commands. Every call blocks until the child exits and throws
 * when it exits non-zero.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): string;
  exists(command: string): boolean;
}

export class ShellRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): string {
    const output = execFileSync(command, args, {
      cwd: options.cwd,
      input: options.input,
      encoding: 'utf-8',
      stdio: options.inherit ? ['pipe', 'inherit', 'inherit'] : 'pipe',
    });
    // With inherited stdout execFileSync returns null
    return (output ?? '').trim();
  }

  exists(command: string): boolean {
    try {
      execFileSync('which', [command], { stdio: 'pipe' });
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Human-readable reason for a failed command, preferring the child's stderr.
 */
export function describeCommandError(error: unknown): string {
  if (error instanceof Error) {
    if ('stderr' in error) {
      const stderr = String(error.stderr ?? '').trim();
      if (stderr) return stderr;
    }
    return error.message;
  }
  return String(error);
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}
