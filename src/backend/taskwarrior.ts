import { spawnSync } from 'node:child_process';
import { BackendError } from '../cli/errors.js';

/**
 * The export/import text protocol of the task store. Both calls block until
 * the backend answers; failures throw and are never retried.
 */
export interface TaskBackend {
  /** Raw parsed JSON returned for the given filter predicates. */
  export(args: string[]): unknown;
  /** Hands one serialized item to the backend. */
  import(payload: string): void;
}

export interface TaskwarriorOptions {
  command: string;
  /** rc overrides placed before every filter. */
  args: string[];
}

export class TaskwarriorBackend implements TaskBackend {
  constructor(private readonly options: TaskwarriorOptions) {}

  export(args: string[]): unknown {
    const argv = [...this.options.args, ...args, 'export'];
    const stdout = this.run(argv);
    try {
      return JSON.parse(stdout);
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new BackendError('Export returned invalid JSON', this.describe(argv));
      }
      throw error;
    }
  }

  import(payload: string): void {
    this.run([...this.options.args, 'import'], payload);
  }

  private run(argv: string[], input?: string): string {
    const result = spawnSync(this.options.command, argv, {
      encoding: 'utf-8',
      input,
      maxBuffer: 64 * 1024 * 1024,
    });
    const commandLine = this.describe(argv);
    if (result.error) {
      throw new BackendError(`Failed to run backend: ${result.error.message}`, commandLine);
    }
    if (result.status !== 0) {
      throw new BackendError(`Backend exited with status ${result.status ?? 'unknown'}`, commandLine, result.stderr);
    }
    return result.stdout;
  }

  private describe(argv: string[]): string {
    return [this.options.command, ...argv].join(' ');
  }
}
