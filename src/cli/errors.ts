export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(`${filePath}: ${message}`);
    this.name = 'ConfigError';
  }
}

export class BackendError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly stderr?: string
  ) {
    super(stderr ? `${message} [${command}]: ${stderr.trim()}` : `${message} [${command}]`);
    this.name = 'BackendError';
  }
}

/** The backend returned a number of records other than one for a single identity. */
export class IdentityConflictError extends Error {
  constructor(
    public readonly uuid: string,
    public readonly count: number
  ) {
    super(`Expected exactly one item for ${uuid}, backend returned ${count}`);
    this.name = 'IdentityConflictError';
  }
}

/** The line printed for an error that ends the program. */
export function formatCliError(error: Error): string {
  if (error instanceof CliUsageError) {
    return error.message;
  }
  if (error instanceof BackendError || error instanceof IdentityConflictError) {
    return `Fatal: ${error.message}`;
  }
  return `Error: ${error.message}`;
}
