import { describe, expect, it } from 'vitest';
import {
  BackendError,
  CliUsageError,
  ConfigError,
  formatCliError,
  IdentityConflictError,
} from '../../src/cli/errors.js';

describe('formatCliError', () => {
  it('prints usage errors as they are', () => {
    expect(formatCliError(new CliUsageError("Unknown option '--x'."))).toBe("Unknown option '--x'.");
  });

  it('marks backend failures as fatal', () => {
    expect(formatCliError(new BackendError('Backend exited with status 2', 'task export', 'boom\n'))).toBe(
      'Fatal: Backend exited with status 2 [task export]: boom'
    );
    expect(formatCliError(new IdentityConflictError('u-1', 2))).toBe(
      'Fatal: Expected exactly one item for u-1, backend returned 2'
    );
  });

  it('prefixes everything else with Error', () => {
    expect(formatCliError(new ConfigError('Invalid JSON in config file', '/tmp/c.json'))).toBe(
      'Error: /tmp/c.json: Invalid JSON in config file'
    );
    expect(formatCliError(new Error('boom'))).toBe('Error: boom');
  });
});
