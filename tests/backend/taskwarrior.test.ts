import { beforeEach, describe, expect, it, vi } from 'vitest';

import { TaskwarriorBackend } from '../../src/backend/taskwarrior.js';
import { BackendError } from '../../src/cli/errors.js';

const { spawnSync } = vi.hoisted(() => ({ spawnSync: vi.fn() }));
vi.mock('node:child_process', () => ({ spawnSync }));

function ok(stdout: string) {
  return { status: 0, stdout, stderr: '', error: undefined };
}

describe('TaskwarriorBackend', () => {
  beforeEach(() => {
    spawnSync.mockReset();
  });

  it('runs export with rc overrides before the filter', () => {
    spawnSync.mockReturnValue(ok('[{"status":"pending"}]'));
    const backend = new TaskwarriorBackend({ command: 'task', args: ['rc.json.array=on'] });

    expect(backend.export(['project:home', '+@sam'])).toEqual([{ status: 'pending' }]);
    expect(spawnSync).toHaveBeenCalledWith(
      'task',
      ['rc.json.array=on', 'project:home', '+@sam', 'export'],
      expect.objectContaining({ encoding: 'utf-8' })
    );
  });

  it('sends the payload to import on stdin', () => {
    spawnSync.mockReturnValue(ok(''));
    const backend = new TaskwarriorBackend({ command: 'task', args: [] });

    backend.import('{"description":"x"}');
    expect(spawnSync).toHaveBeenCalledWith('task', ['import'], expect.objectContaining({ input: '{"description":"x"}' }));
  });

  it('throws when the backend exits non-zero', () => {
    spawnSync.mockReturnValue({ status: 2, stdout: '', stderr: 'No matches.\n', error: undefined });
    const backend = new TaskwarriorBackend({ command: 'task', args: [] });

    expect(() => backend.export([])).toThrow('Backend exited with status 2 [task export]: No matches.');
  });

  it('throws when the backend cannot be started', () => {
    spawnSync.mockReturnValue({ status: null, stdout: '', stderr: '', error: new Error('spawn task ENOENT') });
    const backend = new TaskwarriorBackend({ command: 'task', args: [] });

    expect(() => backend.import('{}')).toThrow(BackendError);
  });

  it('throws on output that is not JSON', () => {
    spawnSync.mockReturnValue(ok('Configuration override rc.json.array=on\n'));
    const backend = new TaskwarriorBackend({ command: 'task', args: [] });

    expect(() => backend.export([])).toThrow('Export returned invalid JSON [task export]');
  });
});
