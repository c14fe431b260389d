import { describe, expect, it } from 'vitest';
import { KeybindingRegistry } from '../../src/keys/registry.js';
import { acknowledgeConflict, parseJumpTarget, pickFromContext, promptJump, promptText } from '../../src/tui/prompts.js';
import { FakeTerminal } from '../helpers/fake-terminal.js';

describe('parseJumpTarget', () => {
  it('accepts integers inside the working set', () => {
    expect(parseJumpTarget('0', 3)).toBe(0);
    expect(parseJumpTarget(' 2 ', 3)).toBe(2);
  });

  it('treats out-of-range targets as no jump', () => {
    expect(parseJumpTarget('3', 3)).toBeNull();
    expect(parseJumpTarget('-1', 3)).toBeNull();
  });

  it('treats malformed input as no jump', () => {
    expect(parseJumpTarget('', 3)).toBeNull();
    expect(parseJumpTarget('two', 3)).toBeNull();
    expect(parseJumpTarget('1.5', 3)).toBeNull();
  });
});

describe('terminal prompts', () => {
  it('promptJump reads one line', async () => {
    const terminal = new FakeTerminal([], ['1', null]);
    await expect(promptJump(terminal, 2)).resolves.toBe(1);
    await expect(promptJump(terminal, 2)).resolves.toBeNull();
    expect(terminal.output).toEqual(['Jump to: ', 'Jump to: ']);
  });

  it('promptText trims and passes cancellation through', async () => {
    const terminal = new FakeTerminal([], ['  hello  ', null]);
    await expect(promptText(terminal, 'Say: ')).resolves.toBe('hello');
    await expect(promptText(terminal, 'Say: ')).resolves.toBeNull();
  });

  it('pickFromContext resolves a key in the given context only', async () => {
    const keys = new KeybindingRegistry();
    keys.autoAssign('home', 'project');
    keys.autoAssign('hank', 'user');
    const terminal = new FakeTerminal(['h', 'z']);

    await expect(pickFromContext(terminal, keys, 'Project', 'project')).resolves.toBe('home');
    await expect(pickFromContext(terminal, keys, 'Project', 'project')).resolves.toBeUndefined();
    expect(terminal.output[0]).toBe(' Project:  [h] home');
  });

  it('acknowledgeConflict waits for a key', async () => {
    const terminal = new FakeTerminal(['x']);
    await acknowledgeConflict(terminal, {
      status: 'conflict',
      uuid: 'u',
      expected: 'T1',
      actual: 'T2',
    });
    expect(terminal.output).toEqual([
      " Item's modification time has changed [T1 -> T2]. Please refresh before updating. ",
      'Press any key to refresh.',
    ]);
    expect(terminal.remainingKeys).toBe(0);
  });
});
