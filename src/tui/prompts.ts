import type { UpdateResult } from '../backend/adapter.js';
import type { KeybindingRegistry } from '../keys/registry.js';
import { legendLine } from './render.js';
import type { ReviewTerminal } from './terminal.js';

type Conflict = Extract<UpdateResult, { status: 'conflict' }>;

/**
 * Show a context's bindings under a title and resolve one key against it.
 * Unbound keys resolve to undefined.
 */
export async function pickFromContext(
  terminal: ReviewTerminal,
  keys: KeybindingRegistry,
  title: string,
  context: string
): Promise<string | undefined> {
  terminal.print(legendLine(keys, context, title));
  const key = await terminal.readKey();
  return keys.mapsTo(key, context);
}

/** Free text, trimmed; null when cancelled. */
export async function promptText(terminal: ReviewTerminal, label: string): Promise<string | null> {
  const input = await terminal.readLine(label);
  return input === null ? null : input.trim();
}

/**
 * Index typed by the user, or null for anything that is not an integer
 * inside [0, size). Out-of-range targets are not clamped.
 */
export async function promptJump(terminal: ReviewTerminal, size: number): Promise<number | null> {
  const input = await terminal.readLine('Jump to: ');
  if (input === null) return null;
  return parseJumpTarget(input, size);
}

export function parseJumpTarget(input: string, size: number): number | null {
  const trimmed = input.trim();
  if (!/^-?\d+$/.test(trimmed)) return null;
  const index = Number.parseInt(trimmed, 10);
  if (index < 0 || index >= size) return null;
  return index;
}

/** Blocks until the user presses a key; the caller refreshes afterwards. */
export async function acknowledgeConflict(terminal: ReviewTerminal, conflict: Conflict): Promise<void> {
  terminal.print([
    {
      text: ` Item's modification time has changed [${conflict.expected ?? '-'} -> ${conflict.actual ?? '-'}]. Please refresh before updating. `,
      style: 'alert',
    },
  ]);
  terminal.print('Press any key to refresh.');
  await terminal.readKey();
}
