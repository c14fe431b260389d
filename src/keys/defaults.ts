import { isNormalTag } from '../model/item.js';
import { ASSIGNEE_SIGIL, type Item } from '../schema/index.js';
import type { KeybindingRegistry } from './registry.js';

export const CONTEXTS = {
  shell: 'global-help',
  listing: 'menu',
  editor: 'item-editor',
  color: 'color',
  user: 'user',
  project: 'project',
  tag: 'tag',
} as const;

export type ContextName = (typeof CONTEXTS)[keyof typeof CONTEXTS];

export const SHELL_ACTIONS = ['quit', 'clear', 'completed', 'assigned', 'project', 'new', 'tag', 'search'] as const;
export type ShellAction = (typeof SHELL_ACTIONS)[number];

export const LISTING_ACTIONS = [
  'fix',
  'toggle show all',
  'review',
  'sort by urgency',
  'sort by date',
  'sort by color',
  'goto',
  'quit',
] as const;
export type ListingAction = (typeof LISTING_ACTIONS)[number];

export const EDITOR_ACTIONS = [
  'description',
  'assigned',
  'project',
  'color',
  'tags',
  'reviewed',
  'back',
  'quit',
  'delete',
  'done',
  'disputed',
] as const;
export type EditorAction = (typeof EDITOR_ACTIONS)[number];

type Preferred<A extends string> = ReadonlyArray<readonly [key: string, action: A]>;

const COLOR_KEYS: Preferred<string> = [
  ['r', 'red'],
  ['b', 'blue'],
  ['g', 'green'],
];

const SHELL_KEYS: Preferred<ShellAction> = [
  ['q', 'quit'],
  ['c', 'clear'],
  ['d', 'completed'],
  ['a', 'assigned'],
  ['p', 'project'],
  ['n', 'new'],
  ['t', 'tag'],
  ['s', 'search'],
];

const EDITOR_KEYS: Preferred<EditorAction> = [
  ['e', 'description'],
  ['a', 'assigned'],
  ['p', 'project'],
  ['c', 'color'],
  ['t', 'tags'],
  ['r', 'reviewed'],
  ['b', 'back'],
  ['q', 'quit'],
  ['x', 'delete'],
  ['d', 'done'],
  ['i', 'disputed'],
];

const LISTING_KEYS: Preferred<ListingAction> = [
  ['f', 'fix'],
  ['a', 'toggle show all'],
  ['r', 'review'],
  ['u', 'sort by urgency'],
  ['d', 'sort by date'],
  ['c', 'sort by color'],
  ['g', 'goto'],
  ['q', 'quit'],
];

/**
 * Derive this run's bindings: vocabulary observed on open items first, in
 * the order the backend returned them, then the fixed action keys.
 */
export function generateMappings(registry: KeybindingRegistry, items: Item[]): void {
  for (const item of items) {
    if (item.end !== undefined || item.status === 'deleted') continue;
    if (item.project) {
      registry.autoAssign(item.project, CONTEXTS.project);
    }
    for (const tag of item.tags ?? []) {
      if (isNormalTag(tag)) {
        registry.autoAssign(tag, CONTEXTS.tag);
      } else if (tag.startsWith(ASSIGNEE_SIGIL) && tag.length > ASSIGNEE_SIGIL.length) {
        registry.autoAssign(tag.slice(ASSIGNEE_SIGIL.length), CONTEXTS.user);
      }
    }
  }

  const fixed: Array<[ContextName, Preferred<string>]> = [
    [CONTEXTS.color, COLOR_KEYS],
    [CONTEXTS.shell, SHELL_KEYS],
    [CONTEXTS.editor, EDITOR_KEYS],
    [CONTEXTS.listing, LISTING_KEYS],
  ];
  for (const [context, bindings] of fixed) {
    for (const [key, action] of bindings) {
      registry.bestEffortAssign(key, action, context);
    }
  }
}

function isOneOf<T extends string>(list: readonly T[], value: string | undefined): value is T {
  return value !== undefined && (list as readonly string[]).includes(value);
}

export function resolveShellAction(registry: KeybindingRegistry, key: string): ShellAction | undefined {
  const action = registry.mapsTo(key, CONTEXTS.shell);
  return isOneOf(SHELL_ACTIONS, action) ? action : undefined;
}

export function resolveListingAction(registry: KeybindingRegistry, key: string): ListingAction | undefined {
  const action = registry.mapsTo(key, CONTEXTS.listing);
  return isOneOf(LISTING_ACTIONS, action) ? action : undefined;
}

export function resolveEditorAction(registry: KeybindingRegistry, key: string): EditorAction | undefined {
  const action = registry.mapsTo(key, CONTEXTS.editor);
  return isOneOf(EDITOR_ACTIONS, action) ? action : undefined;
}
