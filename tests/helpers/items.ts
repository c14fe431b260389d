import type { Item } from '../../src/schema/index.js';

let counter = 0;

export function uuidFor(n: number): string {
  return `aaaaaaaa-0000-0000-0000-${String(n).padStart(12, '0')}`;
}

export function makeItem(overrides: Partial<Item> = {}): Item {
  counter += 1;
  return {
    uuid: uuidFor(counter),
    description: `Item ${counter}`,
    status: 'pending',
    entry: '20240101T090000Z',
    modified: '20240101T090000Z',
    urgency: 1,
    tags: [],
    ...overrides,
  };
}
