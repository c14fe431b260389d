import { sortKey } from '../model/item.js';
import { SortModeSchema, type Item, type SortMode } from '../schema/index.js';

const DESCENDING: Record<SortMode, boolean> = {
  urgency: true,
  date: true,
  color: false,
};

export function compareItems(mode: SortMode): (a: Item, b: Item) => number {
  const sign = DESCENDING[mode] ? -1 : 1;
  return (a, b) => sign * (sortKey(a, mode) - sortKey(b, mode));
}

/**
 * Sort in place. Array.prototype.sort is stable, so equal keys keep their
 * relative order within one call.
 */
export function sortItems(items: Item[], mode: SortMode): Item[] {
  return items.sort(compareItems(mode));
}

export function describeSortMode(mode: SortMode): string {
  switch (mode) {
    case 'urgency':
      return 'Urgency';
    case 'date':
      return 'Date';
    case 'color':
      return 'Color';
  }
}

export function parseSortMode(text: string): SortMode | null {
  const parsed = SortModeSchema.safeParse(text.trim().toLowerCase());
  return parsed.success ? parsed.data : null;
}
