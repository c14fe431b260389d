import { parseStamp, WEEK_MS } from '../cli/date-utils.js';
import { BackendError, IdentityConflictError } from '../cli/errors.js';
import { parseFilterExpression } from '../query/filters.js';
import { sortItems } from '../query/sort.js';
import { ItemListSchema, type Item, type SortMode } from '../schema/index.js';
import type { TaskBackend } from './taskwarrior.js';

export type UpdateResult =
  | { status: 'written' }
  | { status: 'conflict'; uuid: string; expected: string | undefined; actual: string | undefined };

/**
 * Stateless bridge between the review engine and the backend. Every call
 * re-reads the backend; nothing is cached between calls.
 */
export class BackendAdapter {
  constructor(
    private readonly backend: TaskBackend,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Working set for a filter expression: deleted items dropped, completed
   * items kept only when the filter asks for them and they fall inside the
   * requested window.
   */
  fetch(filter: string, mode: SortMode): Item[] {
    const { args, completedWeeks } = parseFilterExpression(filter);
    const now = this.clock().getTime();
    const items = this.exportItems(args).filter((item) => {
      if (item.status === 'deleted') return false;
      if (completedWeeks === 0) return item.end === undefined;
      if (item.end === undefined) return false;
      return now - this.stampMs(item.end, args) < completedWeeks * WEEK_MS;
    });
    return sortItems(items, mode);
  }

  /** Open items in backend order, used to seed keybindings. */
  vocabulary(): Item[] {
    return this.exportItems([]).filter((item) => item.status !== 'deleted' && item.end === undefined);
  }

  /** The single authoritative record for an identity. */
  get(uuid: string): Item {
    const matches = this.exportItems([uuid]);
    const [item] = matches;
    if (matches.length !== 1 || !item) {
      throw new IdentityConflictError(uuid, matches.length);
    }
    return item;
  }

  /**
   * Write an edited item back, refusing when the backend copy changed since
   * the item was loaded. The comparison read always finishes before the
   * import is issued.
   */
  update(item: Item): UpdateResult {
    if (item.uuid) {
      const current = this.exportItems([item.uuid]);
      if (current.length > 1) {
        throw new IdentityConflictError(item.uuid, current.length);
      }
      const [prev] = current;
      if (prev && prev.modified !== item.modified) {
        return { status: 'conflict', uuid: item.uuid, expected: item.modified, actual: prev.modified };
      }
    }
    this.backend.import(JSON.stringify(item));
    return { status: 'written' };
  }

  private exportItems(args: string[]): Item[] {
    const raw = this.backend.export(args);
    const parsed = ItemListSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
      throw new BackendError(`Malformed export payload (${where})`, ['export', ...args].join(' '));
    }
    return parsed.data;
  }

  private stampMs(stamp: string, args: string[]): number {
    const date = parseStamp(stamp);
    if (!date) {
      throw new BackendError(`Unparsable timestamp ${stamp}`, ['export', ...args].join(' '));
    }
    return date.getTime();
  }
}
