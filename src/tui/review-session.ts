import type { BackendAdapter, UpdateResult } from '../backend/adapter.js';
import { CONTEXTS, resolveEditorAction, resolveListingAction, type EditorAction } from '../keys/defaults.js';
import type { KeybindingRegistry } from '../keys/registry.js';
import {
  withAssignee,
  withColor,
  withDefaultColor,
  withDescription,
  withDisputed,
  withProject,
  withReviewed,
  withStatus,
  withTagToggled,
} from '../model/edits.js';
import { isColorLabel, isReviewed, type ReviewPolicy } from '../model/item.js';
import { describeSortMode, sortItems } from '../query/sort.js';
import type { ColorLabel, Item, SortMode } from '../schema/index.js';
import { acknowledgeConflict, pickFromContext, promptJump, promptText } from './prompts.js';
import { detailLines, legendLine, summaryLine } from './render.js';
import type { ReviewTerminal } from './terminal.js';

export interface SessionSettings {
  sortMode: SortMode;
  showAll: boolean;
}

/** Everything one review session needs; nothing is read from globals. */
export interface ReviewContext {
  adapter: BackendAdapter;
  keys: KeybindingRegistry;
  terminal: ReviewTerminal;
  settings: SessionSettings;
  policy: ReviewPolicy;
  listLimit: number;
  defaultColor: ColorLabel;
  clock: () => Date;
}

export type ReviewState =
  | { kind: 'listing'; message?: string }
  | { kind: 'editing'; index: number }
  | { kind: 'done' };

type Step = { kind: 'move'; delta: number } | { kind: 'quit' };

const ADVANCE: Step = { kind: 'move', delta: 1 };
const STAY: Step = { kind: 'move', delta: 0 };

const SORT_ACTIONS: Record<'sort by urgency' | 'sort by date' | 'sort by color', SortMode> = {
  'sort by urgency': 'urgency',
  'sort by date': 'date',
  'sort by color': 'color',
};

/**
 * Pages through one working set. Listing shows a summary and takes menu
 * commands; Editing(i) shows one item and applies item-editor actions,
 * writing every change through the adapter's guarded update and replacing
 * the item with the backend's copy afterwards.
 */
export class ReviewSession {
  private visible: Item[] = [];

  constructor(
    private readonly ctx: ReviewContext,
    private readonly items: Item[]
  ) {}

  get workingSet(): readonly Item[] {
    return this.visible;
  }

  async run(): Promise<void> {
    let state: ReviewState = { kind: 'listing' };
    while (state.kind !== 'done') {
      state = state.kind === 'listing' ? await this.listing(state.message) : await this.editing(state.index);
    }
  }

  private refreshVisible(): void {
    const now = this.ctx.clock();
    this.visible = this.ctx.settings.showAll
      ? [...this.items]
      : this.items.filter((item) => !isReviewed(item, now, this.ctx.policy));
  }

  private renderListing(message?: string): void {
    const { terminal, settings, listLimit, keys, policy } = this.ctx;
    const now = this.ctx.clock();
    terminal.clear();
    terminal.print('');
    if (message) {
      terminal.print(`> ${message}`);
    }
    if (settings.showAll) {
      terminal.print('> Showing all items.');
    } else {
      terminal.print(`> ${this.items.length - this.visible.length} items already reviewed.`);
    }
    terminal.print(`> Sorted by ${describeSortMode(settings.sortMode)}.`);
    terminal.print('');
    this.visible.slice(0, listLimit).forEach((item, i) => {
      terminal.print(summaryLine(item, i, this.visible.length, now, policy));
    });
    terminal.print('');
    terminal.print(`Found ${this.visible.length} items.`);
    terminal.print(legendLine(keys, CONTEXTS.listing));
  }

  private async listing(message?: string): Promise<ReviewState> {
    this.refreshVisible();
    this.renderListing(message);

    const key = await this.ctx.terminal.readKey();
    if (key === 'ENTER' || key === 'CTRL_C') {
      return { kind: 'done' };
    }

    const action = resolveListingAction(this.ctx.keys, key);
    switch (action) {
      case 'goto': {
        const index = await promptJump(this.ctx.terminal, this.visible.length);
        return index === null ? { kind: 'listing' } : { kind: 'editing', index };
      }
      case 'review':
        return this.visible.length > 0 ? { kind: 'editing', index: 0 } : { kind: 'listing' };
      case 'toggle show all':
        this.ctx.settings.showAll = !this.ctx.settings.showAll;
        return { kind: 'listing' };
      case 'fix':
        return { kind: 'listing', message: this.bulkFix() };
      case 'sort by urgency':
      case 'sort by date':
      case 'sort by color':
        this.ctx.settings.sortMode = SORT_ACTIONS[action];
        sortItems(this.items, this.ctx.settings.sortMode);
        return { kind: 'listing' };
      case 'quit':
        return { kind: 'done' };
      case undefined:
        return { kind: 'listing' };
    }
  }

  private async editing(index: number): Promise<ReviewState> {
    const item = this.visible[index];
    if (!item) {
      return { kind: 'listing' };
    }

    const { terminal, keys, policy } = this.ctx;
    const now = this.ctx.clock();
    terminal.clear();
    terminal.print('');
    terminal.print(summaryLine(item, index, this.visible.length, now, policy));
    terminal.print('');
    for (const line of detailLines(item, now)) {
      terminal.print(line);
    }
    terminal.print('');
    terminal.print(legendLine(keys, CONTEXTS.editor));

    const key = await terminal.readKey();
    if (key === 'CTRL_C') {
      return { kind: 'done' };
    }

    const step = await this.applyEditorAction(resolveEditorAction(keys, key), index, item);
    if (step.kind === 'quit') {
      return { kind: 'done' };
    }
    const next = index + step.delta;
    if (next < 0 || next >= this.visible.length) {
      return { kind: 'listing' };
    }
    return { kind: 'editing', index: next };
  }

  private async applyEditorAction(action: EditorAction | undefined, index: number, item: Item): Promise<Step> {
    const { terminal, keys, policy } = this.ctx;
    switch (action) {
      case 'back':
        return { kind: 'move', delta: -1 };
      case 'quit':
        return { kind: 'quit' };
      case 'description': {
        const text = await promptText(terminal, 'Enter description: ');
        return this.applyEdit(index, text === null ? null : withDescription(item, text));
      }
      case 'assigned': {
        const user = await pickFromContext(terminal, keys, 'Assign To', CONTEXTS.user);
        return this.applyEdit(index, user === undefined ? null : withAssignee(item, user));
      }
      case 'project': {
        const project = await pickFromContext(terminal, keys, 'Project', CONTEXTS.project);
        return this.applyEdit(index, project === undefined ? null : withProject(item, project));
      }
      case 'color': {
        const color = await pickFromContext(terminal, keys, 'Item Color', CONTEXTS.color);
        return this.applyEdit(index, color !== undefined && isColorLabel(color) ? withColor(item, color) : null);
      }
      case 'tags': {
        const tag = await pickFromContext(terminal, keys, 'Tags', CONTEXTS.tag);
        return this.applyEdit(index, tag === undefined ? null : withTagToggled(item, tag));
      }
      case 'reviewed':
        return this.applyMark(index, withReviewed(item, this.ctx.clock(), policy));
      case 'delete':
        return this.applyMark(index, withStatus(item, 'deleted', this.ctx.clock()));
      case 'done':
        return this.applyMark(index, withStatus(item, 'completed', this.ctx.clock()));
      case 'disputed':
        return this.applyMark(index, withDisputed(item));
      case undefined:
        return ADVANCE;
    }
  }

  /** Content edits: a cancelled choice stays put, a write advances. */
  private async applyEdit(index: number, candidate: Item | null): Promise<Step> {
    if (!candidate) return STAY;
    const result = await this.write(index, candidate);
    return result.status === 'written' ? ADVANCE : STAY;
  }

  /** Marks advance even when already in effect. */
  private async applyMark(index: number, candidate: Item | null): Promise<Step> {
    if (!candidate) return ADVANCE;
    const result = await this.write(index, candidate);
    return result.status === 'written' ? ADVANCE : STAY;
  }

  private async write(index: number, candidate: Item): Promise<UpdateResult> {
    const result = this.ctx.adapter.update(candidate);
    if (result.status === 'conflict') {
      await acknowledgeConflict(this.ctx.terminal, result);
    }
    this.refresh(index, candidate);
    return result;
  }

  private refresh(index: number, candidate: Item): void {
    if (!candidate.uuid) return;
    const fresh = this.ctx.adapter.get(candidate.uuid);
    this.visible[index] = fresh;
    const pos = this.items.findIndex((it) => it.uuid === fresh.uuid);
    if (pos !== -1) {
      this.items[pos] = fresh;
    }
  }

  /**
   * Give every uncoloured item the default colour. Conflicts are counted,
   * not prompted for.
   */
  private bulkFix(): string {
    const { adapter, terminal, defaultColor } = this.ctx;
    let fixed = 0;
    let conflicts = 0;
    this.visible.forEach((item, index) => {
      const candidate = withDefaultColor(item, defaultColor);
      if (!candidate) return;
      terminal.print(`Fixing item: ${item.description}`);
      const result = adapter.update(candidate);
      if (result.status === 'conflict') {
        conflicts += 1;
      } else {
        fixed += 1;
      }
      this.refresh(index, candidate);
    });
    return `Fixed ${fixed} items (${conflicts} conflicts).`;
  }
}

export async function runReview(ctx: ReviewContext, items: Item[]): Promise<void> {
  await new ReviewSession(ctx, items).run();
}
