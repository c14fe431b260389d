import { CONTEXTS, resolveShellAction } from '../keys/defaults.js';
import { withDescription } from '../model/edits.js';
import {
  appendFilter,
  assigneeFragment,
  COMPLETED_TOKEN,
  draftDefaults,
  normalizeFilter,
  projectFragment,
  tagFragment,
} from '../query/filters.js';
import { ASSIGNEE_SIGIL, type Item } from '../schema/index.js';
import { acknowledgeConflict, pickFromContext, promptText } from './prompts.js';
import { legendLine } from './render.js';
import { runReview, type ReviewContext } from './review-session.js';

/** Result of one shell keystroke: the next filter, or null to exit. */
export type ShellStep = string | null;

/**
 * Filter-accumulation loop. Each key either extends the filter, clears it,
 * creates an item, or (Enter) reviews the items the filter selects.
 */
export async function runShell(ctx: ReviewContext, initialFilter: string): Promise<string> {
  let filter = normalizeFilter(initialFilter);
  while (true) {
    const next = await shellStep(ctx, filter);
    if (next === null) {
      return filter;
    }
    filter = normalizeFilter(next);
  }
}

export async function shellStep(ctx: ReviewContext, filter: string): Promise<ShellStep> {
  const { terminal, keys } = ctx;
  terminal.clear();
  terminal.print(legendLine(keys, CONTEXTS.shell));
  terminal.print('');
  terminal.print([{ text: `task ${filter}>`, style: 'info' }]);

  const key = await terminal.readKey();
  if (key === 'CTRL_C') {
    return null;
  }
  if (key === 'ENTER') {
    if (filter) {
      const items = ctx.adapter.fetch(filter, ctx.settings.sortMode);
      await runReview(ctx, items);
    }
    return filter;
  }

  switch (resolveShellAction(keys, key)) {
    case 'quit':
      return null;
    case 'clear':
      return '';
    case 'completed':
      return appendFilter(filter, COMPLETED_TOKEN);
    case 'search': {
      terminal.print('');
      const terms = await promptText(terminal, 'Enter search terms: ');
      return terms ? appendFilter(filter, terms) : filter;
    }
    case 'assigned': {
      const user = await pickFromContext(terminal, keys, 'Assign To', CONTEXTS.user);
      return user === undefined ? filter : appendFilter(filter, assigneeFragment(user));
    }
    case 'project': {
      const project = await pickFromContext(terminal, keys, 'Project', CONTEXTS.project);
      return project === undefined ? filter : appendFilter(filter, projectFragment(project));
    }
    case 'tag': {
      const tag = await pickFromContext(terminal, keys, 'Tag', CONTEXTS.tag);
      return tag === undefined ? filter : appendFilter(filter, tagFragment(tag));
    }
    case 'new':
      await createItem(ctx, filter);
      return filter;
    case undefined:
      return filter;
  }
}

/**
 * New pending item with project and assignee taken from the filter, or
 * picked when the filter does not name them. It carries no identity, so
 * the update path imports it without a conflict check.
 */
export async function createItem(ctx: ReviewContext, filter: string): Promise<Item | null> {
  const { terminal, keys } = ctx;
  const defaults = draftDefaults(filter);

  const project = defaults.project ?? (await pickFromContext(terminal, keys, 'Project', CONTEXTS.project));
  if (project === undefined) return null;
  const assignee = defaults.assignee ?? (await pickFromContext(terminal, keys, 'Assign To', CONTEXTS.user));
  if (assignee === undefined) return null;

  const draft: Item = {
    description: '',
    project,
    status: 'pending',
    tags: [`${ASSIGNEE_SIGIL}${assignee}`, ctx.defaultColor],
  };
  terminal.print('');
  const text = await promptText(terminal, 'Enter description: ');
  const candidate = text === null ? null : withDescription(draft, text);
  if (!candidate) return null;

  const result = ctx.adapter.update(candidate);
  if (result.status === 'conflict') {
    await acknowledgeConflict(terminal, result);
    return null;
  }
  return candidate;
}
