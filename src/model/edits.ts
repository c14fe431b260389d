import { formatStamp } from '../cli/date-utils.js';
import { ASSIGNEE_SIGIL, DISPUTED_LABEL, type ColorLabel, type Item } from '../schema/index.js';
import { colorLabel, isAssigneeLabel, isColorLabel, isCompleted, isDisputed, isReviewed, type ReviewPolicy } from './item.js';

// Each edit returns a fresh candidate for the guarded update path, or null
// when there is nothing to write. Inputs are never mutated.

export function withDescription(item: Item, text: string): Item | null {
  const description = text.trim();
  if (!description) return null;
  return { ...item, description };
}

/** Replaces any assignee label with `@<user>`. */
export function withAssignee(item: Item, user: string): Item {
  const name = user.startsWith(ASSIGNEE_SIGIL) ? user.slice(ASSIGNEE_SIGIL.length) : user;
  const tags = (item.tags ?? []).filter((t) => !isAssigneeLabel(t));
  return { ...item, tags: [...tags, `${ASSIGNEE_SIGIL}${name}`] };
}

export function withProject(item: Item, project: string): Item {
  return { ...item, project };
}

/** Replaces any colour label with `color`. */
export function withColor(item: Item, color: ColorLabel): Item {
  const tags = (item.tags ?? []).filter((t) => !isColorLabel(t));
  return { ...item, tags: [...tags, color] };
}

export function withTagToggled(item: Item, tag: string): Item {
  const tags = item.tags ?? [];
  if (tags.includes(tag)) {
    return { ...item, tags: tags.filter((t) => t !== tag) };
  }
  return { ...item, tags: [...tags, tag] };
}

export function withReviewed(item: Item, now: Date, policy: ReviewPolicy): Item | null {
  if (isReviewed(item, now, policy)) return null;
  if (!isCompleted(item)) {
    return { ...item, reviewed: formatStamp(now) };
  }
  return { ...item, tags: [...(item.tags ?? []), policy.reviewTag] };
}

export function withStatus(item: Item, status: 'completed' | 'deleted', now: Date): Item {
  if (status === 'completed' && !item.end) {
    return { ...item, status, end: formatStamp(now) };
  }
  return { ...item, status };
}

export function withDisputed(item: Item): Item | null {
  if (isDisputed(item)) return null;
  return { ...item, tags: [...(item.tags ?? []), DISPUTED_LABEL] };
}

export function withDefaultColor(item: Item, color: ColorLabel): Item | null {
  if (colorLabel(item)) return null;
  return withColor(item, color);
}
