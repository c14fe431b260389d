import terminalKit from 'terminal-kit';
import { parseStamp } from '../cli/date-utils.js';
import {
  ASSIGNEE_SIGIL,
  COLOR_LABELS,
  DISPUTED_LABEL,
  type ColorLabel,
  type Item,
  type SortMode,
} from '../schema/index.js';

export interface ReviewPolicy {
  /** Tag added to completed items once reviewed, one per reviewer. */
  reviewTag: string;
  /** How long the reviewed marker of an open item stays valid. */
  windowMs: number;
}

export const DESCRIPTION_WIDTH = 60;

export function isColorLabel(tag: string): tag is ColorLabel {
  return (COLOR_LABELS as readonly string[]).includes(tag);
}

export function isAssigneeLabel(tag: string): boolean {
  return tag.startsWith(ASSIGNEE_SIGIL);
}

export function colorLabel(item: Item): ColorLabel | undefined {
  return (item.tags ?? []).find(isColorLabel);
}

export function assigneeLabel(item: Item): string | undefined {
  return (item.tags ?? []).find(isAssigneeLabel);
}

export function isDisputed(item: Item): boolean {
  return (item.tags ?? []).includes(DISPUTED_LABEL);
}

export function isCompleted(item: Item): boolean {
  return item.end !== undefined;
}

/**
 * Open items carry a reviewed marker that decays after the policy window.
 * Completed items are reviewed once the reviewer's tag is present.
 */
export function isReviewed(item: Item, now: Date, policy: ReviewPolicy): boolean {
  if (!isCompleted(item)) {
    if (!item.reviewed) return false;
    const marker = parseStamp(item.reviewed);
    if (!marker) return false;
    return now.getTime() - marker.getTime() < policy.windowMs;
  }
  return (item.tags ?? []).includes(policy.reviewTag);
}

/**
 * Free-form tags: everything that is not a colour, an assignee, a
 * negation or an uppercase virtual tag.
 */
export function isNormalTag(tag: string): boolean {
  const first = tag[0];
  if (first === undefined) return false;
  if (first >= 'A' && first <= 'Z') return false;
  if (first === ASSIGNEE_SIGIL || first === '-') return false;
  return !isColorLabel(tag);
}

export function normalTags(item: Item): string[] {
  return (item.tags ?? []).filter(isNormalTag);
}

/** The short id shown to people; falls back to the backend's working-set number. */
export function displayId(item: Item): string {
  if (item.xid) return item.xid;
  if (item.id !== undefined && item.id > 0) return String(item.id);
  return '';
}

/** Completion time when present, else creation time. */
export function activityTime(item: Item): number {
  const stamp = item.end ?? item.entry;
  return stamp ? (parseStamp(stamp)?.getTime() ?? 0) : 0;
}

export function displayDescription(text: string, width: number = DESCRIPTION_WIDTH): string {
  if (terminalKit.stringWidth(text) <= width) return text;
  return terminalKit.truncateString(text, width);
}

const COLOR_RANK: Record<ColorLabel, number> = {
  red: 0,
  blue: 1,
  green: 2,
};
const NO_COLOR_RANK = 3;

/**
 * Numeric key per sort mode. Urgency and date sort descending,
 * colour ascending (red, blue, green, then uncoloured).
 */
export function sortKey(item: Item, mode: SortMode): number {
  switch (mode) {
    case 'urgency':
      return item.urgency ?? 0;
    case 'date':
      return activityTime(item);
    case 'color': {
      const color = colorLabel(item);
      return color ? COLOR_RANK[color] : NO_COLOR_RANK;
    }
  }
}
