import terminalKit from 'terminal-kit';
import { formatAge, formatDisplayDate, parseStamp } from '../cli/date-utils.js';
import {
  assigneeLabel,
  colorLabel,
  DESCRIPTION_WIDTH,
  displayDescription,
  displayId,
  isDisputed,
  isReviewed,
  normalTags,
  type ReviewPolicy,
} from '../model/item.js';
import type { KeybindingRegistry } from '../keys/registry.js';
import type { ColorLabel, Item } from '../schema/index.js';
import type { Line, Style } from './terminal.js';

const TAG_STYLES: Style[] = ['red', 'green', 'yellow', 'blue', 'magenta', 'cyan'];

const COLOR_STYLES: Record<ColorLabel, Style> = {
  red: 'alert',
  green: 'ok',
  blue: 'info',
};

function padEndByWidth(s: string, width: number): string {
  const shown = terminalKit.stringWidth(s) > width ? terminalKit.truncateString(s, width) : s;
  return shown + ' '.repeat(Math.max(0, width - terminalKit.stringWidth(shown)));
}

function padStartByWidth(s: string, width: number): string {
  const shown = terminalKit.stringWidth(s) > width ? terminalKit.truncateString(s, width) : s;
  return ' '.repeat(Math.max(0, width - terminalKit.stringWidth(shown))) + shown;
}

function statusBadge(item: Item, now: Date, policy: ReviewPolicy): { text: string; style: Style } {
  if (item.status === 'deleted') return { text: ' X ', style: 'alert' };
  if (isDisputed(item)) return { text: ' D ', style: 'alert' };
  if (isReviewed(item, now, policy)) return { text: ' R ', style: 'ok' };
  return { text: ' N ', style: 'info' };
}

/**
 * One listing row: position, review badge, assignee, project, description
 * and colour. Long descriptions are cut for display only.
 */
export function summaryLine(item: Item, index: number, total: number, now: Date, policy: ReviewPolicy): Line {
  const color = colorLabel(item);
  const position = `${String(index).padStart(2)} of ${String(total).padStart(2)}`;
  return [
    { text: ` [${position}] `, style: 'alert' },
    statusBadge(item, now, policy),
    { text: ` ${padStartByWidth(assigneeLabel(item) ?? '', 13)} `, style: 'user' },
    { text: ` ${padStartByWidth(item.project ?? '', 12)} `, style: 'project' },
    { text: ` ${padEndByWidth(displayDescription(item.description), DESCRIPTION_WIDTH)}`, style: 'text' },
    { text: ` ${padEndByWidth(color ?? '', 10)} `, style: color ? COLOR_STYLES[color] : 'muted' },
  ];
}

export function detailLines(item: Item, now: Date): Line[] {
  const lines: Line[] = [];
  if (terminalKit.stringWidth(item.description) > DESCRIPTION_WIDTH) {
    lines.push([{ text: `Description:  ${item.description}` }]);
  }

  const tags = normalTags(item);
  lines.push([
    { text: 'Tags:        ' },
    ...tags.map((tag, i): { text: string; style: Style } => ({
      text: ` ${tag}`,
      style: TAG_STYLES[i % TAG_STYLES.length] ?? 'plain',
    })),
  ]);

  const started = item.entry ? parseStamp(item.entry) : null;
  const finished = item.end ? parseStamp(item.end) : null;
  if (started) {
    lines.push([{ text: `Started:      ${formatDisplayDate(started)}` }]);
  }
  if (finished) {
    lines.push([{ text: `Completed:    ${formatDisplayDate(finished)} [${formatAge(now.getTime() - finished.getTime())}ago]` }]);
  }
  if (started) {
    const until = finished ?? now;
    lines.push([{ text: `Age:          ${formatAge(until.getTime() - started.getTime())}` }]);
  }
  lines.push([{ text: `UUID:         ${item.uuid ?? ''}` }]);
  lines.push([{ text: `XID:          ${displayId(item)}` }]);
  return lines;
}

/** Legend of a context's bindings, e.g. `[e] description  [q] quit`. */
export function legendLine(registry: KeybindingRegistry, context: string, title?: string): Line {
  const line: Line = [];
  if (title) {
    line.push({ text: ` ${title}: `, style: 'alert' });
  }
  registry.bindings(context).forEach(({ key, value }, i) => {
    line.push({ text: `${i > 0 || title ? ' ' : ''}[` }, { text: key, style: 'bold' }, { text: `] ${value}` });
  });
  return line;
}
