/**
 * Filter expressions as typed into the shell and handed to the backend.
 *
 * A filter is a whitespace-separated list of backend predicates
 * (`project:home +@sam +urgent`). The reserved token `_end` never reaches
 * the backend: each occurrence widens the completed-item window by a week.
 */

import { ASSIGNEE_SIGIL } from '../schema/index.js';

export const COMPLETED_TOKEN = '_end';

export interface ParsedFilter {
  /** Predicates to pass to the backend, completion tokens removed. */
  args: string[];
  /** Weeks of completed history requested; 0 means open items only. */
  completedWeeks: number;
}

export function tokenizeFilter(filter: string): string[] {
  return filter.split(/\s+/).filter(Boolean);
}

export function normalizeFilter(filter: string): string {
  return tokenizeFilter(filter).join(' ');
}

export function parseFilterExpression(filter: string): ParsedFilter {
  const args: string[] = [];
  let completedWeeks = 0;
  for (const token of tokenizeFilter(filter)) {
    if (token === COMPLETED_TOKEN) {
      completedWeeks += 1;
      continue;
    }
    args.push(token);
  }
  return { args, completedWeeks };
}

export function appendFilter(filter: string, fragment: string): string {
  return normalizeFilter(`${filter} ${fragment}`);
}

export function assigneeFragment(user: string): string {
  return `+${ASSIGNEE_SIGIL}${user}`;
}

export function projectFragment(project: string): string {
  return `project:${project}`;
}

export function tagFragment(tag: string): string {
  return `+${tag}`;
}

/**
 * Project and assignee implied by the filter; new items created from the
 * shell inherit them instead of prompting.
 */
export function draftDefaults(filter: string): { project?: string; assignee?: string } {
  const out: { project?: string; assignee?: string } = {};
  for (const token of tokenizeFilter(filter)) {
    if (token.startsWith('project:') && token.length > 'project:'.length) {
      out.project = token.slice('project:'.length);
    }
    if (token.startsWith(`+${ASSIGNEE_SIGIL}`) && token.length > 2) {
      out.assignee = token.slice(2);
    }
  }
  return out;
}
