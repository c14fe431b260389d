/**
 * Date utilities for backend timestamps (YYYYMMDDTHHMMSSZ, always UTC)
 */

import { STAMP_REGEX } from '../schema/index.js';

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Parse a backend timestamp. Returns null for anything that is not a real UTC instant.
 */
export function parseStamp(stamp: string): Date | null {
  const match = stamp.match(STAMP_REGEX);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second] = match.map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Reject rollovers such as Feb 30
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Format a Date as a backend timestamp
 */
export function formatStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}` +
    `T${pad2(date.getUTCHours())}${pad2(date.getUTCMinutes())}${pad2(date.getUTCSeconds())}Z`
  );
}

/**
 * Format a Date for the detail view: "2024 Jan 31 Wed"
 */
export function formatDisplayDate(date: Date): string {
  return `${date.getUTCFullYear()} ${MONTHS[date.getUTCMonth()]} ${pad2(date.getUTCDate())} ${WEEKDAYS[date.getUTCDay()]}`;
}

/**
 * Human age of a duration: "3 days 4 hours ", "12 mins "
 */
export function formatAge(durationMs: number): string {
  let rest = Math.max(0, durationMs);
  let out = '';
  if (rest > DAY_MS) {
    const days = Math.floor(rest / DAY_MS);
    out += `${days} days `;
    rest -= days * DAY_MS;
  }
  if (rest > HOUR_MS) {
    out += `${Math.floor(rest / HOUR_MS)} hours `;
  }
  if (rest < HOUR_MS) {
    out += `${Math.floor(rest / 60_000)} mins `;
  }
  return out;
}
