import { describe, expect, it } from 'vitest';
import { DAY_MS, HOUR_MS, parseStamp } from '../../src/cli/date-utils.js';
import {
  assigneeLabel,
  colorLabel,
  displayDescription,
  displayId,
  isDisputed,
  isNormalTag,
  isReviewed,
  sortKey,
  type ReviewPolicy,
} from '../../src/model/item.js';
import { makeItem } from '../helpers/items.js';

const policy: ReviewPolicy = { reviewTag: 'r:tester', windowMs: DAY_MS };
const marker = '20240110T120000Z';
const markerMs = Date.UTC(2024, 0, 10, 12, 0, 0);

describe('label derivations', () => {
  it('returns a single colour even when several are stored', () => {
    const item = makeItem({ tags: ['work', 'blue', 'red'] });
    expect(colorLabel(item)).toBe('blue');
  });

  it('returns undefined when there is no colour or no tags at all', () => {
    expect(colorLabel(makeItem({ tags: ['work'] }))).toBeUndefined();
    expect(colorLabel(makeItem({ tags: undefined }))).toBeUndefined();
  });

  it('returns the first assignee label only', () => {
    const item = makeItem({ tags: ['@alice', 'home', '@bob'] });
    expect(assigneeLabel(item)).toBe('@alice');
    expect(assigneeLabel(makeItem({ tags: ['home'] }))).toBeUndefined();
  });

  it('detects the dispute label', () => {
    expect(isDisputed(makeItem({ tags: ['disputed'] }))).toBe(true);
    expect(isDisputed(makeItem({ tags: ['dispute'] }))).toBe(false);
  });

  it('classifies free-form tags', () => {
    expect(isNormalTag('errand')).toBe(true);
    expect(isNormalTag('disputed')).toBe(true);
    expect(isNormalTag('green')).toBe(false);
    expect(isNormalTag('@sam')).toBe(false);
    expect(isNormalTag('-later')).toBe(false);
    expect(isNormalTag('PENDING')).toBe(false);
    expect(isNormalTag('')).toBe(false);
  });
});

describe('isReviewed', () => {
  it('holds from the marker until the window elapses', () => {
    const item = makeItem({ reviewed: marker });
    expect(isReviewed(item, new Date(markerMs), policy)).toBe(true);
    expect(isReviewed(item, new Date(markerMs + DAY_MS - 1), policy)).toBe(true);
    expect(isReviewed(item, new Date(markerMs + DAY_MS), policy)).toBe(false);
  });

  it('treats a 30 hour old marker as stale and a 1 hour old one as fresh', () => {
    const now = new Date(markerMs + 30 * HOUR_MS);
    const stale = makeItem({ reviewed: marker });
    const fresh = makeItem({ reviewed: '20240111T170000Z' });
    expect(isReviewed(stale, now, policy)).toBe(false);
    expect(isReviewed(fresh, now, policy)).toBe(true);
  });

  it('is false for open items without a marker', () => {
    expect(isReviewed(makeItem(), new Date(markerMs), policy)).toBe(false);
  });

  it('uses the reviewer tag for completed items, without decay', () => {
    const done = makeItem({ status: 'completed', end: '20230101T000000Z', reviewed: marker });
    const later = new Date(markerMs + 365 * DAY_MS);
    expect(isReviewed(done, new Date(markerMs), policy)).toBe(false);
    expect(isReviewed({ ...done, tags: ['r:tester'] }, later, policy)).toBe(true);
    expect(isReviewed({ ...done, tags: ['r:someone-else'] }, later, policy)).toBe(false);
  });
});

describe('sortKey', () => {
  it('uses the urgency score', () => {
    expect(sortKey(makeItem({ urgency: 7.5 }), 'urgency')).toBe(7.5);
    expect(sortKey(makeItem({ urgency: undefined }), 'urgency')).toBe(0);
  });

  it('prefers completion time over creation time', () => {
    const open = makeItem({ entry: '20240101T000000Z' });
    const done = makeItem({ entry: '20240101T000000Z', end: '20240105T000000Z' });
    expect(sortKey(open, 'date')).toBe(parseStamp('20240101T000000Z')?.getTime());
    expect(sortKey(done, 'date')).toBe(parseStamp('20240105T000000Z')?.getTime());
  });

  it('ranks colours red, blue, green, then none', () => {
    expect(sortKey(makeItem({ tags: ['red'] }), 'color')).toBe(0);
    expect(sortKey(makeItem({ tags: ['blue'] }), 'color')).toBe(1);
    expect(sortKey(makeItem({ tags: ['green'] }), 'color')).toBe(2);
    expect(sortKey(makeItem({ tags: [] }), 'color')).toBe(3);
  });
});

describe('display helpers', () => {
  it('truncates long descriptions for display only', () => {
    const long = 'x'.repeat(75);
    const item = makeItem({ description: long });
    expect(displayDescription(item.description)).toBe('x'.repeat(60));
    expect(item.description).toHaveLength(75);
    expect(displayDescription('short')).toBe('short');
  });

  it('prefers xid over the working-set number', () => {
    expect(displayId(makeItem({ xid: 'ab12', id: 4 }))).toBe('ab12');
    expect(displayId(makeItem({ id: 4 }))).toBe('4');
    expect(displayId(makeItem({ id: 0 }))).toBe('');
  });
});
