import { describe, expect, it } from 'vitest';
import { ValidationError } from '../src/errors.js';
import {
  coveredMs,
  lastDaysRange,
  parseDateArg,
  parseRangeArgs,
  parseStoreTimestamp,
  toStoreTimestamp,
  unionSpans,
  weekRange,
} from '../src/time.js';

describe('parseStoreTimestamp', () => {
  it('reads aw-server timestamps with microseconds and offset', () => {
    expect(parseStoreTimestamp('2026-03-02 09:15:00.123456+00:00')?.toISOString()).toBe(
      '2026-03-02T09:15:00.123Z'
    );
  });

  it('treats timestamps without a zone as UTC', () => {
    expect(parseStoreTimestamp('2026-03-02 09:15:00')?.toISOString()).toBe('2026-03-02T09:15:00.000Z');
  });

  it('applies non-UTC offsets', () => {
    expect(parseStoreTimestamp('2026-03-02T11:15:00+02:00')?.toISOString()).toBe('2026-03-02T09:15:00.000Z');
  });

  it('returns null for other text', () => {
    expect(parseStoreTimestamp('yesterday')).toBeNull();
  });

  it('renders bounds SQLite can compare', () => {
    expect(toStoreTimestamp(new Date('2026-03-02T09:15:00.000Z'))).toBe('2026-03-02 09:15:00.000');
  });
});

describe('parseDateArg', () => {
  const now = new Date('2026-03-04T15:30:00Z');

  it('resolves today and yesterday to local midnight', () => {
    expect(parseDateArg('today', now).toISOString()).toBe('2026-03-04T00:00:00.000Z');
    expect(parseDateArg('yesterday', now).toISOString()).toBe('2026-03-03T00:00:00.000Z');
  });

  it('reads calendar dates as local midnight', () => {
    expect(parseDateArg('2026-02-28', now).toISOString()).toBe('2026-02-28T00:00:00.000Z');
  });

  it('reads full timestamps', () => {
    expect(parseDateArg('2026-02-28T10:30:00Z', now).toISOString()).toBe('2026-02-28T10:30:00.000Z');
  });

  it('rejects impossible dates', () => {
    expect(() => parseDateArg('2026-02-30', now)).toThrow(ValidationError);
    expect(() => parseDateArg('not a date', now)).toThrow(ValidationError);
  });
});

describe('ranges', () => {
  it('rejects an end before the start', () => {
    expect(() => parseRangeArgs('2026-03-02', '2026-03-01')).toThrow(ValidationError);
    expect(() => parseRangeArgs('2026-03-02', '2026-03-02')).toThrow(ValidationError);
  });

  it('starts weeks on Monday', () => {
    // 2026-03-04 is a Wednesday
    const range = weekRange(new Date('2026-03-04T12:00:00Z'));
    expect(range.start.toISOString()).toBe('2026-03-02T00:00:00.000Z');
    expect(range.end.toISOString()).toBe('2026-03-09T00:00:00.000Z');
  });

  it('keeps a Sunday in the week that began the Monday before', () => {
    const range = weekRange(new Date('2026-03-08T12:00:00Z'));
    expect(range.start.toISOString()).toBe('2026-03-02T00:00:00.000Z');
  });

  it('covers the last N days including today', () => {
    const range = lastDaysRange(7, new Date('2026-03-08T12:00:00Z'));
    expect(range.start.toISOString()).toBe('2026-03-02T00:00:00.000Z');
    expect(range.end.toISOString()).toBe('2026-03-09T00:00:00.000Z');
    expect(() => lastDaysRange(0)).toThrow(ValidationError);
  });
});

describe('span arithmetic', () => {
  it('merges overlapping and touching spans', () => {
    expect(
      unionSpans([
        { start: 50, end: 60 },
        { start: 0, end: 10 },
        { start: 10, end: 20 },
        { start: 15, end: 30 },
      ])
    ).toEqual([
      { start: 0, end: 30 },
      { start: 50, end: 60 },
    ]);
  });

  it('measures coverage of a span by a union', () => {
    const union = [
      { start: 0, end: 30 },
      { start: 50, end: 60 },
    ];
    expect(coveredMs({ start: 20, end: 55 }, union)).toBe(15);
  });
});
