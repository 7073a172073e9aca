/**
 * Time helpers
 *
 * Date argument parsing, store timestamp conversion, local day/hour
 * boundaries and span arithmetic shared by the analysis modules.
 */

import dayjs from 'dayjs';
import { ValidationError } from './errors.js';
import type { Span, TimeRange } from './types.js';

const MINUTE_MS = 60 * 1000;

const STORE_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parse a timestamp as ActivityWatch stores it: UTC, space separated,
 * optional microseconds and offset (`2026-02-07 09:15:00.123456+00:00`).
 */
export function parseStoreTimestamp(text: string): Date | null {
  const match = STORE_TIMESTAMP.exec(text.trim());
  if (!match) return null;

  const [, y, mo, d, h, mi, s, fraction = '', zone = 'Z'] = match;
  const ms = Number.parseInt(fraction.padEnd(3, '0').slice(0, 3), 10);
  let value = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s), ms);

  if (zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1;
    const digits = zone.slice(1).replace(':', '');
    const offsetMinutes =
      Number.parseInt(digits.slice(0, 2), 10) * 60 + Number.parseInt(digits.slice(2), 10);
    value -= sign * offsetMinutes * MINUTE_MS;
  }

  return new Date(value);
}

/**
 * Render a bound in a form SQLite date functions accept
 */
export function toStoreTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').replace('Z', '');
}

/**
 * Parse a CLI date argument.
 *
 * Accepts `today`, `yesterday`, a calendar date (local midnight) or a full
 * ISO timestamp.
 */
export function parseDateArg(value: string, now: Date = new Date()): Date {
  const trimmed = value.trim();
  if (trimmed === 'today') return dayjs(now).startOf('day').toDate();
  if (trimmed === 'yesterday') return dayjs(now).startOf('day').subtract(1, 'day').toDate();

  if (/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) {
    const day = dayjs(trimmed);
    if (!day.isValid() || day.format('YYYY-MM-DD') !== trimmed) {
      throw new ValidationError(`Invalid date: ${value}`);
    }
    return day.startOf('day').toDate();
  }

  const parsed = new Date(trimmed.replace(' ', 'T'));
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationError(`Invalid date: ${value}. Use YYYY-MM-DD, an ISO timestamp, "today" or "yesterday"`);
  }
  return parsed;
}

export function assertRange(range: TimeRange): TimeRange {
  if (range.end.getTime() <= range.start.getTime()) {
    throw new ValidationError(
      `End (${range.end.toISOString()}) must be after start (${range.start.toISOString()})`
    );
  }
  return range;
}

export function parseRangeArgs(start: string, end: string, now: Date = new Date()): TimeRange {
  return assertRange({ start: parseDateArg(start, now), end: parseDateArg(end, now) });
}

/** The local calendar day containing `date` */
export function dayRange(date: Date): TimeRange {
  const start = dayjs(date).startOf('day');
  return { start: start.toDate(), end: start.add(1, 'day').toDate() };
}

/** Seven days from the Monday on or before `date` */
export function weekRange(date: Date): TimeRange {
  const day = dayjs(date).startOf('day');
  const monday = day.subtract((day.day() + 6) % 7, 'day');
  return { start: monday.toDate(), end: monday.add(7, 'day').toDate() };
}

/** The last `days` calendar days, today included */
export function lastDaysRange(days: number, now: Date = new Date()): TimeRange {
  if (!Number.isInteger(days) || days < 1) {
    throw new ValidationError(`Days must be a positive integer, got ${days}`);
  }
  const end = dayjs(now).startOf('day').add(1, 'day');
  return { start: end.subtract(days, 'day').toDate(), end: end.toDate() };
}

export function localDayKey(ms: number): string {
  return dayjs(ms).format('YYYY-MM-DD');
}

export function localHourKey(ms: number): string {
  return dayjs(ms).format('YYYY-MM-DD HH:00');
}

export function nextDayBoundary(ms: number): number {
  return dayjs(ms).startOf('day').add(1, 'day').valueOf();
}

export function nextHourBoundary(ms: number): number {
  return dayjs(ms).startOf('hour').add(1, 'hour').valueOf();
}

export function overlapMs(startMs: number, endMs: number, windowStartMs: number, windowEndMs: number) {
  const start = Math.max(startMs, windowStartMs);
  const end = Math.min(endMs, windowEndMs);
  return Math.max(0, end - start);
}

/**
 * Merge spans into a sorted, non-overlapping list
 */
export function unionSpans(spans: Span[]): Span[] {
  const sorted = spans.filter((s) => s.end > s.start).sort((a, b) => a.start - b.start);
  const merged: Span[] = [];
  for (const span of sorted) {
    const last = merged[merged.length - 1];
    if (last && span.start <= last.end) {
      last.end = Math.max(last.end, span.end);
    } else {
      merged.push({ start: span.start, end: span.end });
    }
  }
  return merged;
}

/**
 * Length of `span` covered by a sorted union of spans
 */
export function coveredMs(span: Span, union: Span[]): number {
  let total = 0;
  for (const u of union) {
    if (u.start >= span.end) break;
    total += overlapMs(span.start, span.end, u.start, u.end);
  }
  return total;
}

export function spansIntersect(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}
