/**
 * Aggregator
 *
 * Sums interval time per day, hour, app or window title. Day and hour
 * groups split intervals at local boundaries so no time is counted twice.
 */

import { localDayKey, localHourKey, nextDayBoundary, nextHourBoundary } from './time.js';
import type { Aggregation, GroupBy, GroupTotal, NormalizedInterval } from './types.js';

export const DEFAULT_TOP_N = 10;

export interface AggregateOptions {
  topN?: number;
  /** Sum tracked duration instead of active time */
  includeInactive?: boolean;
}

interface Accumulator {
  total: GroupTotal;
  order: number;
}

function intervalSeconds(interval: NormalizedInterval, includeInactive: boolean): number {
  return includeInactive ? interval.durationSeconds : interval.activeSeconds;
}

/**
 * Apportion `seconds` across the boundary-delimited pieces of an interval by
 * clock time. The last piece takes the remainder so the parts add up exactly.
 */
export function splitByBoundary(
  interval: NormalizedInterval,
  seconds: number,
  keyOf: (ms: number) => string,
  nextBoundary: (ms: number) => number
): Array<{ key: string; seconds: number }> {
  const start = interval.start.getTime();
  const end = interval.end.getTime();
  const span = end - start;
  if (span <= 0) return [{ key: keyOf(start), seconds }];

  const parts: Array<{ key: string; seconds: number }> = [];
  let cursor = start;
  let assigned = 0;
  while (cursor < end) {
    const boundary = Math.min(nextBoundary(cursor), end);
    const share = boundary === end ? seconds - assigned : (seconds * (boundary - cursor)) / span;
    parts.push({ key: keyOf(cursor), seconds: share });
    assigned += share;
    cursor = boundary;
  }
  return parts;
}

function titleKey(interval: NormalizedInterval): string {
  return `${interval.context.app} — ${interval.context.title}`;
}

export function aggregate(
  intervals: NormalizedInterval[],
  groupBy: GroupBy,
  options: AggregateOptions = {}
): Aggregation {
  const includeInactive = options.includeInactive ?? false;
  const topN = options.topN ?? DEFAULT_TOP_N;
  const groups = new Map<string, Accumulator>();

  const add = (key: string, seconds: number, extra: Partial<GroupTotal> = {}) => {
    const existing = groups.get(key);
    if (existing) {
      existing.total.seconds += seconds;
      return;
    }
    groups.set(key, { total: { key, seconds, ...extra }, order: groups.size });
  };

  const chronological = [...intervals].sort((a, b) => a.start.getTime() - b.start.getTime());

  for (const interval of chronological) {
    const seconds = intervalSeconds(interval, includeInactive);
    if (seconds <= 0) continue;

    switch (groupBy) {
      case 'day':
        for (const part of splitByBoundary(interval, seconds, localDayKey, nextDayBoundary)) {
          add(part.key, part.seconds);
        }
        break;
      case 'hour':
        for (const part of splitByBoundary(interval, seconds, localHourKey, nextHourBoundary)) {
          add(part.key, part.seconds);
        }
        break;
      case 'app':
        add(interval.context.app, seconds, { app: interval.context.app });
        break;
      case 'title':
        add(titleKey(interval), seconds, {
          app: interval.context.app,
          title: interval.context.title,
        });
        break;
    }
  }

  const accumulated = [...groups.values()];
  const totalSeconds = accumulated.reduce((sum, g) => sum + g.total.seconds, 0);

  // Calendar groups read best in time order; the top list is always by size
  const bySize = [...accumulated]
    .sort((a, b) => b.total.seconds - a.total.seconds || a.order - b.order)
    .map((g) => g.total);
  const ordered =
    groupBy === 'day' || groupBy === 'hour'
      ? [...accumulated].sort((a, b) => a.total.key.localeCompare(b.total.key)).map((g) => g.total)
      : bySize;

  return {
    groupBy,
    totalSeconds,
    groups: ordered,
    top: bySize.slice(0, topN),
  };
}

export function secondsFor(aggregation: Aggregation, key: string): number {
  return aggregation.groups.find((g) => g.key === key)?.seconds ?? 0;
}

export interface HourActivity {
  /** Local clock hour, "HH:00" */
  hour: string;
  seconds: number;
  topApp: string;
}

export interface WorkBlock {
  startHour: number;
  /** Inclusive */
  endHour: number;
}

/**
 * Active time per local hour with the app that took most of it
 */
export function hourlyActivity(intervals: NormalizedInterval[]): HourActivity[] {
  const hours = new Map<string, Map<string, number>>();
  const chronological = [...intervals].sort((a, b) => a.start.getTime() - b.start.getTime());

  for (const interval of chronological) {
    if (interval.activeSeconds <= 0) continue;
    for (const part of splitByBoundary(interval, interval.activeSeconds, localHourKey, nextHourBoundary)) {
      const apps = hours.get(part.key) ?? new Map<string, number>();
      apps.set(interval.context.app, (apps.get(interval.context.app) ?? 0) + part.seconds);
      hours.set(part.key, apps);
    }
  }

  return [...hours.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, apps]) => {
      let topApp = '';
      let topSeconds = -1;
      let seconds = 0;
      for (const [app, appSeconds] of apps) {
        seconds += appSeconds;
        if (appSeconds > topSeconds) {
          topApp = app;
          topSeconds = appSeconds;
        }
      }
      // Keys are "YYYY-MM-DD HH:00"
      return { hour: key.slice(11), seconds, topApp };
    });
}

/**
 * Runs of consecutive hours with activity
 */
export function workBlocks(hours: HourActivity[]): WorkBlock[] {
  const active = [...new Set(hours.filter((h) => h.seconds > 0).map((h) => Number.parseInt(h.hour, 10)))].sort(
    (a, b) => a - b
  );
  const blocks: WorkBlock[] = [];
  for (const hour of active) {
    const last = blocks[blocks.length - 1];
    if (last && hour === last.endHour + 1) {
      last.endHour = hour;
    } else {
      blocks.push({ startHour: hour, endHour: hour });
    }
  }
  return blocks;
}
