/**
 * Event Normalizer
 *
 * Turns raw watcher events into ordered, non-overlapping intervals with an
 * active share computed against the AFK watcher's "not-afk" periods.
 */

import { coveredMs, unionSpans } from './time.js';
import type {
  ActivityEvent,
  EventContext,
  EventData,
  NormalizationResult,
  NormalizedInterval,
  Span,
  TimeRange,
} from './types.js';

export const DEFAULT_MERGE_GAP_SECONDS = 1;

export interface NormalizeOptions {
  range: TimeRange;
  /** Events of the host's AFK buckets; leave undefined when the host has none */
  afkEvents?: ActivityEvent[];
  mergeGapSeconds?: number;
  hostname?: string;
}

interface Piece {
  start: number;
  end: number;
  activeMs: number;
  context: EventContext;
  key: string;
  bucketId: string;
}

interface Building {
  start: number;
  end: number;
  durationMs: number;
  activeMs: number;
  context: EventContext;
  key: string;
  bucketId: string;
  eventCount: number;
}

function stringField(data: EventData, field: string): string | undefined {
  const value = data[field];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Pull the discriminating fields out of an event payload
 */
export function contextFromData(data: EventData): EventContext {
  const url = stringField(data, 'url');
  const file = stringField(data, 'file');
  const language = stringField(data, 'language');
  const project = stringField(data, 'project');

  let app = stringField(data, 'app');
  if (!app) {
    if (file || language) app = stringField(data, 'editor') ?? 'editor';
    else if (url) app = 'browser';
    else app = 'unknown';
  }

  const context: EventContext = {
    app,
    title: stringField(data, 'title') ?? file ?? '',
  };
  if (project) context.project = project;
  if (url) context.url = url;
  if (language) context.language = language;
  if (file) context.file = file;
  return context;
}

export function contextKey(context: EventContext): string {
  return JSON.stringify([
    context.app,
    context.title,
    context.project ?? '',
    context.url ?? '',
    context.file ?? '',
  ]);
}

function eventSpan(event: ActivityEvent): Span {
  const start = event.timestamp.getTime();
  return { start, end: start + event.duration * 1000 };
}

function statusSpans(events: ActivityEvent[], status: 'afk' | 'not-afk', range: TimeRange): Span[] {
  const rangeStart = range.start.getTime();
  const rangeEnd = range.end.getTime();
  return unionSpans(
    events
      .filter((e) => e.data.status === status)
      .map(eventSpan)
      .map((s) => ({ start: Math.max(s.start, rangeStart), end: Math.min(s.end, rangeEnd) }))
  );
}

/**
 * Normalize one host's events over a range
 */
export function normalize(events: ActivityEvent[], options: NormalizeOptions): NormalizationResult {
  const { range } = options;
  const rangeStart = range.start.getTime();
  const rangeEnd = range.end.getTime();
  const gapMs = (options.mergeGapSeconds ?? DEFAULT_MERGE_GAP_SECONDS) * 1000;
  const hostname = options.hostname ?? 'unknown';
  const warnings: string[] = [];

  const afkFiltered = options.afkEvents !== undefined;
  const notAfkSpans = options.afkEvents ? statusSpans(options.afkEvents, 'not-afk', range) : [];
  const afkSpans = options.afkEvents ? statusSpans(options.afkEvents, 'afk', range) : [];
  if (!afkFiltered) {
    warnings.push(
      `No AFK bucket for host "${hostname}": idle time cannot be excluded, all tracked time counts as active`
    );
  }

  // Clip to the range, order, and make pieces disjoint. A later event that
  // overlaps an earlier one loses the overlapping part.
  const ordered = events
    .filter((e) => e.duration > 0)
    .map((event) => ({ event, span: eventSpan(event) }))
    .map(({ event, span }) => ({
      event,
      start: Math.max(span.start, rangeStart),
      end: Math.min(span.end, rangeEnd),
    }))
    .filter((p) => p.end > p.start)
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const pieces: Piece[] = [];
  let cursor = Number.NEGATIVE_INFINITY;
  for (const { event, start, end } of ordered) {
    const clippedStart = Math.max(start, cursor);
    if (end <= clippedStart) continue;
    cursor = end;

    const context = contextFromData(event.data);
    const span = { start: clippedStart, end };
    pieces.push({
      start: clippedStart,
      end,
      activeMs: afkFiltered ? coveredMs(span, notAfkSpans) : end - clippedStart,
      context,
      key: contextKey(context),
      bucketId: event.bucketId,
    });
  }

  const building: Building[] = [];
  for (const piece of pieces) {
    const last = building[building.length - 1];
    if (last && last.key === piece.key && piece.start - last.end <= gapMs) {
      last.end = piece.end;
      last.durationMs += piece.end - piece.start;
      last.activeMs += piece.activeMs;
      last.eventCount += 1;
      continue;
    }
    building.push({
      start: piece.start,
      end: piece.end,
      durationMs: piece.end - piece.start,
      activeMs: piece.activeMs,
      context: piece.context,
      key: piece.key,
      bucketId: piece.bucketId,
      eventCount: 1,
    });
  }

  const intervals: NormalizedInterval[] = building.map((b) => ({
    start: new Date(b.start),
    end: new Date(b.end),
    context: b.context,
    hostname,
    bucketId: b.bucketId,
    durationSeconds: b.durationMs / 1000,
    activeSeconds: b.activeMs / 1000,
    active: b.activeMs > 0,
    eventCount: b.eventCount,
  }));

  return { range, intervals, afkFiltered, notAfkSpans, afkSpans, warnings };
}

export function totalActiveSeconds(intervals: NormalizedInterval[]): number {
  return intervals.reduce((sum, i) => sum + i.activeSeconds, 0);
}

/**
 * Combine per-host results. Intervals stay sorted by start; hosts used at
 * the same time each contribute their own time.
 */
export function mergeResults(range: TimeRange, results: NormalizationResult[]): NormalizationResult {
  return {
    range,
    intervals: results
      .flatMap((r) => r.intervals)
      .sort((a, b) => a.start.getTime() - b.start.getTime()),
    afkFiltered: results.length > 0 && results.every((r) => r.afkFiltered),
    notAfkSpans: unionSpans(results.flatMap((r) => r.notAfkSpans)),
    afkSpans: unionSpans(results.flatMap((r) => r.afkSpans)),
    warnings: results.flatMap((r) => r.warnings),
  };
}
