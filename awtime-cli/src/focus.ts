/**
 * Focus Session Detector
 *
 * Finds sustained runs of active time in one app (or one editor project).
 * Short detours into other apps are tolerated; going idle is not.
 */

import { spansIntersect, unionSpans } from './time.js';
import type { EventContext, FocusSession, NormalizedInterval, Span } from './types.js';

export const DEFAULT_MIN_FOCUS_MINUTES = 30;
export const DEFAULT_FOCUS_TOLERANCE_SECONDS = 5 * 60;

export interface FocusOptions {
  minMinutes?: number;
  toleranceSeconds?: number;
  /** Idle periods; one falling inside or between intervals ends the session */
  breaks?: Span[];
}

interface OpenSession {
  key: string;
  context: EventContext;
  start: number;
  end: number;
  seconds: number;
  count: number;
}

export function focusKey(context: EventContext): string {
  return context.project ? `${context.app}::${context.project}` : context.app;
}

function focusContext(context: EventContext): EventContext {
  return context.project
    ? { app: context.app, title: context.project, project: context.project }
    : { app: context.app, title: '' };
}

/**
 * Cut an interval around the idle periods inside it. Its active time is
 * shared out over the remaining pieces by length.
 */
function splitAtBreaks(interval: NormalizedInterval, breaks: Span[]): NormalizedInterval[] {
  const span: Span = { start: interval.start.getTime(), end: interval.end.getTime() };
  const inside = breaks.filter((b) => spansIntersect(b, span));
  if (inside.length === 0) return [interval];

  const pieces: Span[] = [];
  let cursor = span.start;
  for (const idle of unionSpans(inside)) {
    if (idle.start > cursor) pieces.push({ start: cursor, end: idle.start });
    cursor = Math.max(cursor, idle.end);
  }
  if (cursor < span.end) pieces.push({ start: cursor, end: span.end });

  const keptMs = pieces.reduce((sum, p) => sum + (p.end - p.start), 0);
  return pieces.map((piece) => {
    const ms = piece.end - piece.start;
    const activeSeconds = keptMs > 0 ? (interval.activeSeconds * ms) / keptMs : 0;
    return {
      ...interval,
      start: new Date(piece.start),
      end: new Date(piece.end),
      durationSeconds: ms / 1000,
      activeSeconds,
      active: activeSeconds > 0,
    };
  });
}

export function detectSessions(
  intervals: NormalizedInterval[],
  options: FocusOptions = {}
): FocusSession[] {
  const minSeconds = (options.minMinutes ?? DEFAULT_MIN_FOCUS_MINUTES) * 60;
  const toleranceMs = (options.toleranceSeconds ?? DEFAULT_FOCUS_TOLERANCE_SECONDS) * 1000;
  const breaks = options.breaks ?? [];

  const sessions: FocusSession[] = [];
  const state: { current: OpenSession | null; detours: NormalizedInterval[] } = {
    current: null,
    // Intervals skipped as detours since the session last grew
    detours: [],
  };

  const close = () => {
    const current = state.current;
    if (current && current.seconds >= minSeconds) {
      sessions.push({
        start: new Date(current.start),
        end: new Date(current.end),
        context: current.context,
        durationSeconds: current.seconds,
        intervalCount: current.count,
      });
    }
    state.current = null;
    state.detours = [];
  };

  const open = (interval: NormalizedInterval, key: string, pending: NormalizedInterval[] = []) => {
    // Trailing detours into the new target start the new session
    let seeds: NormalizedInterval[] = [];
    for (let i = pending.length - 1; i >= 0; i--) {
      const detour = pending[i];
      if (focusKey(detour.context) !== key) break;
      seeds = [detour, ...seeds];
    }
    const first = seeds[0] ?? interval;
    state.current = {
      key,
      context: focusContext(interval.context),
      start: first.start.getTime(),
      end: interval.end.getTime(),
      seconds: [...seeds, interval].reduce((sum, i) => sum + i.activeSeconds, 0),
      count: seeds.length + 1,
    };
    state.detours = [];
  };

  const chronological = intervals
    .flatMap((interval) => splitAtBreaks(interval, breaks))
    .sort((a, b) => a.start.getTime() - b.start.getTime());

  for (const interval of chronological) {
    if (!interval.active) {
      close();
      continue;
    }

    const key = focusKey(interval.context);
    const start = interval.start.getTime();
    const end = interval.end.getTime();

    const session = state.current;
    if (session === null) {
      open(interval, key);
      continue;
    }

    const gap: Span = { start: session.end, end: start };
    if (gap.end > gap.start && breaks.some((b) => spansIntersect(b, gap))) {
      close();
      open(interval, key);
      continue;
    }

    if (key === session.key && start - session.end <= toleranceMs) {
      session.end = Math.max(session.end, end);
      session.seconds += interval.activeSeconds;
      session.count += 1;
      state.detours = [];
      continue;
    }

    if (key !== session.key && end - session.end <= toleranceMs) {
      state.detours.push(interval);
      continue;
    }

    const pending = state.detours;
    close();
    open(interval, key, pending);
  }

  close();
  return sessions;
}
