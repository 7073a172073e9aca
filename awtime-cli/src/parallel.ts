/**
 * Parallel Activity
 *
 * Lines up the window, editor and browser streams of a host to show work
 * that happened side by side, such as files edited while another app had
 * focus.
 */

import type { ActivityEvent, TimeRange } from './types.js';

/** Window apps that are the editor itself, lowercased */
export const DEFAULT_EDITOR_APPS = ['code', 'code - insiders', 'cursor', 'vscodium'];

export const TIMELINE_LIMIT = 200;

// Window and browser events this short are watcher noise
const MIN_TIMELINE_SECONDS = 2;

export interface HostStreams {
  hostname: string;
  windows: ActivityEvent[];
  editor: ActivityEvent[];
  browser: ActivityEvent[];
}

export interface BackgroundEdit {
  timestamp: Date;
  hostname: string;
  file: string;
  language?: string;
  focusedApp: string;
  focusedTitle: string;
}

export interface BackgroundSummary {
  focusedApp: string;
  edits: number;
  files: string[];
}

export type TimelineSource = 'window' | 'editor' | 'browser';

export interface TimelineEntry {
  source: TimelineSource;
  timestamp: Date;
  seconds: number;
  /** App, language or page title */
  primary: string;
  /** Window title, file or url */
  secondary: string;
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function knownFile(event: ActivityEvent): string | null {
  const file = text(event.data.file);
  return file && file !== 'unknown' ? file : null;
}

function startsIn(event: ActivityEvent, range: TimeRange): boolean {
  const at = event.timestamp.getTime();
  return at >= range.start.getTime() && at < range.end.getTime();
}

/**
 * Editor events whose timestamp falls inside a window event of an app
 * other than the editor. The latest window starting at or before the edit
 * is the one in focus.
 */
export function findBackgroundEdits(
  streams: HostStreams,
  range: TimeRange,
  editorApps: string[] = DEFAULT_EDITOR_APPS
): BackgroundEdit[] {
  const editors = new Set(editorApps.map((app) => app.toLowerCase()));
  const windows = [...streams.windows].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const edits: BackgroundEdit[] = [];

  for (const event of streams.editor) {
    const file = knownFile(event);
    if (!file || !startsIn(event, range)) continue;

    const at = event.timestamp.getTime();
    let focused: ActivityEvent | undefined;
    for (const window of windows) {
      const start = window.timestamp.getTime();
      if (start > at) break;
      // Zero-length window events still cover their first second
      if (at < start + Math.max(window.duration, 1) * 1000) focused = window;
    }
    if (!focused) continue;

    const focusedApp = text(focused.data.app);
    if (editors.has(focusedApp.toLowerCase())) continue;

    const edit: BackgroundEdit = {
      timestamp: event.timestamp,
      hostname: streams.hostname,
      file,
      focusedApp,
      focusedTitle: text(focused.data.title),
    };
    const language = text(event.data.language);
    if (language) edit.language = language;
    edits.push(edit);
  }

  return edits.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Background edits per focused app, busiest first
 */
export function summarizeBackgroundEdits(edits: BackgroundEdit[]): BackgroundSummary[] {
  const byApp = new Map<string, { edits: number; files: Set<string>; order: number }>();
  for (const edit of edits) {
    const entry = byApp.get(edit.focusedApp);
    if (entry) {
      entry.edits += 1;
      entry.files.add(edit.file);
    } else {
      byApp.set(edit.focusedApp, { edits: 1, files: new Set([edit.file]), order: byApp.size });
    }
  }
  return [...byApp.entries()]
    .sort(([, a], [, b]) => b.edits - a.edits || a.order - b.order)
    .map(([focusedApp, entry]) => ({ focusedApp, edits: entry.edits, files: [...entry.files] }));
}

/**
 * Every stream interleaved by start time, earliest first
 */
export function buildTimeline(
  streams: HostStreams[],
  range: TimeRange,
  limit: number = TIMELINE_LIMIT
): TimelineEntry[] {
  const entries: TimelineEntry[] = [];
  const push = (source: TimelineSource, event: ActivityEvent, primary: unknown, secondary: unknown) => {
    entries.push({
      source,
      timestamp: event.timestamp,
      seconds: Math.round(event.duration * 10) / 10,
      primary: text(primary),
      secondary: text(secondary),
    });
  };

  for (const host of streams) {
    for (const event of host.windows) {
      if (startsIn(event, range) && event.duration > MIN_TIMELINE_SECONDS) {
        push('window', event, event.data.app, event.data.title);
      }
    }
    for (const event of host.editor) {
      if (startsIn(event, range) && knownFile(event)) {
        push('editor', event, event.data.language, event.data.file);
      }
    }
    for (const event of host.browser) {
      if (startsIn(event, range) && event.duration > MIN_TIMELINE_SECONDS) {
        push('browser', event, event.data.title, event.data.url);
      }
    }
  }

  return entries.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime()).slice(0, limit);
}
