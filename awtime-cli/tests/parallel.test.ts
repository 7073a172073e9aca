import { describe, expect, it } from 'vitest';
import { buildTimeline, findBackgroundEdits, summarizeBackgroundEdits, type HostStreams } from '../src/parallel.js';
import type { ActivityEvent, EventData } from '../src/types.js';

const day = {
  start: new Date('2026-03-02T00:00:00Z'),
  end: new Date('2026-03-03T00:00:00Z'),
};

let nextId = 1;
const event = (bucketId: string, time: string, duration: number, data: EventData): ActivityEvent => ({
  id: nextId++,
  bucketId,
  timestamp: new Date(`2026-03-02T${time}Z`),
  duration,
  data,
});

const window = (time: string, duration: number, app: string, title = '') =>
  event('aw-watcher-window_laptop', time, duration, { app, title });
const edit = (time: string, file: string, language = 'typescript') =>
  event('aw-watcher-vscode_laptop', time, 5, { file, language, project: 'svc' });

function streams(partial: Partial<HostStreams>): HostStreams {
  return { hostname: 'laptop', windows: [], editor: [], browser: [], ...partial };
}

describe('findBackgroundEdits', () => {
  it('keeps edits made while a non-editor window had focus', () => {
    const edits = findBackgroundEdits(
      streams({
        windows: [window('09:00:00', 600, 'Cursor'), window('09:10:00', 300, 'Zoom', 'Standup')],
        editor: [edit('09:05:00', 'a.ts'), edit('09:12:00', 'b.ts'), edit('09:20:00', 'c.ts')],
      }),
      day
    );

    expect(edits).toEqual([
      {
        timestamp: new Date('2026-03-02T09:12:00Z'),
        hostname: 'laptop',
        file: 'b.ts',
        language: 'typescript',
        focusedApp: 'Zoom',
        focusedTitle: 'Standup',
      },
    ]);
  });

  it('treats a zero-length window as covering its first second', () => {
    const edits = findBackgroundEdits(
      streams({
        windows: [window('09:00:00', 0, 'Terminal')],
        editor: [edit('09:00:00', 'a.ts'), edit('09:00:01', 'b.ts')],
      }),
      day
    );

    expect(edits.map((e) => e.file)).toEqual(['a.ts']);
  });

  it('skips unnamed files and edits outside the range', () => {
    const edits = findBackgroundEdits(
      streams({
        windows: [window('09:00:00', 3600, 'Slack')],
        editor: [edit('09:01:00', 'unknown'), edit('09:02:00', '')],
      }),
      { start: day.start, end: new Date('2026-03-02T09:01:30Z') }
    );

    expect(edits).toEqual([]);
  });
});

describe('summarizeBackgroundEdits', () => {
  it('groups by focused app with distinct files, busiest first', () => {
    const base = { timestamp: new Date('2026-03-02T09:00:00Z'), hostname: 'laptop', focusedTitle: '' };
    const summary = summarizeBackgroundEdits([
      { ...base, file: 'a.ts', focusedApp: 'Slack' },
      { ...base, file: 'b.ts', focusedApp: 'Zoom' },
      { ...base, file: 'c.ts', focusedApp: 'Zoom' },
      { ...base, file: 'b.ts', focusedApp: 'Zoom' },
    ]);

    expect(summary).toEqual([
      { focusedApp: 'Zoom', edits: 3, files: ['b.ts', 'c.ts'] },
      { focusedApp: 'Slack', edits: 1, files: ['a.ts'] },
    ]);
  });
});

describe('buildTimeline', () => {
  it('orders every stream by start and drops short window and tab events', () => {
    const timeline = buildTimeline(
      [
        streams({
          windows: [window('09:00:00', 2, 'Code'), window('09:01:00', 90.25, 'Code', 'a.ts')],
          editor: [edit('09:00:30', 'a.ts')],
          browser: [event('aw-watcher-web_laptop', '08:59:00', 30, { title: 'Docs', url: 'https://example.com' })],
        }),
      ],
      day
    );

    expect(timeline).toEqual([
      {
        source: 'browser',
        timestamp: new Date('2026-03-02T08:59:00Z'),
        seconds: 30,
        primary: 'Docs',
        secondary: 'https://example.com',
      },
      { source: 'editor', timestamp: new Date('2026-03-02T09:00:30Z'), seconds: 5, primary: 'typescript', secondary: 'a.ts' },
      { source: 'window', timestamp: new Date('2026-03-02T09:01:00Z'), seconds: 90.3, primary: 'Code', secondary: 'a.ts' },
    ]);
  });

  it('keeps the earliest entries up to the limit', () => {
    const timeline = buildTimeline(
      [streams({ windows: [window('10:00:00', 60, 'B'), window('09:00:00', 60, 'A'), window('11:00:00', 60, 'C')] })],
      day,
      2
    );

    expect(timeline.map((t) => t.primary)).toEqual(['A', 'B']);
  });
});
