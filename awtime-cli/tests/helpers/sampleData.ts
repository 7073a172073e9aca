import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  BROWSER,
  LAPTOP_BUCKETS,
  afkEvent,
  browserEvent,
  createFixtureDb,
  editorEvent,
  windowEvent,
  type Fixture,
} from './fixtureDb.js';

/**
 * Two tracked days on one laptop.
 *
 * 2026-03-02: 40 minutes in Code (three back-to-back events), then a
 * 10-minute Slack window while the user was away. Two editor heartbeats.
 *
 * 2026-03-03: 15 + 20 minutes in Code with a 5-minute AFK period between.
 *
 * The configuration defines project "awtime" (apps containing "code") and
 * tags 10:00-11:00 on 2026-03-02 to it.
 */
export function createSampleFixture(): Fixture {
  const fixture = createFixtureDb(LAPTOP_BUCKETS, [
    windowEvent('2026-03-02T09:00:00Z', 900, 'Code', 'main.ts'),
    windowEvent('2026-03-02T09:15:00Z', 300, 'Code', 'main.ts'),
    windowEvent('2026-03-02T09:20:00Z', 1200, 'Code', 'main.ts'),
    windowEvent('2026-03-02T10:00:00Z', 600, 'Slack', 'general'),
    afkEvent('2026-03-02T09:00:00Z', 3600, 'not-afk'),
    afkEvent('2026-03-02T10:00:00Z', 600, 'afk'),
    editorEvent('2026-03-02T09:05:00Z', 120, { language: 'typescript', file: 'main.ts', project: 'awtime' }),
    editorEvent('2026-03-02T09:30:00Z', 60, { language: 'unknown', file: 'notes.md', project: 'awtime' }),

    windowEvent('2026-03-03T09:00:00Z', 900, 'Code', 'a.ts'),
    windowEvent('2026-03-03T09:20:00Z', 1200, 'Code', 'a.ts'),
    afkEvent('2026-03-03T09:00:00Z', 900, 'not-afk'),
    afkEvent('2026-03-03T09:15:00Z', 300, 'afk'),
    afkEvent('2026-03-03T09:20:00Z', 1200, 'not-afk'),
  ]);

  fs.mkdirSync(path.dirname(fixture.configPath), { recursive: true });
  fs.writeFileSync(
    fixture.configPath,
    JSON.stringify({
      projects: { awtime: { rules: { app_patterns: ['code'] } } },
      manual_tags: [
        {
          id: 'tag-1',
          start: '2026-03-02T10:00:00.000Z',
          end: '2026-03-02T11:00:00.000Z',
          project: 'awtime',
          notes: 'planning',
        },
      ],
    })
  );
  return fixture;
}

/**
 * One day with edits made while other apps had focus.
 *
 * 2026-03-02: Code 09:00-09:30, Firefox 09:30-09:40, away until 11:00, then
 * Slack 11:00-11:20. Editor heartbeats at 09:10 (in Code), 09:35 and 09:38
 * (in Firefox), 11:05 (in Slack) and an unnamed file at 11:10. A browser tab
 * alongside Firefox and a one-second tab that is too short to list.
 */
export function createParallelFixture(): Fixture {
  return createFixtureDb(
    [...LAPTOP_BUCKETS, { id: BROWSER, type: 'web.tab.current' }],
    [
      windowEvent('2026-03-02T09:00:00Z', 1800, 'Code', 'api.ts'),
      windowEvent('2026-03-02T09:30:00Z', 600, 'Firefox', 'Docs'),
      windowEvent('2026-03-02T11:00:00Z', 1200, 'Slack', 'general'),
      afkEvent('2026-03-02T09:00:00Z', 2400, 'not-afk'),
      afkEvent('2026-03-02T09:40:00Z', 4800, 'afk'),
      afkEvent('2026-03-02T11:00:00Z', 1200, 'not-afk'),
      editorEvent('2026-03-02T09:10:00Z', 30, { language: 'typescript', file: 'src/api.ts', project: 'svc' }),
      editorEvent('2026-03-02T09:35:00Z', 20, { language: 'typescript', file: 'src/api.ts', project: 'svc' }),
      editorEvent('2026-03-02T09:38:00Z', 10, { language: 'markdown', file: 'docs/README.md', project: 'svc' }),
      editorEvent('2026-03-02T11:05:00Z', 5, { language: 'typescript', file: 'src/db.ts', project: 'svc' }),
      editorEvent('2026-03-02T11:10:00Z', 5, { language: 'unknown', file: 'unknown', project: 'svc' }),
      browserEvent('2026-03-02T09:30:00Z', 600, 'Docs', 'https://example.com/docs'),
      browserEvent('2026-03-02T09:45:00Z', 1, 'Other', 'https://example.com/other'),
    ]
  );
}

export const MARCH_2 = {
  start: new Date('2026-03-02T00:00:00Z'),
  end: new Date('2026-03-03T00:00:00Z'),
};

export const MARCH_3 = {
  start: new Date('2026-03-03T00:00:00Z'),
  end: new Date('2026-03-04T00:00:00Z'),
};
