import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { TimeAnalyzer } from '../src/analyzer.js';
import { EventStore } from '../src/collectors/eventStore.js';
import { NotFoundError, ValidationError } from '../src/errors.js';
import { setLogLevel } from '../src/logger.js';
import { ConfigStore } from '../src/userConfig.js';
import { AFK, WINDOW, afkEvent, createFixtureDb, windowEvent, type Fixture } from './helpers/fixtureDb.js';
import { MARCH_2, MARCH_3, createParallelFixture, createSampleFixture } from './helpers/sampleData.js';

describe('TimeAnalyzer', () => {
  let fixture: Fixture;
  let store: EventStore;
  let analyzer: TimeAnalyzer;

  beforeAll(() => {
    setLogLevel('error');
    fixture = createSampleFixture();
    store = new EventStore(fixture.dbPath);
    analyzer = new TimeAnalyzer(store, new ConfigStore(fixture.configPath).load(), {
      now: () => new Date('2026-03-03T12:00:00Z'),
    });
  });

  afterAll(() => {
    store.close();
    fixture.cleanup();
  });

  it('summarizes a day', () => {
    const summary = analyzer.dailySummary(new Date('2026-03-02T15:00:00Z'));

    expect(summary.date).toBe('2026-03-02');
    expect(summary.afkFiltered).toBe(true);
    expect(summary.warnings).toEqual([]);
    expect(summary.active).toEqual({ activeSeconds: 2400, afkSeconds: 600, activePct: 80 });
    expect(summary.apps.top).toEqual([{ key: 'Code', seconds: 2400, app: 'Code' }]);
    expect(summary.titles.top).toEqual([{ key: 'Code — main.ts', seconds: 2400, app: 'Code', title: 'main.ts' }]);
    expect(summary.hours.groups).toEqual([{ key: '2026-03-02 09:00', seconds: 2400 }]);
  });

  it('collects editor languages, files and projects', () => {
    const editor = analyzer.editorActivity(MARCH_2);

    expect(editor.eventCount).toBe(2);
    expect(editor.languages).toEqual([{ key: 'typescript', seconds: 120, events: 1 }]);
    expect(editor.files).toEqual([
      { key: 'main.ts', seconds: 120, events: 1 },
      { key: 'notes.md', seconds: 60, events: 1 },
    ]);
    expect(editor.projects).toEqual([{ key: 'awtime', seconds: 180, events: 2 }]);
  });

  it('summarizes a Monday-to-Sunday week', () => {
    const summary = analyzer.weeklySummary(new Date('2026-03-04T12:00:00Z'));

    expect(summary.weekStart).toBe('2026-03-02');
    expect(summary.weekEnd).toBe('2026-03-08');
    expect(summary.days).toHaveLength(7);
    expect(summary.days.slice(0, 3)).toEqual([
      { date: '2026-03-02', seconds: 2400 },
      { date: '2026-03-03', seconds: 2100 },
      { date: '2026-03-04', seconds: 0 },
    ]);
    expect(summary.active).toEqual({ activeSeconds: 4500, afkSeconds: 900, activePct: 83.3 });
  });

  it('groups a range by day', () => {
    const summary = analyzer.rangeSummary({ start: MARCH_2.start, end: MARCH_3.end }, 'day');

    expect(summary.aggregation.groups).toEqual([
      { key: '2026-03-02', seconds: 2400 },
      { key: '2026-03-03', seconds: 2100 },
    ]);
  });

  it('reports one app over recent days', () => {
    const usage = analyzer.appUsage(2, 'code');

    expect(usage.app).toBe('code');
    expect(usage.totalSeconds).toBe(4500);
    expect(usage.daily).toEqual([
      { date: '2026-03-02', seconds: 2400 },
      { date: '2026-03-03', seconds: 2100 },
    ]);
    expect(usage.titles.map((t) => [t.title, t.seconds])).toEqual([
      ['main.ts', 2400],
      ['a.ts', 2100],
    ]);
  });

  it('finds a focus session with its top apps', () => {
    const report = analyzer.focusSessions(MARCH_2, 30);

    expect(report.sessions).toHaveLength(1);
    expect(report.sessions[0].hostname).toBe('laptop');
    expect(report.sessions[0].durationSeconds).toBe(2400);
    expect(report.sessions[0].topApps).toEqual([{ key: 'Code', seconds: 2400, app: 'Code' }]);
    expect(report.totalSeconds).toBe(2400);
  });

  it('splits focus at AFK periods', () => {
    expect(analyzer.focusSessions(MARCH_3, 30).sessions).toEqual([]);
    expect(analyzer.focusSessions(MARCH_3, 15).sessions.map((s) => s.durationSeconds)).toEqual([900, 1200]);
    expect(() => analyzer.focusSessions(MARCH_3, 0)).toThrow(ValidationError);
  });

  it('classifies productivity with the default categories', () => {
    const summary = analyzer.productivity(MARCH_2);

    expect(summary.productiveSeconds).toBe(2400);
    expect(summary.percentages).toEqual({ productive: 100, neutral: 0, distracting: 0 });
  });

  it('adds manual tags to rule-matched project time', () => {
    const time = analyzer.projectTime('awtime', MARCH_2);

    expect(time.ruleBasedSeconds).toBe(2400);
    expect(time.manualSeconds).toBe(3600);
    expect(time.totalSeconds).toBe(6000);
    expect(() => analyzer.projectTime('nope', MARCH_2)).toThrow(NotFoundError);
  });
});

describe('TimeAnalyzer across hosts', () => {
  let fixture: Fixture;
  let store: EventStore;

  beforeAll(() => {
    setLogLevel('error');
    fixture = createFixtureDb(
      [
        { id: WINDOW, type: 'currentwindow' },
        { id: AFK, type: 'afkstatus' },
        { id: 'aw-watcher-window_desktop', type: 'currentwindow', hostname: 'desktop' },
      ],
      [
        windowEvent('2026-03-02T09:00:00Z', 600, 'Code', 'main.ts'),
        afkEvent('2026-03-02T09:00:00Z', 600, 'not-afk'),
        { bucket: 'aw-watcher-window_desktop', at: '2026-03-02T09:05:00Z', duration: 600, data: { app: 'Firefox', title: 'Docs' } },
      ]
    );
    store = new EventStore(fixture.dbPath);
  });

  afterAll(() => {
    store.close();
    fixture.cleanup();
  });

  const analyzerFor = (host?: string) =>
    new TimeAnalyzer(store, new ConfigStore(fixture.configPath).load(), { host });

  it('adds up each host and warns about the one without AFK data', () => {
    const result = analyzerFor().activeTime(MARCH_2);

    expect(result.activeSeconds).toBe(1200);
    expect(result.afkFiltered).toBe(false);
    expect(result.warnings).toEqual([
      'No AFK bucket for host "desktop": idle time cannot be excluded, all tracked time counts as active',
    ]);
  });

  it('restricts analysis to one host', () => {
    const laptop = analyzerFor('laptop').activeTime(MARCH_2);
    expect(laptop.activeSeconds).toBe(600);
    expect(laptop.warnings).toEqual([]);

    const missing = analyzerFor('server').activeTime(MARCH_2);
    expect(missing.activeSeconds).toBe(0);
    expect(missing.warnings).toEqual(['No window buckets found for host "server"']);
  });
});

describe('TimeAnalyzer focus with a window watcher that keeps reporting while idle', () => {
  let fixture: Fixture;
  let store: EventStore;
  let analyzer: TimeAnalyzer;

  beforeAll(() => {
    setLogLevel('error');
    fixture = createFixtureDb(
      [
        { id: WINDOW, type: 'currentwindow' },
        { id: AFK, type: 'afkstatus' },
      ],
      [
        windowEvent('2026-03-02T09:00:00Z', 900, 'Code', 'a.ts'),
        windowEvent('2026-03-02T09:15:00Z', 300, 'Code', 'a.ts'),
        windowEvent('2026-03-02T09:20:00Z', 1200, 'Code', 'a.ts'),
        afkEvent('2026-03-02T09:00:00Z', 900, 'not-afk'),
        afkEvent('2026-03-02T09:15:00Z', 300, 'afk'),
        afkEvent('2026-03-02T09:20:00Z', 1200, 'not-afk'),
      ]
    );
    store = new EventStore(fixture.dbPath);
    analyzer = new TimeAnalyzer(store, new ConfigStore(fixture.configPath).load());
  });

  afterAll(() => {
    store.close();
    fixture.cleanup();
  });

  it('merges the window events into one interval with only the not-afk time active', () => {
    const { intervals } = analyzer.normalizeRange(MARCH_2);

    expect(intervals).toHaveLength(1);
    expect(intervals[0].durationSeconds).toBe(2400);
    expect(intervals[0].activeSeconds).toBe(2100);
  });

  it('ends a session at an AFK period inside that interval', () => {
    expect(analyzer.focusSessions(MARCH_2, 30).sessions).toEqual([]);

    const sessions = analyzer.focusSessions(MARCH_2, 15).sessions;
    expect(sessions.map((s) => [s.start.toISOString(), s.durationSeconds])).toEqual([
      ['2026-03-02T09:00:00.000Z', 900],
      ['2026-03-02T09:20:00.000Z', 1200],
    ]);
  });
});

describe('TimeAnalyzer parallel work', () => {
  let fixture: Fixture;
  let store: EventStore;
  let analyzer: TimeAnalyzer;

  beforeAll(() => {
    setLogLevel('error');
    fixture = createParallelFixture();
    store = new EventStore(fixture.dbPath);
    analyzer = new TimeAnalyzer(store, new ConfigStore(fixture.configPath).load());
  });

  afterAll(() => {
    store.close();
    fixture.cleanup();
  });

  it('finds editor work done while another app had focus', () => {
    const parallel = analyzer.parallelActivities(MARCH_2);

    expect(parallel.backgroundEdits.map((e) => [e.timestamp.toISOString(), e.file, e.focusedApp])).toEqual([
      ['2026-03-02T09:35:00.000Z', 'src/api.ts', 'Firefox'],
      ['2026-03-02T09:38:00.000Z', 'docs/README.md', 'Firefox'],
      ['2026-03-02T11:05:00.000Z', 'src/db.ts', 'Slack'],
    ]);
    expect(parallel.summary).toEqual([
      { focusedApp: 'Firefox', edits: 2, files: ['src/api.ts', 'docs/README.md'] },
      { focusedApp: 'Slack', edits: 1, files: ['src/db.ts'] },
    ]);
  });

  it('interleaves the window, editor and browser streams', () => {
    const { timeline } = analyzer.parallelActivities(MARCH_2);

    expect(timeline.map((t) => [t.timestamp.toISOString().slice(11, 16), t.source, t.primary])).toEqual([
      ['09:00', 'window', 'Code'],
      ['09:10', 'editor', 'typescript'],
      ['09:30', 'window', 'Firefox'],
      ['09:30', 'browser', 'Docs'],
      ['09:35', 'editor', 'typescript'],
      ['09:38', 'editor', 'markdown'],
      ['11:00', 'window', 'Slack'],
      ['11:05', 'editor', 'typescript'],
    ]);
    expect(timeline[3].secondary).toBe('https://example.com/docs');
  });

  it('gathers a day story', () => {
    const story = analyzer.activityStory(new Date('2026-03-02T12:00:00Z'));

    expect(story.date).toBe('2026-03-02');
    expect(story.active).toEqual({ activeSeconds: 3600, afkSeconds: 4800, activePct: 42.9 });
    expect(story.hourly).toEqual([
      { hour: '09:00', seconds: 2400, topApp: 'Code' },
      { hour: '11:00', seconds: 1200, topApp: 'Slack' },
    ]);
    expect(story.workBlocks).toEqual([
      { startHour: 9, endHour: 9 },
      { startHour: 11, endHour: 11 },
    ]);
    expect(story.focus.map((s) => [s.context.app, s.durationSeconds])).toEqual([
      ['Code', 1800],
      ['Slack', 1200],
    ]);
    expect(story.parallel.backgroundEdits).toHaveLength(3);
  });
});
