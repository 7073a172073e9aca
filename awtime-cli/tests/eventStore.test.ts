import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { EventStore } from '../src/collectors/eventStore.js';
import { NotFoundError, StoreUnavailableError, ValidationError } from '../src/errors.js';
import { resolveDbPath } from '../src/settings.js';
import {
  AFK,
  EDITOR,
  LAPTOP_BUCKETS,
  WINDOW,
  afkEvent,
  createFixtureDb,
  editorEvent,
  tempDir,
  windowEvent,
  type Fixture,
} from './helpers/fixtureDb.js';

const range = {
  start: new Date('2026-03-02T09:00:00Z'),
  end: new Date('2026-03-02T10:00:00Z'),
};

describe('EventStore', () => {
  let fixture: Fixture;
  let store: EventStore;

  beforeAll(() => {
    fixture = createFixtureDb(LAPTOP_BUCKETS, [
      windowEvent('2026-03-02T08:55:00Z', 600, 'Code', 'w1'),
      windowEvent('2026-03-02T09:05:00Z', 600, 'Code', 'w2'),
      windowEvent('2026-03-02T09:15:00Z', 1200, 'Firefox', 'w3'),
      windowEvent('2026-03-02T11:00:00Z', 300, 'Slack', 'w4'),
      afkEvent('2026-03-02T09:00:00Z', 3600, 'not-afk'),
      editorEvent('2026-03-02T08:59:59Z', 0, { language: 'typescript', file: 'early.ts', project: 'awtime' }),
      editorEvent('2026-03-02T09:30:00Z', 0, { language: 'typescript', file: 'cli.ts', project: 'awtime' }),
    ]);
    store = new EventStore(fixture.dbPath);
  });

  afterAll(() => {
    store.close();
    fixture.cleanup();
  });

  const titles = (events: { data: Record<string, unknown> }[]) => events.map((e) => e.data.title);

  it('lists buckets newest first with event counts', () => {
    const buckets = store.listBuckets();

    expect(buckets.map((b) => [b.id, b.eventCount])).toEqual([
      [EDITOR, 2],
      [AFK, 1],
      [WINDOW, 4],
    ]);
    expect(buckets[2].hostname).toBe('laptop');
    expect(buckets[2].created.toISOString()).toBe('2026-01-01T00:00:00.000Z');
    expect(buckets[2].firstEvent?.toISOString()).toBe('2026-03-02T08:55:00.000Z');
    expect(store.listBuckets('afkstatus').map((b) => b.id)).toEqual([AFK]);
  });

  it('returns events overlapping a range in ascending order', () => {
    const events = store.getEvents(WINDOW, { start: range.start, end: range.end });

    expect(titles(events)).toEqual(['w1', 'w2', 'w3']);
    expect(events[0].timestamp.toISOString()).toBe('2026-03-02T08:55:00.000Z');
    expect(events[0].duration).toBe(600);
  });

  it('counts zero-length events only from the start of the range', () => {
    const events = store.getEvents(EDITOR, { start: range.start, end: range.end });

    expect(events.map((e) => e.data.file)).toEqual(['cli.ts']);
  });

  it('keeps the most recent events when limited', () => {
    expect(titles(store.getEvents(WINDOW, { limit: 2 }))).toEqual(['w3', 'w4']);
    expect(titles(store.getEvents(WINDOW, { start: range.start, end: range.end, limit: 1 }))).toEqual(['w3']);
  });

  it('rejects a non-positive limit and unknown buckets', () => {
    expect(() => store.getEvents(WINDOW, { limit: 0 })).toThrow(ValidationError);
    expect(() => store.getEvents('nope')).toThrow(NotFoundError);
    expect(() => store.getBucketInfo('nope')).toThrow('Bucket not found: nope');
  });

  it('describes a bucket with newest sample events first', () => {
    const info = store.getBucketInfo(WINDOW);

    expect(info.eventCount).toBe(4);
    expect(info.totalDuration).toBe(2700);
    expect(info.firstEvent?.toISOString()).toBe('2026-03-02T08:55:00.000Z');
    expect(info.lastEvent?.toISOString()).toBe('2026-03-02T11:00:00.000Z');
    expect(titles(info.sampleEvents)).toEqual(['w4', 'w3', 'w2', 'w1']);
  });

  it('groups events by bucket type and host', () => {
    const laptop = store.getEventsByType('currentwindow', range, 'laptop');
    expect([...laptop.keys()].map((b) => b.id)).toEqual([WINDOW]);
    expect(store.getEventsByType('currentwindow', range, 'desktop').size).toBe(0);
  });

  it('exports events of all buckets in time order', () => {
    const events = store.exportEvents(range);

    expect(events.map((e) => e.bucketId)).toEqual([WINDOW, AFK, WINDOW, WINDOW, EDITOR]);
    expect(store.exportEvents(range, [AFK])).toHaveLength(1);
  });

  it('runs read-only SQL', () => {
    expect(store.runSql('SELECT COUNT(*) AS n FROM eventmodel')).toEqual({ columns: ['n'], rows: [{ n: 7 }] });
    expect(() => store.runSql('DELETE FROM eventmodel')).toThrow(ValidationError);
    expect(() => store.runSql('SELEC 1')).toThrow(ValidationError);
  });

  it('summarizes the database', () => {
    const info = store.info();

    expect(info.path).toBe(fixture.dbPath);
    expect(info.bucketCount).toBe(3);
    expect(info.eventCount).toBe(7);
    expect(info.hostnames).toEqual(['laptop']);
    expect(info.firstEvent?.toISOString()).toBe('2026-03-02T08:55:00.000Z');
    expect(info.lastEvent?.toISOString()).toBe('2026-03-02T11:00:00.000Z');
  });
});

describe('opening the store', () => {
  let dir: string;

  beforeAll(() => {
    dir = tempDir();
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('fails when the file is missing', () => {
    expect(() => new EventStore(path.join(dir, 'missing.db'))).toThrow(StoreUnavailableError);
    expect(() => EventStore.open({ ACTIVITYWATCH_DB_PATH: path.join(dir, 'missing.db') })).toThrow(
      StoreUnavailableError
    );
  });

  it('fails when the database has no ActivityWatch tables', () => {
    const dbPath = path.join(dir, 'empty.db');
    const db = new Database(dbPath);
    db.exec('CREATE TABLE unrelated (id INTEGER)');
    db.close();

    expect(() => new EventStore(dbPath)).toThrow(
      `${dbPath} is not an aw-server database (missing tables: bucketmodel, eventmodel)`
    );
  });

  it.skipIf(process.platform === 'darwin' || process.platform === 'win32')(
    'finds the database under the XDG data directory',
    () => {
      const dbPath = path.join(dir, 'activitywatch', 'aw-server-rust', 'sqlite.db');
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      fs.writeFileSync(dbPath, '');

      expect(resolveDbPath({ XDG_DATA_HOME: dir })).toBe(dbPath);
    }
  );
});
