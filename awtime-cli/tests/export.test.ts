import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { EventStore } from '../src/collectors/eventStore.js';
import { ValidationError } from '../src/errors.js';
import {
  exportAll,
  exportRange,
  formatFromPath,
  parseCsv,
  parseExport,
  summarizeExport,
  toCsv,
  writeOutput,
  type ExportRecord,
} from '../src/export.js';
import { AFK, LAPTOP_BUCKETS, WINDOW, afkEvent, createFixtureDb, windowEvent, type Fixture } from './helpers/fixtureDb.js';

const range = {
  start: new Date('2026-03-02T09:00:00Z'),
  end: new Date('2026-03-02T10:00:00Z'),
};

describe('CSV', () => {
  it('quotes the data column and doubles embedded quotes', () => {
    const csv = toCsv([
      { bucket_id: 'b', timestamp: '2026-03-02T09:00:00.000Z', duration: 60, data: { app: 'Code' } },
    ]);

    expect(csv).toBe('bucket_id,timestamp,duration,data\nb,2026-03-02T09:00:00.000Z,60,"{""app"":""Code""}"\n');
  });

  it('reads back titles with quotes, commas and line breaks', () => {
    const records: ExportRecord[] = [
      {
        bucket_id: WINDOW,
        timestamp: '2026-03-02T09:00:00.000Z',
        duration: 12.5,
        data: { app: 'Mail', title: 'Re: "lunch", tomorrow\nok' },
      },
    ];

    expect(parseExport(toCsv(records), 'csv')).toEqual(records);
  });

  it('splits quoted fields and CRLF rows', () => {
    expect(parseCsv('a,"b,c"\r\n"d""e",f\r\n')).toEqual([
      ['a', 'b,c'],
      ['d"e', 'f'],
    ]);
    expect(() => parseCsv('a,"open')).toThrow(ValidationError);
  });

  it('rejects a foreign header', () => {
    expect(() => parseExport('id,when\n1,2\n', 'csv')).toThrow(ValidationError);
  });
});

describe('exporting from the store', () => {
  let fixture: Fixture;
  let store: EventStore;

  beforeAll(() => {
    fixture = createFixtureDb(LAPTOP_BUCKETS, [
      windowEvent('2026-03-02T09:00:00Z', 600, 'Code', 'main.ts'),
      windowEvent('2026-03-02T09:10:00Z', 300, 'Slack', 'general, random'),
      afkEvent('2026-03-02T09:00:00Z', 900, 'not-afk'),
      windowEvent('2026-03-03T09:00:00Z', 60, 'Code', 'next day'),
    ]);
    store = new EventStore(fixture.dbPath);
  });

  afterAll(() => {
    store.close();
    fixture.cleanup();
  });

  it('writes a JSON array of the range', () => {
    const records = parseExport(exportRange(store, range, { format: 'json' }).content, 'json');

    expect(records).toEqual([
      { bucket_id: WINDOW, timestamp: '2026-03-02T09:00:00.000Z', duration: 600, data: { app: 'Code', title: 'main.ts' } },
      { bucket_id: AFK, timestamp: '2026-03-02T09:00:00.000Z', duration: 900, data: { status: 'not-afk' } },
      {
        bucket_id: WINDOW,
        timestamp: '2026-03-02T09:10:00.000Z',
        duration: 300,
        data: { app: 'Slack', title: 'general, random' },
      },
    ]);
  });

  it('writes CSV for selected buckets', () => {
    const { content, count } = exportRange(store, range, { format: 'csv', bucketIds: [AFK] });

    expect(count).toBe(1);
    expect(content.split('\n')).toEqual([
      'bucket_id,timestamp,duration,data',
      `${AFK},2026-03-02T09:00:00.000Z,900,"{""status"":""not-afk""}"`,
      '',
    ]);
  });

  it('dumps every bucket and reads the dump back', () => {
    const dump = exportAll(store);

    expect(Object.keys(dump)).toEqual(['aw-watcher-vscode_laptop', AFK, WINDOW]);
    expect(dump[WINDOW].bucket).toEqual({
      id: WINDOW,
      type: 'currentwindow',
      client: 'aw-watcher-test',
      hostname: 'laptop',
      created: '2026-01-01T00:00:00.000Z',
    });
    expect(dump[WINDOW].events).toHaveLength(3);

    const summary = summarizeExport(parseExport(JSON.stringify(dump), 'json'));
    expect(summary.eventCount).toBe(4);
    expect(summary.buckets).toEqual([
      {
        bucketId: AFK,
        events: 1,
        totalDuration: 900,
        first: '2026-03-02T09:00:00.000Z',
        last: '2026-03-02T09:00:00.000Z',
      },
      {
        bucketId: WINDOW,
        events: 3,
        totalDuration: 960,
        first: '2026-03-02T09:00:00.000Z',
        last: '2026-03-03T09:00:00.000Z',
      },
    ]);
  });

  it('restricts the dump to one bucket type', () => {
    expect(Object.keys(exportAll(store, 'afkstatus'))).toEqual([AFK]);
  });

  it('rejects records with missing fields', () => {
    expect(() => parseExport('[{"bucket_id":"b","duration":1,"data":{}}]', 'json')).toThrow(
      'Invalid export record at index 0: timestamp: Required'
    );
    expect(() => parseExport('not json', 'json')).toThrow(ValidationError);
  });

  it('writes output files into new directories', () => {
    const target = path.join(fixture.dir, 'out', 'events.csv');
    const written = writeOutput(target, 'x\n');

    expect(written).toBe(target);
    expect(fs.readFileSync(target, 'utf-8')).toBe('x\n');
    expect(formatFromPath(target)).toBe('csv');
    expect(formatFromPath('events.JSON')).toBe('json');
  });
});
