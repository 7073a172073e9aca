/**
 * Event Store
 *
 * Read-only access to the ActivityWatch server database. Buckets and
 * events are read straight from SQLite; nothing is ever written.
 */

import Database from 'better-sqlite3';
import { NotFoundError, StoreUnavailableError, ValidationError } from '../errors.js';
import { logger } from '../logger.js';
import { resolveDbPath } from '../settings.js';
import { parseStoreTimestamp, toStoreTimestamp } from '../time.js';
import type {
  ActivityEvent,
  Bucket,
  BucketInfo,
  BucketSummary,
  BucketType,
  EventData,
  TimeRange,
} from '../types.js';

interface BucketRow {
  key: number;
  id: string;
  created: string;
  type: string;
  client: string | null;
  hostname: string | null;
}

interface BucketStatsRow extends BucketRow {
  event_count: number;
  first_ts: string | null;
  last_ts: string | null;
  total_duration: number | null;
}

interface EventRow {
  id: number;
  bucket: string;
  timestamp: string;
  duration: number;
  datastr: string | null;
}

export interface EventQuery {
  start?: Date;
  end?: Date;
  limit?: number;
}

export interface StoreInfo {
  path: string;
  bucketCount: number;
  eventCount: number;
  hostnames: string[];
  firstEvent?: Date;
  lastEvent?: Date;
}

export interface SqlResult {
  columns: string[];
  rows: unknown[];
}

const REQUIRED_TABLES = ['bucketmodel', 'eventmodel'];
const SAMPLE_SIZE = 5;

// One second of slack in julianday units; the exact overlap test runs in JS
const SLACK_DAYS = 1 / 86400;

const EVENT_COLUMNS = `
  e.id AS id, b.id AS bucket, e.timestamp AS timestamp,
  e.duration AS duration, e.datastr AS datastr
`;

function isRecord(value: unknown): value is EventData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseData(datastr: string | null, eventId: number): EventData {
  if (!datastr) return {};
  try {
    const parsed: unknown = JSON.parse(datastr);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    logger.debug(`Event ${eventId} has unreadable data:`, error instanceof Error ? error.message : error);
    return {};
  }
}

function toDate(text: string | null): Date | undefined {
  if (!text) return undefined;
  return parseStoreTimestamp(text) ?? undefined;
}

function toBucket(row: BucketRow): Bucket {
  return {
    id: row.id,
    type: row.type,
    client: row.client ?? '',
    hostname: row.hostname ?? 'unknown',
    created: toDate(row.created) ?? new Date(0),
  };
}

function overlapsQuery(event: ActivityEvent, query: EventQuery): boolean {
  const start = event.timestamp.getTime();
  const end = start + event.duration * 1000;
  if (query.end && start >= query.end.getTime()) return false;
  if (!query.start) return true;
  const bound = query.start.getTime();
  // Zero-length events count when they fall inside the range
  return event.duration === 0 ? start >= bound : end > bound;
}

export class EventStore {
  private readonly db: Database.Database;

  constructor(readonly dbPath: string) {
    try {
      this.db = new Database(dbPath, { readonly: true, fileMustExist: true });
    } catch (error) {
      throw new StoreUnavailableError(
        `Cannot open ActivityWatch database at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    let tables: string[];
    try {
      tables = this.db
        .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table'`)
        .all()
        .map((row) => row.name);
    } catch (error) {
      this.db.close();
      throw new StoreUnavailableError(
        `${dbPath} is not a readable SQLite database: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const missing = REQUIRED_TABLES.filter((t) => !tables.includes(t));
    if (missing.length > 0) {
      this.db.close();
      throw new StoreUnavailableError(
        `${dbPath} is not an aw-server database (missing tables: ${missing.join(', ')})`
      );
    }

    logger.debug('Opened event store', dbPath);
  }

  /**
   * Open the database found by settings discovery
   */
  static open(env: NodeJS.ProcessEnv = process.env): EventStore {
    return new EventStore(resolveDbPath(env));
  }

  close(): void {
    this.db.close();
  }

  listBuckets(type?: BucketType): BucketSummary[] {
    const rows = this.db
      .prepare<unknown[], BucketStatsRow>(
        `
        SELECT b.key, b.id, b.created, b.type, b.client, b.hostname,
               COUNT(e.id) AS event_count,
               MIN(e.timestamp) AS first_ts,
               MAX(e.timestamp) AS last_ts,
               SUM(e.duration) AS total_duration
        FROM bucketmodel b
        LEFT JOIN eventmodel e ON e.bucket_id = b.key
        ${type ? 'WHERE b.type = ?' : ''}
        GROUP BY b.key
        ORDER BY b.created DESC, b.id ASC
      `
      )
      .all(...(type ? [type] : []));

    return rows.map((row) => {
      const summary: BucketSummary = { ...toBucket(row), eventCount: row.event_count };
      const first = toDate(row.first_ts);
      const last = toDate(row.last_ts);
      if (first) summary.firstEvent = first;
      if (last) summary.lastEvent = last;
      return summary;
    });
  }

  getBucketInfo(bucketId: string): BucketInfo {
    const row = this.bucketRow(bucketId);
    const stats = this.db
      .prepare<[number], { event_count: number; first_ts: string | null; last_ts: string | null; total: number | null }>(
        `
        SELECT COUNT(*) AS event_count, MIN(timestamp) AS first_ts,
               MAX(timestamp) AS last_ts, SUM(duration) AS total
        FROM eventmodel WHERE bucket_id = ?
      `
      )
      .get(row.key);

    const info: BucketInfo = {
      bucket: toBucket(row),
      eventCount: stats?.event_count ?? 0,
      totalDuration: stats?.total ?? 0,
      // Newest first
      sampleEvents: this.getEvents(bucketId, { limit: SAMPLE_SIZE }).reverse(),
    };
    const first = toDate(stats?.first_ts ?? null);
    const last = toDate(stats?.last_ts ?? null);
    if (first) info.firstEvent = first;
    if (last) info.lastEvent = last;
    return info;
  }

  /**
   * Events of one bucket in ascending time order. Events that started
   * before `start` but run into the range are included. With a limit, the
   * most recent events are kept.
   */
  getEvents(bucketId: string, query: EventQuery = {}): ActivityEvent[] {
    const row = this.bucketRow(bucketId);
    if (query.limit !== undefined && (!Number.isInteger(query.limit) || query.limit < 1)) {
      throw new ValidationError(`Limit must be a positive integer, got ${query.limit}`);
    }

    const conditions = ['e.bucket_id = ?'];
    const params: unknown[] = [row.key];
    if (query.end) {
      conditions.push('julianday(e.timestamp) < julianday(?) + ?');
      params.push(toStoreTimestamp(query.end), SLACK_DAYS);
    }
    if (query.start) {
      conditions.push('julianday(e.timestamp) + (e.duration + 1) / 86400.0 > julianday(?)');
      params.push(toStoreTimestamp(query.start));
    }

    const ranged = query.start !== undefined || query.end !== undefined;
    const limitClause = !ranged && query.limit !== undefined ? 'LIMIT ?' : '';
    if (limitClause) params.push(query.limit);

    const rows = this.db
      .prepare<unknown[], EventRow>(
        `
        SELECT ${EVENT_COLUMNS}
        FROM eventmodel e JOIN bucketmodel b ON b.key = e.bucket_id
        WHERE ${conditions.join(' AND ')}
        ORDER BY e.timestamp DESC, e.id DESC
        ${limitClause}
      `
      )
      .all(...params);

    let events = this.toEvents(rows);
    if (ranged) events = events.filter((e) => overlapsQuery(e, query));
    if (query.limit !== undefined) events = events.slice(-query.limit);
    return events;
  }

  /**
   * Events of every bucket of a type, optionally restricted to one host
   */
  getEventsByType(type: BucketType, range: TimeRange, host?: string): Map<Bucket, ActivityEvent[]> {
    const result = new Map<Bucket, ActivityEvent[]>();
    for (const bucket of this.listBuckets(type)) {
      if (host && bucket.hostname !== host) continue;
      result.set(bucket, this.getEvents(bucket.id, { start: range.start, end: range.end }));
    }
    return result;
  }

  /**
   * All events in range across the given buckets (every bucket if none
   * given), in ascending time order
   */
  exportEvents(range: TimeRange, bucketIds?: string[]): ActivityEvent[] {
    const ids = bucketIds && bucketIds.length > 0 ? bucketIds : this.listBuckets().map((b) => b.id);
    return ids
      .flatMap((id) => this.getEvents(id, { start: range.start, end: range.end }))
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id);
  }

  /**
   * Run a query against the raw tables. Only read-only statements that
   * return rows are accepted.
   */
  runSql(sql: string): SqlResult {
    let statement: Database.Statement<unknown[], unknown>;
    try {
      statement = this.db.prepare<unknown[], unknown>(sql);
    } catch (error) {
      throw new ValidationError(`Invalid SQL: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }

    if (!statement.readonly) {
      throw new ValidationError('Only read-only queries are allowed');
    }
    if (!statement.reader) {
      throw new ValidationError('Query does not return rows');
    }

    try {
      return {
        columns: statement.columns().map((c) => c.name),
        rows: statement.all(),
      };
    } catch (error) {
      throw new ValidationError(`Query failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
  }

  info(): StoreInfo {
    const counts = this.db
      .prepare<[], { bucket_count: number; event_count: number; first_ts: string | null; last_ts: string | null }>(
        `
        SELECT (SELECT COUNT(*) FROM bucketmodel) AS bucket_count,
               COUNT(*) AS event_count,
               MIN(timestamp) AS first_ts,
               MAX(timestamp) AS last_ts
        FROM eventmodel
      `
      )
      .get();
    const hostnames = this.db
      .prepare<[], { hostname: string | null }>(
        'SELECT DISTINCT hostname FROM bucketmodel ORDER BY hostname'
      )
      .all()
      .map((r) => r.hostname ?? 'unknown');

    const info: StoreInfo = {
      path: this.dbPath,
      bucketCount: counts?.bucket_count ?? 0,
      eventCount: counts?.event_count ?? 0,
      hostnames,
    };
    const first = toDate(counts?.first_ts ?? null);
    const last = toDate(counts?.last_ts ?? null);
    if (first) info.firstEvent = first;
    if (last) info.lastEvent = last;
    return info;
  }

  private bucketRow(bucketId: string): BucketRow {
    const row = this.db
      .prepare<[string], BucketRow>(
        'SELECT key, id, created, type, client, hostname FROM bucketmodel WHERE id = ?'
      )
      .get(bucketId);
    if (!row) {
      throw new NotFoundError(`Bucket not found: ${bucketId}`);
    }
    return row;
  }

  private toEvents(rows: EventRow[]): ActivityEvent[] {
    const events: ActivityEvent[] = [];
    for (const row of rows) {
      const timestamp = parseStoreTimestamp(row.timestamp);
      if (!timestamp) {
        logger.warn(`Skipping event ${row.id} with unreadable timestamp "${row.timestamp}"`);
        continue;
      }
      events.push({
        id: row.id,
        bucketId: row.bucket,
        timestamp,
        duration: Math.max(0, row.duration),
        data: parseData(row.datastr, row.id),
      });
    }
    return events.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id);
  }
}
