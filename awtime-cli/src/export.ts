/**
 * Export Module
 *
 * Dumps raw events as JSON or CSV, and reads such dumps back.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { EventStore } from './collectors/eventStore.js';
import { ValidationError } from './errors.js';
import type { ActivityEvent, Bucket, BucketType, TimeRange } from './types.js';
import { formatZodError } from './userConfig.js';

export type ExportFormat = 'json' | 'csv';

export const CSV_HEADER = ['bucket_id', 'timestamp', 'duration', 'data'];

const ExportRecordSchema = z.object({
  bucket_id: z.string(),
  timestamp: z.string().refine((v) => !Number.isNaN(new Date(v).getTime()), 'must be an ISO-8601 timestamp'),
  duration: z.number().nonnegative(),
  data: z.record(z.string(), z.unknown()),
});

const ExportedBucketSchema = z.object({
  bucket: z.object({
    id: z.string(),
    type: z.string(),
    client: z.string(),
    hostname: z.string(),
    created: z.string(),
  }),
  events: z.array(ExportRecordSchema),
});

export type ExportRecord = z.infer<typeof ExportRecordSchema>;
export type ExportedBucket = z.infer<typeof ExportedBucketSchema>;

export interface ExportOptions {
  format: ExportFormat;
  bucketIds?: string[];
}

export interface ExportBucketStats {
  bucketId: string;
  events: number;
  totalDuration: number;
  first: string;
  last: string;
}

export interface ExportSummary {
  eventCount: number;
  buckets: ExportBucketStats[];
}

export function isExportFormat(value: string): value is ExportFormat {
  return value === 'json' || value === 'csv';
}

export function toExportRecord(event: ActivityEvent): ExportRecord {
  return {
    bucket_id: event.bucketId,
    timestamp: event.timestamp.toISOString(),
    duration: event.duration,
    data: event.data,
  };
}

function exportedBucket(bucket: Bucket): ExportedBucket['bucket'] {
  return {
    id: bucket.id,
    type: bucket.type,
    client: bucket.client,
    hostname: bucket.hostname,
    created: bucket.created.toISOString(),
  };
}

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsv(records: ExportRecord[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const record of records) {
    // The data column is always quoted
    const data = `"${JSON.stringify(record.data).replace(/"/g, '""')}"`;
    lines.push([csvField(record.bucket_id), record.timestamp, String(record.duration), data].join(','));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Split CSV text into rows of fields. Quoted fields may contain commas,
 * doubled quotes and line breaks.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  const endField = () => {
    row.push(field);
    field = '';
  };
  const endRow = () => {
    endField();
    rows.push(row);
    row = [];
  };

  while (i < text.length) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i += 1;
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      endField();
    } else if (ch === '\n' || ch === '\r') {
      endRow();
      if (ch === '\r' && text[i + 1] === '\n') i += 1;
    } else {
      field += ch;
    }
    i += 1;
  }

  if (quoted) {
    throw new ValidationError('Unterminated quoted field in CSV');
  }
  if (field !== '' || row.length > 0) endRow();
  return rows;
}

export interface RenderedExport {
  content: string;
  count: number;
}

/**
 * Events of the range as a JSON array or CSV table
 */
export function exportRange(store: EventStore, range: TimeRange, options: ExportOptions): RenderedExport {
  const records = store.exportEvents(range, options.bucketIds).map(toExportRecord);
  const content = options.format === 'csv' ? toCsv(records) : `${JSON.stringify(records, null, 2)}\n`;
  return { content, count: records.length };
}

/**
 * Every bucket with all of its events, keyed by bucket id
 */
export function exportAll(store: EventStore, type?: BucketType): Record<string, ExportedBucket> {
  const result: Record<string, ExportedBucket> = {};
  for (const bucket of store.listBuckets(type)) {
    result[bucket.id] = {
      bucket: exportedBucket(bucket),
      events: store.getEvents(bucket.id).map(toExportRecord),
    };
  }
  return result;
}

function validateRecord(raw: unknown, where: string): ExportRecord {
  const parsed = ExportRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid export record at ${where}: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

function parseJsonExport(content: string): ExportRecord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`Export is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (Array.isArray(raw)) {
    return raw.map((item, index) => validateRecord(item, `index ${index}`));
  }

  // Full dump: { [bucketId]: { bucket, events } }
  const dump = z.record(z.string(), ExportedBucketSchema).safeParse(raw);
  if (!dump.success) {
    throw new ValidationError(`Unrecognized export layout: ${formatZodError(dump.error)}`);
  }
  return Object.values(dump.data).flatMap((b) => b.events);
}

function parseCsvExport(content: string): ExportRecord[] {
  const rows = parseCsv(content).filter((r) => !(r.length === 1 && r[0] === ''));
  const [header, ...body] = rows;
  if (!header || header.join(',') !== CSV_HEADER.join(',')) {
    throw new ValidationError(`CSV header must be "${CSV_HEADER.join(',')}"`);
  }

  return body.map((fields, index) => {
    const line = index + 2;
    if (fields.length !== CSV_HEADER.length) {
      throw new ValidationError(`Line ${line}: expected ${CSV_HEADER.length} fields, got ${fields.length}`);
    }
    const [bucketId, timestamp, duration, data] = fields;
    let parsedData: unknown;
    try {
      parsedData = JSON.parse(data);
    } catch {
      throw new ValidationError(`Line ${line}: data column is not JSON`);
    }
    return validateRecord(
      { bucket_id: bucketId, timestamp, duration: Number(duration), data: parsedData },
      `line ${line}`
    );
  });
}

/**
 * Read an export back into records
 */
export function parseExport(content: string, format: ExportFormat): ExportRecord[] {
  return format === 'csv' ? parseCsvExport(content) : parseJsonExport(content);
}

export function formatFromPath(filePath: string): ExportFormat {
  return path.extname(filePath).toLowerCase() === '.csv' ? 'csv' : 'json';
}

export function summarizeExport(records: ExportRecord[]): ExportSummary {
  const stats = new Map<string, ExportBucketStats>();
  for (const record of records) {
    const existing = stats.get(record.bucket_id);
    if (!existing) {
      stats.set(record.bucket_id, {
        bucketId: record.bucket_id,
        events: 1,
        totalDuration: record.duration,
        first: record.timestamp,
        last: record.timestamp,
      });
      continue;
    }
    existing.events += 1;
    existing.totalDuration += record.duration;
    if (Date.parse(record.timestamp) < Date.parse(existing.first)) existing.first = record.timestamp;
    if (Date.parse(record.timestamp) > Date.parse(existing.last)) existing.last = record.timestamp;
  }
  return {
    eventCount: records.length,
    buckets: [...stats.values()].sort((a, b) => a.bucketId.localeCompare(b.bucketId)),
  };
}

/**
 * Write content to a file, creating parent directories. Returns the
 * absolute path.
 */
export function writeOutput(outputPath: string, content: string): string {
  const resolved = path.resolve(outputPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  fs.writeFileSync(resolved, content, 'utf-8');
  return resolved;
}
