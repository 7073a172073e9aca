/**
 * Export Commands
 *
 * Dumps raw events for backup or processing elsewhere, and checks a
 * previously written dump.
 */

import chalk from 'chalk';
import * as fs from 'node:fs';
import { ValidationError } from '../errors.js';
import {
  exportAll,
  exportRange,
  formatFromPath,
  isExportFormat,
  parseExport,
  summarizeExport,
  writeOutput,
} from '../export.js';
import { formatDuration } from '../format.js';
import { parseRangeArgs } from '../time.js';
import type { Session } from './context.js';

export interface ExportRangeOptions {
  start: string;
  end: string;
  buckets?: string[];
  format: string;
  output?: string;
}

export interface ExportAllOptions {
  type?: string;
  output?: string;
}

export interface ExportInspectOptions {
  format?: string;
}

function printOrWrite(session: Session, content: string, output: string | undefined, count: number): void {
  if (!output) {
    process.stdout.write(content);
    return;
  }
  const written = writeOutput(output, content);
  if (session.json) {
    console.log(JSON.stringify({ status: 'ok', path: written, events: count }, null, 2));
  } else {
    console.log(chalk.green(`✓ Exported ${count} events to ${written}`));
  }
}

export function exportRangeCommand(options: ExportRangeOptions, session: Session): void {
  if (!isExportFormat(options.format)) {
    throw new ValidationError(`--format must be json or csv, got "${options.format}"`);
  }
  const range = parseRangeArgs(options.start, options.end);
  const { content, count } = exportRange(session.store(), range, {
    format: options.format,
    bucketIds: options.buckets,
  });
  printOrWrite(session, content, options.output, count);
}

export function exportAllCommand(options: ExportAllOptions, session: Session): void {
  const dump = exportAll(session.store(), options.type);
  const count = Object.values(dump).reduce((sum, b) => sum + b.events.length, 0);
  printOrWrite(session, `${JSON.stringify(dump, null, 2)}\n`, options.output, count);
}

export function exportInspectCommand(file: string, options: ExportInspectOptions, session: Session): void {
  const format = options.format ?? formatFromPath(file);
  if (!isExportFormat(format)) {
    throw new ValidationError(`--format must be json or csv, got "${format}"`);
  }
  if (!fs.existsSync(file)) {
    throw new ValidationError(`File not found: ${file}`);
  }

  const summary = summarizeExport(parseExport(fs.readFileSync(file, 'utf-8'), format));

  const structured = {
    event_count: summary.eventCount,
    buckets: summary.buckets.map((b) => ({
      bucket_id: b.bucketId,
      events: b.events,
      total_duration: b.totalDuration,
      first: b.first,
      last: b.last,
    })),
  };

  session.output(structured, () => {
    console.log(chalk.bold(`\n${file}: ${summary.eventCount} events in ${summary.buckets.length} buckets\n`));
    for (const bucket of summary.buckets) {
      console.log(`  ${chalk.cyan(bucket.bucketId)}`);
      console.log(
        chalk.gray(`    ${bucket.events} events · ${formatDuration(bucket.totalDuration)} · ${bucket.first} → ${bucket.last}`)
      );
    }
    console.log();
  });
}
