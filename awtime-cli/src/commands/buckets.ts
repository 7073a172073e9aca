/**
 * Buckets Commands
 *
 * Lists watcher buckets and shows details of one.
 */

import chalk from 'chalk';
import { formatDate, formatDuration, truncate } from '../format.js';
import type { ActivityEvent, BucketSummary } from '../types.js';
import type { Session } from './context.js';

export interface BucketsListOptions {
  type?: string;
}

function structuredBucket(bucket: BucketSummary) {
  return {
    id: bucket.id,
    type: bucket.type,
    client: bucket.client,
    hostname: bucket.hostname,
    created: bucket.created.toISOString(),
    event_count: bucket.eventCount,
    first_event: bucket.firstEvent?.toISOString() ?? null,
    last_event: bucket.lastEvent?.toISOString() ?? null,
  };
}

export function structuredEvent(event: ActivityEvent) {
  return {
    id: event.id,
    bucket_id: event.bucketId,
    timestamp: event.timestamp.toISOString(),
    duration: event.duration,
    data: event.data,
  };
}

export function describeEventData(event: ActivityEvent): string {
  return truncate(JSON.stringify(event.data), 80);
}

export function bucketsListCommand(options: BucketsListOptions, session: Session): void {
  const buckets = session.store().listBuckets(options.type);

  session.output(buckets.map(structuredBucket), () => {
    if (buckets.length === 0) {
      console.log(chalk.gray(options.type ? `No buckets of type ${options.type}.` : 'No buckets found.'));
      return;
    }

    console.log(chalk.bold(`\n${buckets.length} bucket${buckets.length === 1 ? '' : 's'}\n`));
    for (const bucket of buckets) {
      const span =
        bucket.firstEvent && bucket.lastEvent
          ? `${formatDate(bucket.firstEvent)} → ${formatDate(bucket.lastEvent)}`
          : 'empty';
      console.log(`  ${chalk.cyan(bucket.id)}`);
      console.log(
        chalk.gray(`    ${bucket.type} · ${bucket.hostname} · ${bucket.eventCount} events · ${span}`)
      );
    }
    console.log();
  });
}

export function bucketsInfoCommand(bucketId: string, session: Session): void {
  const info = session.store().getBucketInfo(bucketId);

  session.output(
    {
      bucket: {
        id: info.bucket.id,
        type: info.bucket.type,
        client: info.bucket.client,
        hostname: info.bucket.hostname,
        created: info.bucket.created.toISOString(),
      },
      event_count: info.eventCount,
      first_event: info.firstEvent?.toISOString() ?? null,
      last_event: info.lastEvent?.toISOString() ?? null,
      total_duration: info.totalDuration,
      sample_events: info.sampleEvents.map(structuredEvent),
    },
    () => {
      const { bucket } = info;
      console.log(chalk.bold(`\n${bucket.id}\n`));
      console.log(`  Type:     ${bucket.type}`);
      console.log(`  Client:   ${bucket.client}`);
      console.log(`  Host:     ${bucket.hostname}`);
      console.log(`  Created:  ${bucket.created.toISOString()}`);
      console.log(`  Events:   ${info.eventCount}`);
      console.log(`  Tracked:  ${formatDuration(info.totalDuration)}`);
      if (info.firstEvent && info.lastEvent) {
        console.log(`  Range:    ${info.firstEvent.toISOString()} → ${info.lastEvent.toISOString()}`);
      }
      if (info.sampleEvents.length > 0) {
        console.log(chalk.bold('\n  Latest events:'));
        for (const event of info.sampleEvents) {
          console.log(
            `    ${chalk.gray(event.timestamp.toISOString())} ${formatDuration(event.duration).padStart(7)}  ${describeEventData(event)}`
          );
        }
      }
      console.log();
    }
  );
}
