/**
 * Events Command
 *
 * Prints raw events of one bucket.
 */

import chalk from 'chalk';
import { formatDuration } from '../format.js';
import { assertRange, parseDateArg } from '../time.js';
import { describeEventData, structuredEvent } from './buckets.js';
import { parsePositiveInt, type Session } from './context.js';

export interface EventsOptions {
  start?: string;
  end?: string;
  limit: string;
}

export function eventsCommand(bucketId: string, options: EventsOptions, session: Session): void {
  const limit = parsePositiveInt(options.limit, 'Limit');
  const start = options.start ? parseDateArg(options.start) : undefined;
  const end = options.end ? parseDateArg(options.end) : undefined;
  if (start && end) assertRange({ start, end });

  const events = session.store().getEvents(bucketId, { start, end, limit });

  session.output(events.map(structuredEvent), () => {
    if (events.length === 0) {
      console.log(chalk.gray('No events found.'));
      return;
    }
    for (const event of events) {
      console.log(
        `${chalk.gray(event.timestamp.toISOString())} ${formatDuration(event.duration).padStart(7)}  ${describeEventData(event)}`
      );
    }
  });
}
