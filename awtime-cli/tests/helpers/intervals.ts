import type { EventContext, NormalizedInterval } from '../../src/types.js';

type IntervalOptions = {
  active?: number;
  project?: string;
  hostname?: string;
};

/**
 * Build a normalized interval by hand; fully active unless `active` says otherwise
 */
export function interval(
  app: string,
  title: string,
  start: string,
  end: string,
  options: IntervalOptions = {}
): NormalizedInterval {
  const startDate = new Date(start);
  const endDate = new Date(end);
  const durationSeconds = (endDate.getTime() - startDate.getTime()) / 1000;
  const activeSeconds = options.active ?? durationSeconds;
  const context: EventContext = { app, title };
  if (options.project) context.project = options.project;

  return {
    start: startDate,
    end: endDate,
    context,
    hostname: options.hostname ?? 'laptop',
    bucketId: 'aw-watcher-window_laptop',
    durationSeconds,
    activeSeconds,
    active: activeSeconds > 0,
    eventCount: 1,
  };
}
