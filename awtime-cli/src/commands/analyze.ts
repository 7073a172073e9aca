/**
 * Analyze Commands
 *
 * Terminal views of the analyzer: a day at a glance, ranges grouped by
 * day/app/title/hour, one app over several days, focus sessions,
 * productivity, editor activity and parallel work.
 */

import chalk from 'chalk';
import { ValidationError } from '../errors.js';
import { bar, formatClock, formatDate, formatDuration, truncate } from '../format.js';
import {
  toStructuredAppUsage,
  toStructuredDaily,
  toStructuredFocus,
  toStructuredParallel,
  toStructuredProductivity,
  toStructuredRange,
} from '../report.js';
import { dayRange, lastDaysRange, parseDateArg, parseRangeArgs } from '../time.js';
import type { GroupBy, GroupTotal } from '../types.js';
import { parsePositiveInt, type Session } from './context.js';

const GROUP_BY: GroupBy[] = ['day', 'app', 'title', 'hour'];

export interface AnalyzeDateOptions {
  date?: string;
}

export interface AnalyzeRangeOptions {
  start: string;
  end: string;
  groupBy: string;
}

export interface AnalyzeDaysOptions {
  days: string;
}

export interface AnalyzeFocusOptions extends AnalyzeDaysOptions {
  minMinutes?: string;
}

function isGroupBy(value: string): value is GroupBy {
  return GROUP_BY.some((g) => g === value);
}

function printTotals(totals: GroupTotal[], label: (t: GroupTotal) => string): void {
  const max = Math.max(0, ...totals.map((t) => t.seconds));
  for (const total of totals) {
    console.log(
      `  ${truncate(label(total), 40).padEnd(40)} ${formatDuration(total.seconds).padStart(8)}  ${chalk.cyan(bar(total.seconds, max))}`
    );
  }
}

function appLabel(total: GroupTotal): string {
  return total.app ?? total.key;
}

function titleLabel(total: GroupTotal): string {
  return total.title ? `${total.app ?? ''}: ${total.title}` : total.key;
}

export function analyzeTodayCommand(options: AnalyzeDateOptions, session: Session): void {
  const date = parseDateArg(options.date ?? 'today');
  const summary = session.analyzer().dailySummary(date);

  session.output(toStructuredDaily(summary), () => {
    console.log(chalk.bold(`\n📅 ${summary.date}\n`));
    console.log(
      `Active: ${chalk.green(formatDuration(summary.active.activeSeconds))}  ` +
        chalk.gray(`AFK: ${formatDuration(summary.active.afkSeconds)} · ${summary.active.activePct}% active`)
    );

    if (summary.apps.top.length === 0) {
      console.log(chalk.gray('\nNo window activity recorded.'));
      return;
    }

    console.log(chalk.bold('\nApps:'));
    printTotals(summary.apps.top, appLabel);
    console.log(chalk.bold('\nWindow titles:'));
    printTotals(summary.titles.top, titleLabel);
    console.log();
  });
}

export function analyzeRangeCommand(options: AnalyzeRangeOptions, session: Session): void {
  if (!isGroupBy(options.groupBy)) {
    throw new ValidationError(`--group-by must be one of ${GROUP_BY.join(', ')}, got "${options.groupBy}"`);
  }
  const range = parseRangeArgs(options.start, options.end);
  const summary = session.analyzer().rangeSummary(range, options.groupBy);
  const { aggregation } = summary;

  session.output(toStructuredRange(summary), () => {
    console.log(chalk.bold(`\n${formatDate(range.start)} → ${formatDate(range.end)} by ${aggregation.groupBy}\n`));
    if (aggregation.groups.length === 0) {
      console.log(chalk.gray('No activity in this range.'));
      return;
    }
    const label = aggregation.groupBy === 'title' ? titleLabel : appLabel;
    const calendar = aggregation.groupBy === 'day' || aggregation.groupBy === 'hour';
    printTotals(calendar ? aggregation.groups : aggregation.top, label);
    console.log(chalk.gray(`\nTotal: ${formatDuration(aggregation.totalSeconds)}\n`));
  });
}

export function analyzeAppCommand(app: string | undefined, options: AnalyzeDaysOptions, session: Session): void {
  const days = parsePositiveInt(options.days, 'Days');
  const usage = session.analyzer().appUsage(days, app);

  session.output(toStructuredAppUsage(usage), () => {
    const heading = app ? `${app} over the last ${days} days` : `Apps over the last ${days} days`;
    console.log(chalk.bold(`\n${heading}\n`));
    console.log(`Total: ${chalk.green(formatDuration(usage.totalSeconds))}`);

    if (app) {
      console.log(chalk.bold('\nPer day:'));
      const max = Math.max(0, ...usage.daily.map((d) => d.seconds));
      for (const day of usage.daily) {
        console.log(`  ${day.date}  ${formatDuration(day.seconds).padStart(8)}  ${chalk.cyan(bar(day.seconds, max))}`);
      }
      if (usage.titles.length > 0) {
        console.log(chalk.bold('\nTop titles:'));
        printTotals(usage.titles, (t) => t.title ?? t.key);
      }
    } else {
      console.log(chalk.bold('\nTop apps:'));
      printTotals(usage.apps, appLabel);
    }
    console.log();
  });
}

export function analyzeFocusCommand(options: AnalyzeFocusOptions, session: Session): void {
  const days = parsePositiveInt(options.days, 'Days');
  const analyzer = session.analyzer();
  const minMinutes = options.minMinutes
    ? parsePositiveInt(options.minMinutes, 'Minimum minutes')
    : analyzer.settings.minFocusMinutes;
  const report = analyzer.focusSessions(lastDaysRange(days), minMinutes);

  session.output(toStructuredFocus(report), () => {
    console.log(chalk.bold(`\n🎯 Focus sessions (≥ ${minMinutes}m) over the last ${days} days\n`));
    if (report.sessions.length === 0) {
      console.log(chalk.gray('No focus sessions found.'));
      return;
    }
    for (const entry of report.sessions) {
      const focus = entry.context.project
        ? `${entry.context.app} (${entry.context.project})`
        : entry.context.app;
      console.log(
        `  ${formatDate(entry.start)} ${formatClock(entry.start)}–${formatClock(entry.end)}  ` +
          `${chalk.green(formatDuration(entry.durationSeconds).padStart(7))}  ${focus}`
      );
    }
    console.log(chalk.gray(`\n${report.sessions.length} sessions, ${formatDuration(report.totalSeconds)} total\n`));
  });
}

export function analyzeProductivityCommand(options: AnalyzeDaysOptions, session: Session): void {
  const days = parsePositiveInt(options.days, 'Days');
  const summary = session.analyzer().productivity(lastDaysRange(days));

  session.output(toStructuredProductivity(summary), () => {
    console.log(chalk.bold(`\nProductivity over the last ${days} days\n`));
    const rows: Array<[string, number, number, (text: string) => string]> = [
      ['Productive', summary.productiveSeconds, summary.percentages.productive, chalk.green],
      ['Neutral', summary.neutralSeconds, summary.percentages.neutral, chalk.gray],
      ['Distracting', summary.distractingSeconds, summary.percentages.distracting, chalk.red],
    ];
    for (const [label, seconds, pct, color] of rows) {
      console.log(
        `  ${label.padEnd(12)} ${formatDuration(seconds).padStart(8)}  ${String(pct).padStart(5)}%  ${color(bar(pct, 100))}`
      );
    }
    console.log(chalk.gray(`\nActive total: ${formatDuration(summary.totalSeconds)}\n`));
  });
}

export function analyzeEditorCommand(options: AnalyzeDateOptions, session: Session): void {
  const range = dayRange(parseDateArg(options.date ?? 'today'));
  const activity = session.analyzer().editorActivity(range);

  session.output(
    {
      range: { start: range.start.toISOString(), end: range.end.toISOString() },
      event_count: activity.eventCount,
      languages: activity.languages,
      projects: activity.projects,
      files: activity.files,
    },
    () => {
      console.log(chalk.bold(`\nEditor activity on ${formatDate(range.start)}\n`));
      if (activity.eventCount === 0) {
        console.log(chalk.gray('No editor events recorded.'));
        return;
      }
      const sections: Array<[string, typeof activity.languages]> = [
        ['Languages', activity.languages],
        ['Projects', activity.projects],
        ['Files', activity.files.slice(0, 15)],
      ];
      for (const [heading, totals] of sections) {
        if (totals.length === 0) continue;
        console.log(chalk.bold(`${heading}:`));
        for (const total of totals) {
          console.log(`  ${truncate(total.key, 50).padEnd(50)} ${formatDuration(total.seconds).padStart(8)}  ${chalk.gray(`${total.events} events`)}`);
        }
        console.log();
      }
    }
  );
}

export function analyzeParallelCommand(options: AnalyzeDateOptions, session: Session): void {
  const range = dayRange(parseDateArg(options.date ?? 'today'));
  const parallel = session.analyzer().parallelActivities(range);

  session.output(toStructuredParallel(parallel), () => {
    console.log(chalk.bold(`\nParallel work on ${formatDate(range.start)}\n`));
    if (parallel.backgroundEdits.length === 0) {
      console.log(chalk.gray('No editor activity while another app had focus.'));
    } else {
      console.log(chalk.bold(`Background edits: ${parallel.backgroundEdits.length}`));
      for (const item of parallel.summary) {
        console.log(`  ${truncate(item.focusedApp, 30).padEnd(30)} ${String(item.edits).padStart(4)} edits  ${chalk.gray(item.files.join(', '))}`);
      }
    }

    if (parallel.timeline.length > 0) {
      console.log(chalk.bold('\nTimeline:'));
      for (const entry of parallel.timeline) {
        const detail = entry.secondary ? chalk.gray(` ${truncate(entry.secondary, 50)}`) : '';
        console.log(`  ${formatClock(entry.timestamp)}  ${entry.source.padEnd(7)} ${truncate(entry.primary, 30)}${detail}`);
      }
    }
    console.log();
  });
}
