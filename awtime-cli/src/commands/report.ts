/**
 * Report Commands
 *
 * Shareable Markdown (or JSON) reports for a day, a week, a project,
 * productivity, focus sessions and the story of a day.
 */

import chalk from 'chalk';
import { ValidationError } from '../errors.js';
import { writeOutput } from '../export.js';
import {
  renderDailyMarkdown,
  renderFocusMarkdown,
  renderProductivityMarkdown,
  renderProjectMarkdown,
  renderStoryMarkdown,
  renderWeeklyMarkdown,
  toStructuredDaily,
  toStructuredFocus,
  toStructuredProductivity,
  toStructuredProject,
  toStructuredStory,
  toStructuredWeekly,
  type ReportFormat,
} from '../report.js';
import { lastDaysRange, parseDateArg, parseRangeArgs } from '../time.js';
import { parsePositiveInt, type Session } from './context.js';

export interface ReportOptions {
  format: string;
  output?: string;
}

export interface ReportDailyOptions extends ReportOptions {
  date?: string;
}

export interface ReportWeeklyOptions extends ReportOptions {
  weekStart?: string;
}

export interface ReportProjectOptions extends ReportOptions {
  start: string;
  end: string;
}

export interface ReportDaysOptions extends ReportOptions {
  days: string;
}

export interface ReportFocusOptions extends ReportDaysOptions {
  minMinutes?: string;
}

function reportFormat(options: ReportOptions, session: Session): ReportFormat {
  if (session.json) return 'json';
  if (options.format === 'markdown' || options.format === 'json') return options.format;
  throw new ValidationError(`--format must be markdown or json, got "${options.format}"`);
}

/**
 * Print or write a report. JSON output is the structured form; Markdown
 * is rendered from the same data.
 */
function emit<T>(
  session: Session,
  options: ReportOptions,
  data: T,
  structured: (data: T) => unknown,
  markdown: (data: T) => string
): void {
  const format = reportFormat(options, session);
  const content =
    format === 'json' ? `${JSON.stringify(structured(data), null, 2)}\n` : `${markdown(data)}\n`;

  if (options.output) {
    const written = writeOutput(options.output, content);
    if (session.json) {
      console.log(JSON.stringify({ status: 'ok', path: written }, null, 2));
    } else {
      console.log(chalk.green(`✓ Report written to ${written}`));
    }
    return;
  }
  process.stdout.write(content);
}

export function reportDailyCommand(options: ReportDailyOptions, session: Session): void {
  const summary = session.analyzer().dailySummary(parseDateArg(options.date ?? 'today'));
  emit(session, options, summary, toStructuredDaily, renderDailyMarkdown);
}

export function reportWeeklyCommand(options: ReportWeeklyOptions, session: Session): void {
  const summary = session.analyzer().weeklySummary(parseDateArg(options.weekStart ?? 'today'));
  emit(session, options, summary, toStructuredWeekly, renderWeeklyMarkdown);
}

export function reportProjectCommand(name: string, options: ReportProjectOptions, session: Session): void {
  const summary = session.analyzer().projectTime(name, parseRangeArgs(options.start, options.end));
  emit(session, options, summary, toStructuredProject, renderProjectMarkdown);
}

export function reportProductivityCommand(options: ReportDaysOptions, session: Session): void {
  const range = lastDaysRange(parsePositiveInt(options.days, 'Days'));
  const summary = session.analyzer().productivity(range);
  emit(session, options, summary, toStructuredProductivity, renderProductivityMarkdown);
}

export function reportFocusCommand(options: ReportFocusOptions, session: Session): void {
  const analyzer = session.analyzer();
  const range = lastDaysRange(parsePositiveInt(options.days, 'Days'));
  const minMinutes = options.minMinutes
    ? parsePositiveInt(options.minMinutes, 'Minimum minutes')
    : analyzer.settings.minFocusMinutes;
  emit(session, options, analyzer.focusSessions(range, minMinutes), toStructuredFocus, renderFocusMarkdown);
}

export function reportStoryCommand(options: ReportDailyOptions, session: Session): void {
  const story = session.analyzer().activityStory(parseDateArg(options.date ?? 'today'));
  emit(session, options, story, toStructuredStory, renderStoryMarkdown);
}
