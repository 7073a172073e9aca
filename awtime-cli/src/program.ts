/**
 * Command tree
 */

import { Command } from 'commander';
import {
  analyzeAppCommand,
  analyzeEditorCommand,
  analyzeFocusCommand,
  analyzeParallelCommand,
  analyzeProductivityCommand,
  analyzeRangeCommand,
  analyzeTodayCommand,
  type AnalyzeDateOptions,
  type AnalyzeDaysOptions,
  type AnalyzeFocusOptions,
  type AnalyzeRangeOptions,
} from './commands/analyze.js';
import { bucketsInfoCommand, bucketsListCommand, type BucketsListOptions } from './commands/buckets.js';
import { runAction } from './commands/context.js';
import { eventsCommand, type EventsOptions } from './commands/events.js';
import {
  exportAllCommand,
  exportInspectCommand,
  exportRangeCommand,
  type ExportAllOptions,
  type ExportInspectOptions,
  type ExportRangeOptions,
} from './commands/export.js';
import { infoCommand } from './commands/info.js';
import {
  projectDefineCommand,
  projectDeleteCommand,
  projectListCommand,
  projectTagCommand,
  projectTagsCommand,
  projectTimeCommand,
  projectUntagCommand,
  type ProjectDefineOptions,
  type ProjectRangeOptions,
  type ProjectTagOptions,
} from './commands/project.js';
import { querySqlCommand } from './commands/query.js';
import {
  reportDailyCommand,
  reportFocusCommand,
  reportProductivityCommand,
  reportProjectCommand,
  reportStoryCommand,
  reportWeeklyCommand,
  type ReportDailyOptions,
  type ReportDaysOptions,
  type ReportFocusOptions,
  type ReportProjectOptions,
  type ReportWeeklyOptions,
} from './commands/report.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('awtime')
    .description('Analyze ActivityWatch data: where your time went, by app, project and focus')
    .version(VERSION)
    .option('--host <hostname>', 'Only analyze buckets of this host')
    .option('--json', 'Print machine-readable JSON')
    .option('-v, --verbose', 'Show debug logging');

  program
    .command('info')
    .description('Show database location and size')
    .action((_options: object, command: Command) => runAction(command, (s) => infoCommand(s)));

  // Buckets
  const buckets = program.command('buckets').description('Inspect watcher buckets');

  buckets
    .command('list')
    .description('List buckets')
    .option('-t, --type <type>', 'Only buckets of this type (e.g. currentwindow, afkstatus)')
    .action((options: BucketsListOptions, command: Command) =>
      runAction(command, (s) => bucketsListCommand(options, s))
    );

  buckets
    .command('info')
    .description('Show details and recent events of a bucket')
    .argument('<bucketId>', 'Bucket id')
    .action((bucketId: string, _options: object, command: Command) =>
      runAction(command, (s) => bucketsInfoCommand(bucketId, s))
    );

  program
    .command('events')
    .description('Print raw events of a bucket')
    .argument('<bucketId>', 'Bucket id')
    .option('-s, --start <date>', 'Start (YYYY-MM-DD, ISO timestamp, today, yesterday)')
    .option('-e, --end <date>', 'End, exclusive')
    .option('-l, --limit <n>', 'Most recent events to show', '20')
    .action((bucketId: string, options: EventsOptions, command: Command) =>
      runAction(command, (s) => eventsCommand(bucketId, options, s))
    );

  // Analysis
  const analyze = program.command('analyze').description('Analyze tracked time');

  analyze
    .command('today')
    .description('Summary of one day')
    .option('-d, --date <date>', 'Day to summarize', 'today')
    .action((options: AnalyzeDateOptions, command: Command) =>
      runAction(command, (s) => analyzeTodayCommand(options, s))
    );

  analyze
    .command('range')
    .description('Time over a range, grouped')
    .requiredOption('-s, --start <date>', 'Start')
    .requiredOption('-e, --end <date>', 'End, exclusive')
    .option('-g, --group-by <group>', 'day, app, title or hour', 'day')
    .action((options: AnalyzeRangeOptions, command: Command) =>
      runAction(command, (s) => analyzeRangeCommand(options, s))
    );

  analyze
    .command('app')
    .description('Usage of one app (or all apps) over recent days')
    .argument('[name]', 'App name, case-insensitive')
    .option('--days <n>', 'Number of days', '7')
    .action((name: string | undefined, options: AnalyzeDaysOptions, command: Command) =>
      runAction(command, (s) => analyzeAppCommand(name, options, s))
    );

  analyze
    .command('focus')
    .description('Find sustained focus sessions')
    .option('--days <n>', 'Number of days', '7')
    .option('-m, --min-minutes <n>', 'Shortest session to report')
    .action((options: AnalyzeFocusOptions, command: Command) =>
      runAction(command, (s) => analyzeFocusCommand(options, s))
    );

  analyze
    .command('productivity')
    .description('Productive, neutral and distracting time')
    .option('--days <n>', 'Number of days', '7')
    .action((options: AnalyzeDaysOptions, command: Command) =>
      runAction(command, (s) => analyzeProductivityCommand(options, s))
    );

  analyze
    .command('editor')
    .description('Languages, projects and files from editor watchers')
    .option('-d, --date <date>', 'Day to summarize', 'today')
    .action((options: AnalyzeDateOptions, command: Command) =>
      runAction(command, (s) => analyzeEditorCommand(options, s))
    );

  analyze
    .command('parallel')
    .description('Editor work done while another app had focus, and all streams side by side')
    .option('-d, --date <date>', 'Day to inspect', 'today')
    .action((options: AnalyzeDateOptions, command: Command) =>
      runAction(command, (s) => analyzeParallelCommand(options, s))
    );

  // Raw queries
  const query = program.command('query').description('Query the database directly');

  query
    .command('sql')
    .description('Run a read-only SQL query')
    .argument('<sql>', 'SELECT statement')
    .action((sql: string, _options: object, command: Command) =>
      runAction(command, (s) => querySqlCommand(sql, s))
    );

  // Projects
  const project = program.command('project').description('Define projects and tag time');

  project
    .command('list')
    .description('List projects')
    .action((_options: object, command: Command) => runAction(command, (s) => projectListCommand(s)));

  project
    .command('define')
    .description('Create or replace a project')
    .argument('<name>', 'Project name')
    .option('-r, --rules <json>', 'Rules as JSON: {"app_patterns": [], "title_patterns": [], "title_regex": ""}')
    .option('--app <patterns...>', 'App name substrings')
    .option('--title <patterns...>', 'Window title substrings')
    .option('--regex <regex>', 'Window title regular expression')
    .action((name: string, options: ProjectDefineOptions, command: Command) =>
      runAction(command, (s) => projectDefineCommand(name, options, s))
    );

  project
    .command('delete')
    .description('Delete a project definition')
    .argument('<name>', 'Project name')
    .action((name: string, _options: object, command: Command) =>
      runAction(command, (s) => projectDeleteCommand(name, s))
    );

  project
    .command('time')
    .description('Time spent on a project')
    .argument('<name>', 'Project name')
    .requiredOption('-s, --start <date>', 'Start')
    .requiredOption('-e, --end <date>', 'End, exclusive')
    .action((name: string, options: ProjectRangeOptions, command: Command) =>
      runAction(command, (s) => projectTimeCommand(name, options, s))
    );

  project
    .command('tag')
    .description('Attribute a time range to a project manually')
    .argument('<project>', 'Project name')
    .requiredOption('-s, --start <date>', 'Start')
    .requiredOption('-e, --end <date>', 'End')
    .option('-n, --notes <text>', 'Notes')
    .action((name: string, options: ProjectTagOptions, command: Command) =>
      runAction(command, (s) => projectTagCommand(name, options, s))
    );

  project
    .command('untag')
    .description('Remove a manual tag')
    .argument('<id>', 'Tag id')
    .action((id: string, _options: object, command: Command) =>
      runAction(command, (s) => projectUntagCommand(id, s))
    );

  project
    .command('tags')
    .description('List manual tags')
    .argument('[project]', 'Only tags of this project')
    .action((name: string | undefined, _options: object, command: Command) =>
      runAction(command, (s) => projectTagsCommand(name, s))
    );

  // Reports
  const report = program.command('report').description('Generate shareable reports');
  const formatHelp = 'markdown or json';

  report
    .command('daily')
    .description('Daily activity report')
    .option('-d, --date <date>', 'Day to report', 'today')
    .option('-f, --format <format>', formatHelp, 'markdown')
    .option('-o, --output <path>', 'Write to a file')
    .action((options: ReportDailyOptions, command: Command) =>
      runAction(command, (s) => reportDailyCommand(options, s))
    );

  report
    .command('weekly')
    .description('Weekly activity report (weeks start on Monday)')
    .option('-w, --week-start <date>', 'Any day of the week to report', 'today')
    .option('-f, --format <format>', formatHelp, 'markdown')
    .option('-o, --output <path>', 'Write to a file')
    .action((options: ReportWeeklyOptions, command: Command) =>
      runAction(command, (s) => reportWeeklyCommand(options, s))
    );

  report
    .command('project')
    .description('Project time report')
    .argument('<name>', 'Project name')
    .requiredOption('-s, --start <date>', 'Start')
    .requiredOption('-e, --end <date>', 'End, exclusive')
    .option('-f, --format <format>', formatHelp, 'markdown')
    .option('-o, --output <path>', 'Write to a file')
    .action((name: string, options: ReportProjectOptions, command: Command) =>
      runAction(command, (s) => reportProjectCommand(name, options, s))
    );

  report
    .command('productivity')
    .description('Productivity report')
    .option('--days <n>', 'Number of days', '7')
    .option('-f, --format <format>', formatHelp, 'markdown')
    .option('-o, --output <path>', 'Write to a file')
    .action((options: ReportDaysOptions, command: Command) =>
      runAction(command, (s) => reportProductivityCommand(options, s))
    );

  report
    .command('focus')
    .description('Focus session report')
    .option('--days <n>', 'Number of days', '7')
    .option('-m, --min-minutes <n>', 'Shortest session to report')
    .option('-f, --format <format>', formatHelp, 'markdown')
    .option('-o, --output <path>', 'Write to a file')
    .action((options: ReportFocusOptions, command: Command) =>
      runAction(command, (s) => reportFocusCommand(options, s))
    );

  report
    .command('story')
    .description('Narrative report of a day: timeline, work blocks, focus and parallel work')
    .option('-d, --date <date>', 'Day to report', 'today')
    .option('-f, --format <format>', formatHelp, 'markdown')
    .option('-o, --output <path>', 'Write to a file')
    .action((options: ReportDailyOptions, command: Command) =>
      runAction(command, (s) => reportStoryCommand(options, s))
    );

  // Export
  const exportCmd = program.command('export').description('Export raw events');

  exportCmd
    .command('range')
    .description('Events of a time range')
    .requiredOption('-s, --start <date>', 'Start')
    .requiredOption('-e, --end <date>', 'End, exclusive')
    .option('-b, --buckets <ids...>', 'Only these buckets')
    .option('-f, --format <format>', 'json or csv', 'json')
    .option('-o, --output <path>', 'Write to a file')
    .action((options: ExportRangeOptions, command: Command) =>
      runAction(command, (s) => exportRangeCommand(options, s))
    );

  exportCmd
    .command('all')
    .description('Every bucket with all its events, as JSON')
    .option('-t, --type <type>', 'Only buckets of this type')
    .option('-o, --output <path>', 'Write to a file')
    .action((options: ExportAllOptions, command: Command) =>
      runAction(command, (s) => exportAllCommand(options, s))
    );

  exportCmd
    .command('inspect')
    .description('Summarize an export file')
    .argument('<file>', 'JSON or CSV export')
    .option('-f, --format <format>', 'json or csv (default: from the file extension)')
    .action((file: string, options: ExportInspectOptions, command: Command) =>
      runAction(command, (s) => exportInspectCommand(file, options, s))
    );

  return program;
}
