/**
 * awtime library entry
 *
 * The analysis engine without the command line: open the store, load the
 * user configuration, and ask a TimeAnalyzer for summaries.
 */

export { aggregate, hourlyActivity, secondsFor, splitByBoundary, workBlocks } from './aggregator.js';
export type { AggregateOptions, HourActivity, WorkBlock } from './aggregator.js';
export { STORY_FOCUS_MINUTES, TimeAnalyzer } from './analyzer.js';
export type {
  ActiveTime,
  ActivityStory,
  AnalysisMeta,
  AnalyzerOptions,
  AppUsage,
  DailySummary,
  EditorActivity,
  FocusReport,
  ParallelActivity,
  ProductivitySummary,
  ProjectTimeSummary,
  RangeSummary,
  WeeklySummary,
} from './analyzer.js';
export { EventStore } from './collectors/eventStore.js';
export type { EventQuery, SqlResult, StoreInfo } from './collectors/eventStore.js';
export * from './errors.js';
export { exportAll, exportRange, parseExport, summarizeExport, toCsv } from './export.js';
export type { ExportFormat, ExportRecord, ExportSummary } from './export.js';
export { detectSessions } from './focus.js';
export { contextFromData, mergeResults, normalize } from './normalizer.js';
export { buildTimeline, findBackgroundEdits, summarizeBackgroundEdits } from './parallel.js';
export type { BackgroundEdit, BackgroundSummary, HostStreams, TimelineEntry } from './parallel.js';
export { ProductivityClassifier, productivityReport } from './productivity.js';
export { ProjectRegistry, manualOverlaps, matchDuration } from './projects.js';
export type { ProjectTime } from './projects.js';
export * from './report.js';
export { compileRules, matchesAny } from './rules.js';
export { candidateDbPaths, resolveConfigPath, resolveDbPath } from './settings.js';
export { dayRange, lastDaysRange, parseDateArg, parseStoreTimestamp, weekRange } from './time.js';
export * from './types.js';
export { ConfigStore, DEFAULT_CATEGORIES, analysisSettings, categoryRules } from './userConfig.js';
export type { ConfigDocument, UserConfig } from './userConfig.js';
