/**
 * Report Renderer
 *
 * Turns analyzer results into JSON-ready objects and Markdown reports.
 * Nothing here recomputes totals; values are printed as given.
 */

import type { WorkBlock } from './aggregator.js';
import type {
  ActivityStory,
  AppUsage,
  DailySummary,
  EditorTotal,
  EditorActivity,
  FocusReport,
  FocusSessionDetail,
  ParallelActivity,
  ProductivitySummary,
  ProjectTimeSummary,
  RangeSummary,
  WeeklySummary,
} from './analyzer.js';
import { bar, formatClock, formatDate, formatDuration, formatLongDate, formatPercent, truncate } from './format.js';
import type { GroupTotal, TimeRange } from './types.js';

export { formatDuration } from './format.js';

export type ReportFormat = 'markdown' | 'json';

const TITLE_WIDTH = 60;
const STORY_BAR_WIDTH = 20;
const STORY_TITLE_WIDTH = 55;

export interface StructuredTotal {
  key: string;
  seconds: number;
  formatted: string;
  app?: string;
  title?: string;
}

function structuredRange(range: TimeRange) {
  return { start: range.start.toISOString(), end: range.end.toISOString() };
}

function structuredTotals(totals: GroupTotal[]): StructuredTotal[] {
  return totals.map((t) => ({ ...t, formatted: formatDuration(t.seconds) }));
}

function structuredEditor(totals: EditorTotal[]) {
  return totals.map((t) => ({ ...t, formatted: formatDuration(t.seconds) }));
}

function structuredEditorActivity(editor: EditorActivity) {
  return {
    event_count: editor.eventCount,
    languages: structuredEditor(editor.languages),
    projects: structuredEditor(editor.projects),
    files: structuredEditor(editor.files),
  };
}

function structuredSessions(sessions: FocusSessionDetail[]) {
  return sessions.map((s) => ({
    start: s.start.toISOString(),
    end: s.end.toISOString(),
    hostname: s.hostname,
    app: s.context.app,
    project: s.context.project ?? null,
    seconds: s.durationSeconds,
    formatted: formatDuration(s.durationSeconds),
    interval_count: s.intervalCount,
    top_apps: structuredTotals(s.topApps),
  }));
}

export function toStructuredDaily(summary: DailySummary) {
  return {
    date: summary.date,
    range: structuredRange(summary.range),
    afk_filtered: summary.afkFiltered,
    warnings: summary.warnings,
    active_time: {
      active_seconds: summary.active.activeSeconds,
      afk_seconds: summary.active.afkSeconds,
      active_pct: summary.active.activePct,
      active_formatted: formatDuration(summary.active.activeSeconds),
      afk_formatted: formatDuration(summary.active.afkSeconds),
    },
    top_apps: structuredTotals(summary.apps.top),
    top_titles: structuredTotals(summary.titles.top),
    hourly: structuredTotals(summary.hours.groups),
    editor_activity: structuredEditorActivity(summary.editor),
  };
}

export function toStructuredWeekly(summary: WeeklySummary) {
  return {
    week_start: summary.weekStart,
    week_end: summary.weekEnd,
    afk_filtered: summary.afkFiltered,
    warnings: summary.warnings,
    active_time: {
      active_seconds: summary.active.activeSeconds,
      afk_seconds: summary.active.afkSeconds,
      active_pct: summary.active.activePct,
      active_formatted: formatDuration(summary.active.activeSeconds),
    },
    daily_breakdown: summary.days.map((d) => ({ ...d, formatted: formatDuration(d.seconds) })),
    top_apps: structuredTotals(summary.apps.top),
  };
}

export function toStructuredRange(summary: RangeSummary) {
  return {
    range: structuredRange(summary.range),
    group_by: summary.aggregation.groupBy,
    afk_filtered: summary.afkFiltered,
    warnings: summary.warnings,
    total_seconds: summary.aggregation.totalSeconds,
    total_formatted: formatDuration(summary.aggregation.totalSeconds),
    groups: structuredTotals(summary.aggregation.groups),
  };
}

export function toStructuredAppUsage(usage: AppUsage) {
  return {
    range: structuredRange(usage.range),
    days: usage.days,
    app: usage.app ?? null,
    afk_filtered: usage.afkFiltered,
    warnings: usage.warnings,
    total_seconds: usage.totalSeconds,
    total_formatted: formatDuration(usage.totalSeconds),
    top_apps: structuredTotals(usage.apps),
    top_titles: structuredTotals(usage.titles),
    daily: usage.daily.map((d) => ({ ...d, formatted: formatDuration(d.seconds) })),
  };
}

export function toStructuredProject(summary: ProjectTimeSummary) {
  return {
    project: summary.project,
    range: structuredRange(summary.range),
    afk_filtered: summary.afkFiltered,
    warnings: summary.warnings,
    total_seconds: summary.totalSeconds,
    total_formatted: formatDuration(summary.totalSeconds),
    rule_matched: {
      seconds: summary.ruleBasedSeconds,
      formatted: formatDuration(summary.ruleBasedSeconds),
      apps: summary.matchedApps.map((a) => ({ ...a, formatted: formatDuration(a.seconds) })),
    },
    manual: {
      seconds: summary.manualSeconds,
      formatted: formatDuration(summary.manualSeconds),
      entries: summary.manualEntries.map((e) => ({
        ...e,
        formatted: formatDuration(e.overlapSeconds),
      })),
    },
  };
}

export function toStructuredProductivity(summary: ProductivitySummary) {
  return {
    range: structuredRange(summary.range),
    afk_filtered: summary.afkFiltered,
    warnings: summary.warnings,
    total_seconds: summary.totalSeconds,
    categories: {
      productive: { seconds: summary.productiveSeconds, pct: summary.percentages.productive },
      neutral: { seconds: summary.neutralSeconds, pct: summary.percentages.neutral },
      distracting: { seconds: summary.distractingSeconds, pct: summary.percentages.distracting },
    },
    by_app: summary.byApp.map((a) => ({ ...a, formatted: formatDuration(a.seconds) })),
  };
}

export function toStructuredFocus(report: FocusReport) {
  return {
    range: structuredRange(report.range),
    min_minutes: report.minMinutes,
    afk_filtered: report.afkFiltered,
    warnings: report.warnings,
    total_seconds: report.totalSeconds,
    sessions: structuredSessions(report.sessions),
  };
}

export function toStructuredParallel(parallel: ParallelActivity) {
  return {
    range: structuredRange(parallel.range),
    warnings: parallel.warnings,
    background_edits: parallel.backgroundEdits.map((e) => ({
      timestamp: e.timestamp.toISOString(),
      hostname: e.hostname,
      file: e.file,
      language: e.language ?? null,
      focused_app: e.focusedApp,
      focused_title: e.focusedTitle,
    })),
    background_summary: parallel.summary.map((s) => ({
      focused_app: s.focusedApp,
      edits: s.edits,
      files: s.files,
    })),
    timeline: parallel.timeline.map((t) => ({
      source: t.source,
      timestamp: t.timestamp.toISOString(),
      seconds: t.seconds,
      primary: t.primary,
      secondary: t.secondary,
    })),
  };
}

export function toStructuredStory(story: ActivityStory) {
  return {
    date: story.date,
    range: structuredRange(story.range),
    afk_filtered: story.afkFiltered,
    warnings: story.warnings,
    active_time: {
      active_seconds: story.active.activeSeconds,
      afk_seconds: story.active.afkSeconds,
      active_pct: story.active.activePct,
      active_formatted: formatDuration(story.active.activeSeconds),
    },
    top_apps: structuredTotals(story.apps.top),
    top_titles: structuredTotals(story.titles.top),
    hourly: story.hourly.map((h) => ({
      hour: h.hour,
      seconds: h.seconds,
      formatted: formatDuration(h.seconds),
      top_app: h.topApp,
    })),
    work_blocks: story.workBlocks.map((b) => ({ start_hour: b.startHour, end_hour: b.endHour })),
    focus_sessions: structuredSessions(story.focus),
    parallel_activities: toStructuredParallel(story.parallel),
    editor_activity: structuredEditorActivity(story.editor),
  };
}

/**
 * Escape a value for a Markdown table cell
 */
export function cell(value: string): string {
  return value.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

// Ranges end exclusively; show the last day they cover
function period(range: TimeRange): string {
  return `${formatDate(range.start)} to ${formatDate(new Date(range.end.getTime() - 1))}`;
}

function pushWarnings(lines: string[], warnings: string[]): void {
  if (warnings.length === 0) return;
  for (const warning of warnings) {
    lines.push(`> **Warning:** ${warning}`);
  }
  lines.push('');
}

function pushAppTable(lines: string[], apps: GroupTotal[]): void {
  lines.push('| App | Time |');
  lines.push('|-----|------|');
  for (const app of apps) {
    lines.push(`| ${cell(app.app ?? app.key)} | ${formatDuration(app.seconds)} |`);
  }
}

function editorLine(label: string, totals: EditorTotal[]): string | null {
  if (totals.length === 0) return null;
  return `**${label}:** ${totals.map((t) => `${t.key} (${formatDuration(t.seconds)})`).join(', ')}`;
}

export function renderDailyMarkdown(summary: DailySummary): string {
  const lines: string[] = [];
  const { active } = summary;

  lines.push(`# Daily Activity Report — ${summary.date}`);
  lines.push('');
  lines.push(`**Active time:** ${formatDuration(active.activeSeconds)} (${active.activePct}% of tracked time)`);
  lines.push(`**AFK time:** ${formatDuration(active.afkSeconds)}`);
  lines.push('');
  pushWarnings(lines, summary.warnings);

  lines.push('## Top Applications');
  lines.push('');
  pushAppTable(lines, summary.apps.top);
  lines.push('');

  lines.push('## Top Window Titles');
  lines.push('');
  lines.push('| App | Title | Time |');
  lines.push('|-----|-------|------|');
  for (const t of summary.titles.top) {
    const title = cell(truncate(t.title ?? '', TITLE_WIDTH));
    lines.push(`| ${cell(t.app ?? '')} | ${title} | ${formatDuration(t.seconds)} |`);
  }

  if (summary.hours.groups.length > 0) {
    const max = Math.max(...summary.hours.groups.map((h) => h.seconds));
    lines.push('');
    lines.push('## Hourly Timeline');
    lines.push('');
    lines.push('| Hour | Active | |');
    lines.push('|------|--------|---|');
    for (const hour of summary.hours.groups) {
      // Keys are "YYYY-MM-DD HH:00"
      lines.push(`| ${hour.key.slice(11)} | ${formatDuration(hour.seconds)} | ${bar(hour.seconds, max)} |`);
    }
  }

  const editor = [
    editorLine('Languages', summary.editor.languages),
    editorLine('Projects', summary.editor.projects),
  ].filter((line): line is string => line !== null);
  if (editor.length > 0 || summary.editor.files.length > 0) {
    lines.push('');
    lines.push('## Editor Activity');
    lines.push('');
    lines.push(...editor);
    if (summary.editor.files.length > 0) {
      lines.push('');
      lines.push('**Files touched:**');
      for (const file of summary.editor.files.slice(0, 15)) {
        lines.push(`- \`${file.key}\``);
      }
    }
  }

  return lines.join('\n');
}

export function renderWeeklyMarkdown(summary: WeeklySummary): string {
  const lines: string[] = [];

  lines.push(`# Weekly Activity Report — ${summary.weekStart} to ${summary.weekEnd}`);
  lines.push('');
  lines.push(`**Total active time:** ${formatDuration(summary.active.activeSeconds)}`);
  lines.push('');
  pushWarnings(lines, summary.warnings);

  lines.push('## Daily Breakdown');
  lines.push('');
  lines.push('| Day | Active Time |');
  lines.push('|-----|-------------|');
  for (const day of summary.days) {
    lines.push(`| ${day.date} | ${formatDuration(day.seconds)} |`);
  }
  lines.push('');

  lines.push('## Top Applications');
  lines.push('');
  pushAppTable(lines, summary.apps.top);

  return lines.join('\n');
}

export function renderProjectMarkdown(summary: ProjectTimeSummary): string {
  const lines: string[] = [];

  lines.push(`# Project Report — ${summary.project}`);
  lines.push(`**Period:** ${period(summary.range)}`);
  lines.push('');
  lines.push(`**Total time:** ${formatDuration(summary.totalSeconds)}`);
  lines.push(`- Rule-matched: ${formatDuration(summary.ruleBasedSeconds)}`);
  lines.push(`- Manual entries: ${formatDuration(summary.manualSeconds)}`);
  lines.push('');
  if (summary.ruleBasedSeconds > 0 && summary.manualSeconds > 0) {
    lines.push('> Manual entries are added to rule-matched time; overlapping periods count twice.');
    lines.push('');
  }
  pushWarnings(lines, summary.warnings);

  if (summary.matchedApps.length > 0) {
    lines.push('## Matched Applications');
    lines.push('');
    lines.push('| App | Time |');
    lines.push('|-----|------|');
    for (const app of summary.matchedApps) {
      lines.push(`| ${cell(app.app)} | ${formatDuration(app.seconds)} |`);
    }
  }

  if (summary.manualEntries.length > 0) {
    lines.push('');
    lines.push('## Manual Entries');
    lines.push('');
    lines.push('| Start | End | Time | Notes |');
    lines.push('|-------|-----|------|-------|');
    for (const entry of summary.manualEntries) {
      lines.push(
        `| ${entry.start} | ${entry.end} | ${formatDuration(entry.overlapSeconds)} | ${cell(entry.notes ?? '')} |`
      );
    }
  }

  return lines.join('\n');
}

export function renderProductivityMarkdown(summary: ProductivitySummary): string {
  const lines: string[] = [];

  lines.push(`# Productivity Report — ${period(summary.range)}`);
  lines.push('');
  lines.push(`**Active time:** ${formatDuration(summary.totalSeconds)}`);
  lines.push('');
  pushWarnings(lines, summary.warnings);

  lines.push('| Category | Time | Share |');
  lines.push('|----------|------|-------|');
  lines.push(`| Productive | ${formatDuration(summary.productiveSeconds)} | ${summary.percentages.productive}% |`);
  lines.push(`| Neutral | ${formatDuration(summary.neutralSeconds)} | ${summary.percentages.neutral}% |`);
  lines.push(
    `| Distracting | ${formatDuration(summary.distractingSeconds)} | ${summary.percentages.distracting}% |`
  );

  if (summary.byApp.length > 0) {
    lines.push('');
    lines.push('## By Application');
    lines.push('');
    lines.push('| App | Category | Time |');
    lines.push('|-----|----------|------|');
    for (const app of summary.byApp) {
      lines.push(`| ${cell(app.app)} | ${app.category} | ${formatDuration(app.seconds)} |`);
    }
  }

  return lines.join('\n');
}

export function renderFocusMarkdown(report: FocusReport): string {
  const lines: string[] = [];

  lines.push(`# Focus Sessions — ${period(report.range)}`);
  lines.push('');
  lines.push(
    `**Sessions:** ${report.sessions.length} of at least ${report.minMinutes}m, ${formatDuration(report.totalSeconds)} in total`
  );
  lines.push('');
  pushWarnings(lines, report.warnings);

  if (report.sessions.length === 0) {
    lines.push('No focus sessions found.');
    return lines.join('\n');
  }

  lines.push('| Day | Start | End | Focus | Duration |');
  lines.push('|-----|-------|-----|-------|----------|');
  for (const session of report.sessions) {
    const focus = session.context.project
      ? `${session.context.app} (${session.context.project})`
      : session.context.app;
    lines.push(
      `| ${formatDate(session.start)} | ${formatClock(session.start)} | ${formatClock(session.end)} | ${cell(focus)} | ${formatDuration(session.durationSeconds)} |`
    );
  }

  return lines.join('\n');
}

function hourLabel(hour: number): string {
  return `${String(hour).padStart(2, '0')}:00`;
}

export function formatWorkBlock(block: WorkBlock): string {
  if (block.startHour === block.endHour) return hourLabel(block.startHour);
  return `${hourLabel(block.startHour)}-${String(block.endHour).padStart(2, '0')}:59`;
}

function fileName(file: string): string {
  return file.split(/[\\/]/).pop() ?? file;
}

/**
 * A narrative day report: overview, a 24-hour timeline, top apps, focus,
 * parallel work, key activities and editor activity
 */
export function renderStoryMarkdown(story: ActivityStory): string {
  const lines: string[] = [];
  const { active } = story;
  const blocks = story.workBlocks.map(formatWorkBlock);
  const longest = Math.max(0, ...story.focus.map((s) => s.durationSeconds));

  lines.push(`# Activity Story — ${formatLongDate(story.range.start)}`);
  lines.push('');
  lines.push(`> **${formatDuration(active.activeSeconds)}** active (${active.activePct}% of tracked time)  `);
  lines.push(`> Work blocks: ${blocks.length > 0 ? blocks.join(', ') : 'none detected'}  `);
  lines.push(
    `> Focus sessions: ${story.focus.length}${story.focus.length > 0 ? ` (longest: ${formatDuration(longest)})` : ''}`
  );
  lines.push('');
  pushWarnings(lines, story.warnings);

  lines.push('## Hourly Timeline');
  lines.push('');
  lines.push('```');
  const byHour = new Map(story.hourly.map((h) => [h.hour, h]));
  const max = Math.max(0, ...story.hourly.map((h) => h.seconds));
  for (let hour = 0; hour < 24; hour++) {
    const label = hourLabel(hour);
    const activity = byHour.get(label);
    if (!activity) {
      lines.push(`  ${label}  ${'·'.repeat(STORY_BAR_WIDTH)}`);
      continue;
    }
    const filled = bar(activity.seconds, max, STORY_BAR_WIDTH);
    const track = filled + '░'.repeat(STORY_BAR_WIDTH - filled.length);
    lines.push(`  ${label}  ${track}  ${formatDuration(activity.seconds)}  ${activity.topApp}`);
  }
  lines.push('```');
  lines.push('');

  if (story.apps.top.length > 0) {
    lines.push('## Top Applications');
    lines.push('');
    lines.push('| App | Time | Share |');
    lines.push('|-----|------|-------|');
    for (const app of story.apps.top.slice(0, 10)) {
      const share = formatPercent(app.seconds, active.activeSeconds);
      lines.push(`| ${cell(app.app ?? app.key)} | ${formatDuration(app.seconds)} | ${share}% |`);
    }
    lines.push('');
  }

  if (story.focus.length > 0) {
    lines.push('## Focus Sessions');
    lines.push('');
    story.focus.forEach((session, index) => {
      lines.push(`${index + 1}. **${formatDuration(session.durationSeconds)}** starting ${formatClock(session.start)}`);
      const apps = session.topApps.slice(0, 3).map((a) => `${a.app ?? a.key} (${formatDuration(a.seconds)})`);
      if (apps.length > 0) lines.push(`   Apps: ${apps.join(', ')}`);
    });
    lines.push('');
  }

  const edits = story.parallel.backgroundEdits;
  if (edits.length > 0) {
    lines.push('## Parallel Work');
    lines.push('');
    lines.push(
      `Detected **${edits.length} background edit${edits.length === 1 ? '' : 's'}** (editor changes while another app had focus):`
    );
    lines.push('');
    for (const item of story.parallel.summary) {
      const files = item.files
        .slice(0, 5)
        .map((f) => `\`${fileName(f)}\``)
        .join(', ');
      lines.push(`- While in **${item.focusedApp}**: edited ${files} (${item.edits} edit${item.edits === 1 ? '' : 's'})`);
    }
    lines.push('');
  }

  lines.push('## Key Activities');
  lines.push('');
  lines.push('| Application | What | Time |');
  lines.push('|-------------|------|------|');
  const seen = new Set<string>();
  for (const t of story.titles.top.slice(0, 15)) {
    const app = t.app ?? '';
    const what = truncate((t.title ?? '').trim(), STORY_TITLE_WIDTH);
    const key = `${app}\u0000${what}`;
    if (seen.has(key)) continue;
    seen.add(key);
    lines.push(`| ${cell(app)} | ${cell(what)} | ${formatDuration(t.seconds)} |`);
  }

  const editor = [
    editorLine('Languages', story.editor.languages),
    editorLine('Projects', story.editor.projects),
  ].filter((line): line is string => line !== null);
  if (editor.length > 0) {
    lines.push('');
    lines.push('## Editor Activity');
    lines.push('');
    lines.push(...editor);
  }

  return lines.join('\n');
}
