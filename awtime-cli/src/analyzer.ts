/**
 * Time Analyzer
 *
 * Pulls window and AFK events from the store, normalizes them per host,
 * and hands the intervals to the aggregation, focus, project and
 * productivity modules.
 */

import dayjs from 'dayjs';
import { aggregate, hourlyActivity, workBlocks, type HourActivity, type WorkBlock } from './aggregator.js';
import type { EventStore } from './collectors/eventStore.js';
import { ValidationError } from './errors.js';
import { formatPercent } from './format.js';
import { detectSessions } from './focus.js';
import { logger } from './logger.js';
import { mergeResults, normalize, totalActiveSeconds } from './normalizer.js';
import {
  buildTimeline,
  findBackgroundEdits,
  summarizeBackgroundEdits,
  type BackgroundEdit,
  type BackgroundSummary,
  type HostStreams,
  type TimelineEntry,
} from './parallel.js';
import { productivityReport, type ProductivityReport } from './productivity.js';
import { ProjectRegistry, type ProjectTime } from './projects.js';
import { dayRange, lastDaysRange, localDayKey, overlapMs, weekRange } from './time.js';
import {
  AFK_BUCKET,
  BROWSER_BUCKET,
  EDITOR_BUCKET,
  WINDOW_BUCKET,
  type ActivityEvent,
  type Aggregation,
  type AnalysisSettings,
  type Bucket,
  type FocusSession,
  type GroupBy,
  type GroupTotal,
  type NormalizationResult,
  type TimeRange,
} from './types.js';
import { ConfigStore, analysisSettings, categoryRules, type UserConfig } from './userConfig.js';

export interface AnalysisMeta {
  range: TimeRange;
  afkFiltered: boolean;
  warnings: string[];
}

export interface ActiveTime {
  activeSeconds: number;
  afkSeconds: number;
  /** Share of active time in active plus AFK time */
  activePct: number;
}

export interface DailySeconds {
  date: string;
  seconds: number;
}

export interface EditorTotal {
  key: string;
  seconds: number;
  events: number;
}

export interface EditorActivity extends AnalysisMeta {
  eventCount: number;
  languages: EditorTotal[];
  files: EditorTotal[];
  projects: EditorTotal[];
}

export interface DailySummary extends AnalysisMeta {
  date: string;
  active: ActiveTime;
  apps: Aggregation;
  titles: Aggregation;
  hours: Aggregation;
  editor: EditorActivity;
}

export interface WeeklySummary extends AnalysisMeta {
  weekStart: string;
  weekEnd: string;
  active: ActiveTime;
  days: DailySeconds[];
  apps: Aggregation;
}

export interface RangeSummary extends AnalysisMeta {
  aggregation: Aggregation;
}

export interface AppUsage extends AnalysisMeta {
  days: number;
  app?: string;
  totalSeconds: number;
  apps: GroupTotal[];
  titles: GroupTotal[];
  daily: DailySeconds[];
}

export interface FocusSessionDetail extends FocusSession {
  hostname: string;
  topApps: GroupTotal[];
}

export interface FocusReport extends AnalysisMeta {
  minMinutes: number;
  sessions: FocusSessionDetail[];
  totalSeconds: number;
}

export interface ProductivitySummary extends AnalysisMeta, ProductivityReport {}

export interface ProjectTimeSummary extends AnalysisMeta, ProjectTime {}

export interface ParallelActivity extends AnalysisMeta {
  backgroundEdits: BackgroundEdit[];
  summary: BackgroundSummary[];
  timeline: TimelineEntry[];
}

export interface ActivityStory extends AnalysisMeta {
  date: string;
  active: ActiveTime;
  apps: Aggregation;
  titles: Aggregation;
  hourly: HourActivity[];
  workBlocks: WorkBlock[];
  focus: FocusSessionDetail[];
  parallel: ParallelActivity;
  editor: EditorActivity;
}

/** Shortest focus session a day story mentions */
export const STORY_FOCUS_MINUTES = 20;

const STORY_TOP_N = 20;

export interface AnalyzerOptions {
  /** Only analyze buckets of this host */
  host?: string;
  now?: () => Date;
}

interface HostNormalization {
  hostname: string;
  result: NormalizationResult;
}

function concat(groups: Iterable<ActivityEvent[]>): ActivityEvent[] {
  return [...groups].flat();
}

function eventsOf(byBucket: Map<Bucket, ActivityEvent[]>, hostname: string): ActivityEvent[] {
  return concat([...byBucket.entries()].filter(([b]) => b.hostname === hostname).map(([, events]) => events));
}

function spanSeconds(spans: Array<{ start: number; end: number }>): number {
  return spans.reduce((sum, s) => sum + (s.end - s.start), 0) / 1000;
}

function eachDay(range: TimeRange): string[] {
  const days: string[] = [];
  for (let day = dayjs(range.start).startOf('day'); day.isBefore(range.end); day = day.add(1, 'day')) {
    days.push(day.format('YYYY-MM-DD'));
  }
  return days;
}

export class TimeAnalyzer {
  readonly settings: AnalysisSettings;
  readonly projects: ProjectRegistry;
  private readonly host?: string;
  private readonly now: () => Date;

  constructor(
    private readonly store: EventStore,
    private readonly config: UserConfig,
    options: AnalyzerOptions = {}
  ) {
    this.settings = analysisSettings(config);
    this.projects = new ProjectRegistry(config, new ConfigStore(config.path));
    this.host = options.host;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Window intervals over the range, each host normalized against its own
   * AFK buckets
   */
  normalizeRange(range: TimeRange): NormalizationResult {
    return this.merge(range, this.normalizeHosts(range));
  }

  activeTime(range: TimeRange): ActiveTime & AnalysisMeta {
    const normalized = this.normalizeRange(range);
    return { ...this.meta(normalized), ...this.activeFrom(normalized) };
  }

  dailySummary(date: Date): DailySummary {
    const range = dayRange(date);
    const normalized = this.normalizeRange(range);
    const { topN } = this.settings;
    const editor = this.editorActivity(range);

    return {
      ...this.meta(normalized),
      warnings: [...new Set([...normalized.warnings, ...editor.warnings])],
      date: localDayKey(range.start.getTime()),
      active: this.activeFrom(normalized),
      apps: aggregate(normalized.intervals, 'app', { topN }),
      titles: aggregate(normalized.intervals, 'title', { topN }),
      hours: aggregate(normalized.intervals, 'hour', { topN: 24 }),
      editor,
    };
  }

  weeklySummary(weekStart: Date): WeeklySummary {
    const range = weekRange(weekStart);
    const normalized = this.normalizeRange(range);
    const byDay = aggregate(normalized.intervals, 'day');
    const seconds = new Map(byDay.groups.map((g) => [g.key, g.seconds]));

    return {
      ...this.meta(normalized),
      weekStart: localDayKey(range.start.getTime()),
      // Last day of the week, inclusive
      weekEnd: localDayKey(range.end.getTime() - 1),
      active: this.activeFrom(normalized),
      days: eachDay(range).map((date) => ({ date, seconds: seconds.get(date) ?? 0 })),
      apps: aggregate(normalized.intervals, 'app', { topN: this.settings.topN }),
    };
  }

  rangeSummary(range: TimeRange, groupBy: GroupBy): RangeSummary {
    const normalized = this.normalizeRange(range);
    return {
      ...this.meta(normalized),
      aggregation: aggregate(normalized.intervals, groupBy, { topN: this.settings.topN }),
    };
  }

  /**
   * Usage over the last `days` days. With an app name, the titles and the
   * per-day breakdown of that app only.
   */
  appUsage(days: number, app?: string): AppUsage {
    const range = lastDaysRange(days, this.now());
    const normalized = this.normalizeRange(range);

    const wanted = app?.toLowerCase();
    const intervals = wanted
      ? normalized.intervals.filter((i) => i.context.app.toLowerCase() === wanted)
      : normalized.intervals;

    const byDay = aggregate(intervals, 'day');
    const seconds = new Map(byDay.groups.map((g) => [g.key, g.seconds]));
    const apps = aggregate(intervals, 'app', { topN: this.settings.topN });
    const titles = aggregate(intervals, 'title', { topN: this.settings.topN });

    const usage: AppUsage = {
      ...this.meta(normalized),
      days,
      totalSeconds: totalActiveSeconds(intervals),
      apps: apps.top,
      titles: titles.top,
      daily: eachDay(range).map((date) => ({ date, seconds: seconds.get(date) ?? 0 })),
    };
    if (app) usage.app = app;
    return usage;
  }

  /**
   * Focus sessions per host. AFK periods of the host split sessions.
   */
  focusSessions(range: TimeRange, minMinutes: number = this.settings.minFocusMinutes): FocusReport {
    if (!(minMinutes > 0)) {
      throw new ValidationError(`Minimum session length must be positive, got ${minMinutes}`);
    }
    const hosts = this.normalizeHosts(range);
    const normalized = this.merge(range, hosts);

    const sessions: FocusSessionDetail[] = [];
    for (const { hostname, result } of hosts) {
      const found = detectSessions(result.intervals, {
        minMinutes,
        toleranceSeconds: this.settings.focusToleranceSeconds,
        breaks: result.afkSpans,
      });
      for (const session of found) {
        const within = result.intervals.filter(
          (i) => overlapMs(i.start.getTime(), i.end.getTime(), session.start.getTime(), session.end.getTime()) > 0
        );
        sessions.push({ ...session, hostname, topApps: aggregate(within, 'app', { topN: 5 }).top });
      }
    }
    sessions.sort((a, b) => a.start.getTime() - b.start.getTime());

    return {
      ...this.meta(normalized),
      minMinutes,
      sessions,
      totalSeconds: sessions.reduce((sum, s) => sum + s.durationSeconds, 0),
    };
  }

  productivity(range: TimeRange): ProductivitySummary {
    const normalized = this.normalizeRange(range);
    return {
      ...this.meta(normalized),
      ...productivityReport(normalized.intervals, categoryRules(this.config)),
    };
  }

  projectTime(name: string, range: TimeRange): ProjectTimeSummary {
    // Resolve the project before touching the store
    this.projects.getProject(name);
    const normalized = this.normalizeRange(range);
    return {
      ...this.meta(normalized),
      ...this.projects.projectTime(name, normalized.intervals, range),
    };
  }

  /**
   * Languages, files and projects seen by editor watchers
   */
  editorActivity(range: TimeRange): EditorActivity {
    const buckets = this.store.getEventsByType(EDITOR_BUCKET, range, this.host);
    const events = concat(buckets.values());
    const rangeStart = range.start.getTime();
    const rangeEnd = range.end.getTime();

    const languages = new Map<string, EditorTotal>();
    const files = new Map<string, EditorTotal>();
    const projects = new Map<string, EditorTotal>();
    const add = (target: Map<string, EditorTotal>, key: unknown, seconds: number) => {
      if (typeof key !== 'string' || !key || key === 'unknown') return;
      const entry = target.get(key);
      if (entry) {
        entry.seconds += seconds;
        entry.events += 1;
      } else {
        target.set(key, { key, seconds, events: 1 });
      }
    };

    for (const event of events) {
      const start = event.timestamp.getTime();
      const seconds = overlapMs(start, start + event.duration * 1000, rangeStart, rangeEnd) / 1000;
      add(languages, event.data.language, seconds);
      add(files, event.data.file, seconds);
      add(projects, event.data.project, seconds);
    }

    const sorted = (m: Map<string, EditorTotal>) =>
      [...m.values()].sort((a, b) => b.seconds - a.seconds || b.events - a.events);

    return {
      range,
      afkFiltered: false,
      warnings: [...this.config.warnings],
      eventCount: events.length,
      languages: sorted(languages),
      files: sorted(files),
      projects: sorted(projects),
    };
  }

  /**
   * Editor edits made while another app had focus, and the window, editor
   * and browser streams interleaved
   */
  parallelActivities(range: TimeRange): ParallelActivity {
    const windows = this.store.getEventsByType(WINDOW_BUCKET, range, this.host);
    const editor = this.store.getEventsByType(EDITOR_BUCKET, range, this.host);
    const browser = this.store.getEventsByType(BROWSER_BUCKET, range, this.host);

    const hostnames = [
      ...new Set([...windows.keys(), ...editor.keys(), ...browser.keys()].map((b) => b.hostname)),
    ].sort();
    const streams: HostStreams[] = hostnames.map((hostname) => ({
      hostname,
      windows: eventsOf(windows, hostname),
      editor: eventsOf(editor, hostname),
      browser: eventsOf(browser, hostname),
    }));

    const backgroundEdits = streams
      .flatMap((host) => findBackgroundEdits(host, range))
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

    return {
      range,
      afkFiltered: false,
      warnings: [...this.config.warnings],
      backgroundEdits,
      summary: summarizeBackgroundEdits(backgroundEdits),
      timeline: buildTimeline(streams, range),
    };
  }

  /**
   * Everything known about one day, for the narrative report
   */
  activityStory(date: Date): ActivityStory {
    const range = dayRange(date);
    const normalized = this.normalizeRange(range);
    const hourly = hourlyActivity(normalized.intervals);

    return {
      ...this.meta(normalized),
      date: localDayKey(range.start.getTime()),
      active: this.activeFrom(normalized),
      apps: aggregate(normalized.intervals, 'app', { topN: STORY_TOP_N }),
      titles: aggregate(normalized.intervals, 'title', { topN: STORY_TOP_N }),
      hourly,
      workBlocks: workBlocks(hourly),
      focus: this.focusSessions(range, STORY_FOCUS_MINUTES).sessions,
      parallel: this.parallelActivities(range),
      editor: this.editorActivity(range),
    };
  }

  private normalizeHosts(range: TimeRange): HostNormalization[] {
    const windows = this.store.getEventsByType(WINDOW_BUCKET, range, this.host);
    const afk = this.store.getEventsByType(AFK_BUCKET, range, this.host);

    const hostnames = [...new Set([...windows.keys()].map((b) => b.hostname))].sort();
    if (hostnames.length === 0) {
      const where = this.host ? ` for host "${this.host}"` : '';
      logger.warn(`No window buckets found${where}`);
    }

    return hostnames.map((hostname) => {
      const hasAfk = [...afk.keys()].some((b) => b.hostname === hostname);
      const result = normalize(eventsOf(windows, hostname), {
        range,
        afkEvents: hasAfk ? eventsOf(afk, hostname) : undefined,
        mergeGapSeconds: this.settings.mergeGapSeconds,
        hostname,
      });
      for (const warning of result.warnings) logger.warn(warning);
      return { hostname, result };
    });
  }

  private merge(range: TimeRange, hosts: HostNormalization[]): NormalizationResult {
    const merged = mergeResults(range, hosts.map((h) => h.result));
    if (hosts.length === 0) {
      const where = this.host ? ` for host "${this.host}"` : '';
      merged.warnings.push(`No window buckets found${where}`);
    }
    return merged;
  }

  private meta(normalized: NormalizationResult): AnalysisMeta {
    return {
      range: normalized.range,
      afkFiltered: normalized.afkFiltered,
      warnings: [...this.config.warnings, ...normalized.warnings],
    };
  }

  private activeFrom(normalized: NormalizationResult): ActiveTime {
    const activeSeconds = totalActiveSeconds(normalized.intervals);
    const afkSeconds = spanSeconds(normalized.afkSpans);
    return {
      activeSeconds,
      afkSeconds,
      activePct: formatPercent(activeSeconds, activeSeconds + afkSeconds),
    };
  }
}
