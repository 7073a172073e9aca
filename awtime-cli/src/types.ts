/**
 * Core types for awtime
 */

export type BucketType =
  | 'currentwindow'
  | 'afkstatus'
  | 'web.tab.current'
  | 'app.editor.activity'
  | (string & {});

export const WINDOW_BUCKET: BucketType = 'currentwindow';
export const AFK_BUCKET: BucketType = 'afkstatus';
export const EDITOR_BUCKET: BucketType = 'app.editor.activity';
export const BROWSER_BUCKET: BucketType = 'web.tab.current';

export interface Bucket {
  id: string;
  type: BucketType;
  client: string;
  hostname: string;
  created: Date;
}

export interface BucketSummary extends Bucket {
  eventCount: number;
  firstEvent?: Date;
  lastEvent?: Date;
}

export interface BucketInfo {
  bucket: Bucket;
  eventCount: number;
  firstEvent?: Date;
  lastEvent?: Date;
  totalDuration: number;
  sampleEvents: ActivityEvent[];
}

export type EventData = Record<string, unknown>;

export interface ActivityEvent {
  id: number;
  bucketId: string;
  timestamp: Date;
  /** Seconds */
  duration: number;
  data: EventData;
}

export interface WindowEventData {
  app: string;
  title: string;
}

export interface AfkEventData {
  status: 'afk' | 'not-afk';
}

export interface EditorEventData {
  language: string;
  file: string;
  project: string;
}

export interface TimeRange {
  start: Date;
  end: Date;
}

/** Millisecond span, half-open */
export interface Span {
  start: number;
  end: number;
}

/**
 * What an event was "about". Windows carry app/title, browser tabs add the
 * url, editor heartbeats add project/file/language.
 */
export interface EventContext {
  app: string;
  title: string;
  project?: string;
  url?: string;
  language?: string;
  file?: string;
}

export interface NormalizedInterval {
  start: Date;
  end: Date;
  context: EventContext;
  hostname: string;
  bucketId: string;
  durationSeconds: number;
  activeSeconds: number;
  active: boolean;
  eventCount: number;
}

export interface NormalizationResult {
  range: TimeRange;
  intervals: NormalizedInterval[];
  afkFiltered: boolean;
  notAfkSpans: Span[];
  afkSpans: Span[];
  warnings: string[];
}

export type GroupBy = 'day' | 'hour' | 'app' | 'title';

export interface GroupTotal {
  key: string;
  seconds: number;
  app?: string;
  title?: string;
}

export interface Aggregation {
  groupBy: GroupBy;
  totalSeconds: number;
  groups: GroupTotal[];
  top: GroupTotal[];
}

export interface FocusSession {
  start: Date;
  end: Date;
  context: EventContext;
  durationSeconds: number;
  intervalCount: number;
}

export interface ProjectRules {
  app_patterns?: string[];
  title_patterns?: string[];
  title_regex?: string;
}

export interface Project {
  name: string;
  rules: ProjectRules;
}

export interface ManualTimeTag {
  id: string;
  start: string;
  end: string;
  project: string;
  notes?: string;
}

export type ProductivityCategory = 'productive' | 'neutral' | 'distracting';

export type CategoryRules = Record<ProductivityCategory, ProjectRules>;

export interface AnalysisSettings {
  mergeGapSeconds: number;
  focusToleranceSeconds: number;
  minFocusMinutes: number;
  topN: number;
}
