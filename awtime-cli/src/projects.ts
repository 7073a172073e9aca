/**
 * Project Matcher
 *
 * Attributes time to user-defined projects, either by matching intervals
 * against the project's rules or through manually tagged time ranges.
 *
 * Manual and rule-based time are summed independently. A tag covering a
 * period that the rules also matched is counted twice; totals for such
 * projects overstate the real time.
 */

import { NotFoundError, ValidationError } from './errors.js';
import { compileRules, matchesAny } from './rules.js';
import { overlapMs } from './time.js';
import type { ManualTimeTag, NormalizedInterval, Project, ProjectRules, TimeRange } from './types.js';
import { RulesSchema, type ConfigStore, type UserConfig, formatZodError } from './userConfig.js';

export interface MatchedApp {
  app: string;
  seconds: number;
}

export interface ManualEntryOverlap extends ManualTimeTag {
  overlapSeconds: number;
}

export interface ProjectTime {
  project: string;
  start: Date;
  end: Date;
  ruleBasedSeconds: number;
  manualSeconds: number;
  totalSeconds: number;
  matchedApps: MatchedApp[];
  manualEntries: ManualEntryOverlap[];
}

export interface ProjectListing {
  name: string;
  rules: ProjectRules;
  manualTags: number;
}

/**
 * Active seconds of the intervals any of the project's rules match
 */
export function matchDuration(intervals: NormalizedInterval[], project: Project): number {
  return matchIntervals(intervals, project).reduce((sum, i) => sum + i.activeSeconds, 0);
}

export function matchIntervals(intervals: NormalizedInterval[], project: Project): NormalizedInterval[] {
  const matchers = compileRules(project.rules);
  if (matchers.length === 0) return [];
  return intervals.filter((i) => i.active && matchesAny(matchers, i.context));
}

/**
 * Seconds of each tag that fall inside the range
 */
export function manualOverlaps(tags: ManualTimeTag[], range: TimeRange): ManualEntryOverlap[] {
  const rangeStart = range.start.getTime();
  const rangeEnd = range.end.getTime();
  const overlaps: ManualEntryOverlap[] = [];
  for (const tag of tags) {
    const ms = overlapMs(new Date(tag.start).getTime(), new Date(tag.end).getTime(), rangeStart, rangeEnd);
    if (ms > 0) overlaps.push({ ...tag, overlapSeconds: ms / 1000 });
  }
  return overlaps;
}

function newTagId(): string {
  return `tag-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Project definitions and manual tags backed by the user configuration.
 * Mutations are written through to the store immediately.
 */
export class ProjectRegistry {
  constructor(
    private readonly config: UserConfig,
    private readonly store: ConfigStore
  ) {}

  getProject(name: string): Project {
    const entry = this.config.document.projects[name];
    if (entry) return { name, rules: entry.rules };
    // Tagged but never defined: known, with nothing to match on
    if (this.listTags(name).length > 0) return { name, rules: {} };
    throw new NotFoundError(`Project not found: ${name}`);
  }

  listProjects(): ProjectListing[] {
    const names = new Set(Object.keys(this.config.document.projects));
    for (const tag of this.config.document.manual_tags) names.add(tag.project);

    return [...names].sort().map((name) => ({
      name,
      rules: this.config.document.projects[name]?.rules ?? {},
      manualTags: this.listTags(name).length,
    }));
  }

  defineProject(name: string, rules: ProjectRules): Project {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new ValidationError('Project name must not be empty');
    }
    const parsed = RulesSchema.safeParse(rules);
    if (!parsed.success) {
      throw new ValidationError(`Invalid rules: ${formatZodError(parsed.error)}`);
    }
    // Surfaces a bad regex before anything is written
    compileRules(parsed.data);

    this.config.document.projects[trimmed] = { rules: parsed.data };
    this.store.save(this.config);
    return { name: trimmed, rules: parsed.data };
  }

  deleteProject(name: string): void {
    if (!Object.hasOwn(this.config.document.projects, name)) {
      throw new NotFoundError(`Project not found: ${name}`);
    }
    delete this.config.document.projects[name];
    this.store.save(this.config);
  }

  tagTime(range: TimeRange, project: string, notes?: string): ManualTimeTag {
    const name = project.trim();
    if (!name) {
      throw new ValidationError('Project name must not be empty');
    }
    if (range.end.getTime() <= range.start.getTime()) {
      throw new ValidationError('Tag end must be after its start');
    }

    const tag: ManualTimeTag = {
      id: newTagId(),
      start: range.start.toISOString(),
      end: range.end.toISOString(),
      project: name,
    };
    if (notes) tag.notes = notes;

    this.config.document.manual_tags.push(tag);
    this.store.save(this.config);
    return tag;
  }

  untagTime(id: string): ManualTimeTag {
    const index = this.config.document.manual_tags.findIndex((t) => t.id === id);
    if (index < 0) {
      throw new NotFoundError(`Manual tag not found: ${id}`);
    }
    const [removed] = this.config.document.manual_tags.splice(index, 1);
    this.store.save(this.config);
    return removed;
  }

  listTags(project?: string): ManualTimeTag[] {
    const tags = this.config.document.manual_tags;
    return project === undefined ? [...tags] : tags.filter((t) => t.project === project);
  }

  /**
   * Rule-matched plus manually tagged time for a project over a range.
   * `intervals` must already be clipped to the range.
   */
  projectTime(name: string, intervals: NormalizedInterval[], range: TimeRange): ProjectTime {
    const project = this.getProject(name);

    const byApp = new Map<string, number>();
    for (const interval of matchIntervals(intervals, project)) {
      const app = interval.context.app;
      byApp.set(app, (byApp.get(app) ?? 0) + interval.activeSeconds);
    }
    const matchedApps = [...byApp.entries()]
      .map(([app, seconds]) => ({ app, seconds }))
      .sort((a, b) => b.seconds - a.seconds);
    const ruleBasedSeconds = matchedApps.reduce((sum, a) => sum + a.seconds, 0);

    const manualEntries = manualOverlaps(this.listTags(name), range);
    const manualSeconds = manualEntries.reduce((sum, e) => sum + e.overlapSeconds, 0);

    return {
      project: name,
      start: range.start,
      end: range.end,
      ruleBasedSeconds,
      manualSeconds,
      totalSeconds: ruleBasedSeconds + manualSeconds,
      matchedApps,
      manualEntries,
    };
  }
}
