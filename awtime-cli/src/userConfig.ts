/**
 * User configuration
 *
 * Projects, manual time tags, productivity categories and analysis
 * tunables live in one JSON document owned by the user. It is read once
 * per invocation and rewritten wholesale when something is defined,
 * deleted or tagged.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ZodError, z } from 'zod';
import { DEFAULT_TOP_N } from './aggregator.js';
import { ConfigCorruptError, ValidationError } from './errors.js';
import { DEFAULT_FOCUS_TOLERANCE_SECONDS, DEFAULT_MIN_FOCUS_MINUTES } from './focus.js';
import { logger } from './logger.js';
import { DEFAULT_MERGE_GAP_SECONDS } from './normalizer.js';
import type { AnalysisSettings, CategoryRules, ManualTimeTag, ProjectRules } from './types.js';

export const RulesSchema = z
  .object({
    app_patterns: z.array(z.string()).optional(),
    title_patterns: z.array(z.string()).optional(),
    title_regex: z.string().optional(),
  })
  .strict();

// Older configs list plain app names per category
const CategoryRulesSchema = z.union([
  z.array(z.string()).transform((apps): ProjectRules => ({ app_patterns: apps })),
  RulesSchema,
]);

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(new Date(value).getTime()), 'must be an ISO-8601 timestamp');

export const ManualTagSchema = z.object({
  id: z.string().min(1),
  start: isoTimestamp,
  end: isoTimestamp,
  project: z.string().min(1),
  notes: z.string().optional(),
});

// Earlier releases kept manual time under each project
const LegacyManualEntrySchema = z.object({
  start: isoTimestamp,
  end: isoTimestamp,
  notes: z.string().optional(),
});

const ProjectEntrySchema = z.object({
  rules: RulesSchema.default({}),
  manual_entries: z.array(LegacyManualEntrySchema).optional(),
});

const ConfigFileSchema = z.object({
  projects: z.record(z.string(), ProjectEntrySchema).default({}),
  manual_tags: z.array(ManualTagSchema).default([]),
  categories: z
    .object({
      productive: CategoryRulesSchema.optional(),
      neutral: CategoryRulesSchema.optional(),
      distracting: CategoryRulesSchema.optional(),
    })
    .optional(),
  analysis: z
    .object({
      merge_gap_seconds: z.number().nonnegative().optional(),
      focus_tolerance_seconds: z.number().nonnegative().optional(),
      min_focus_minutes: z.number().positive().optional(),
      top_n: z.number().int().positive().optional(),
    })
    .optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type ConfigDocument = Omit<ConfigFile, 'projects'> & {
  projects: Record<string, { rules: ProjectRules }>;
};

export interface UserConfig {
  path: string;
  document: ConfigDocument;
  /** Problems found while loading, shown alongside results */
  warnings: string[];
  /** Set when the file exists but could not be used */
  corrupt: ConfigCorruptError | null;
}

export const DEFAULT_CATEGORIES: CategoryRules = {
  productive: { app_patterns: ['Code', 'iTerm2', 'Terminal', 'Notion', 'Cursor'] },
  neutral: { app_patterns: ['Slack', 'Mail', 'Calendar', 'Microsoft Teams', 'Zoom'] },
  distracting: { app_patterns: ['Twitter', 'Reddit', 'YouTube', 'Instagram', 'TikTok'] },
};

export function emptyDocument(): ConfigDocument {
  return { projects: {}, manual_tags: [] };
}

/**
 * Move per-project `manual_entries` into `manual_tags`. Ids are derived
 * from the project name and the entry's position.
 */
export function liftManualEntries(file: ConfigFile): { document: ConfigDocument; lifted: number } {
  const projects: ConfigDocument['projects'] = {};
  const manualTags = [...file.manual_tags];
  let lifted = 0;

  for (const [name, entry] of Object.entries(file.projects)) {
    projects[name] = { rules: entry.rules };
    (entry.manual_entries ?? []).forEach((legacy, index) => {
      const tag: ManualTimeTag = { id: `${name}-${index + 1}`, start: legacy.start, end: legacy.end, project: name };
      if (legacy.notes) tag.notes = legacy.notes;
      manualTags.push(tag);
      lifted += 1;
    });
  }

  return { document: { ...file, projects, manual_tags: manualTags }, lifted };
}

export function formatZodError(error: ZodError): string {
  const first = error.issues[0];
  if (!first) return 'invalid value';
  const where = first.path.length ? first.path.join('.') : 'document';
  return `${where}: ${first.message}`;
}

/**
 * Parse project rules given as JSON text on the command line
 */
export function parseRulesJson(text: string): ProjectRules {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Rules must be JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  const parsed = RulesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid rules: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function analysisSettings(config: UserConfig): AnalysisSettings {
  const analysis = config.document.analysis ?? {};
  return {
    mergeGapSeconds: analysis.merge_gap_seconds ?? DEFAULT_MERGE_GAP_SECONDS,
    focusToleranceSeconds: analysis.focus_tolerance_seconds ?? DEFAULT_FOCUS_TOLERANCE_SECONDS,
    minFocusMinutes: analysis.min_focus_minutes ?? DEFAULT_MIN_FOCUS_MINUTES,
    topN: analysis.top_n ?? DEFAULT_TOP_N,
  };
}

/**
 * Category rules in evaluation form. A config without a categories section
 * gets the built-in defaults.
 */
export function categoryRules(config: UserConfig): CategoryRules {
  const categories = config.document.categories;
  if (!categories) return DEFAULT_CATEGORIES;
  return {
    productive: categories.productive ?? {},
    neutral: categories.neutral ?? {},
    distracting: categories.distracting ?? {},
  };
}

export class ConfigStore {
  constructor(readonly configPath: string) {}

  load(): UserConfig {
    if (!fs.existsSync(this.configPath)) {
      logger.debug('No configuration at', this.configPath);
      return { path: this.configPath, document: emptyDocument(), warnings: [], corrupt: null };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.fallback(
        new ConfigCorruptError(this.configPath, `Cannot read ${this.configPath}: ${reason}`, {
          cause: error,
        })
      );
    }

    const parsed = ConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      return this.fallback(
        new ConfigCorruptError(
          this.configPath,
          `Invalid configuration in ${this.configPath}: ${formatZodError(parsed.error)}`,
          { cause: parsed.error }
        )
      );
    }

    const { document, lifted } = liftManualEntries(parsed.data);
    const warnings: string[] = [];
    if (lifted > 0) {
      const warning = `Moved ${lifted} manual entr${lifted === 1 ? 'y' : 'ies'} from projects.*.manual_entries into manual_tags; the file is rewritten in that layout on the next change`;
      logger.warn(warning);
      warnings.push(warning);
    }
    return { path: this.configPath, document, warnings, corrupt: null };
  }

  /**
   * Write the whole document. Refuses to overwrite a file that failed to
   * load, since the fallback holds none of its content.
   */
  save(config: UserConfig): void {
    if (config.corrupt) {
      throw config.corrupt;
    }
    fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
    fs.writeFileSync(this.configPath, `${JSON.stringify(config.document, null, 2)}\n`, 'utf-8');
    logger.debug('Saved configuration to', this.configPath);
  }

  private fallback(error: ConfigCorruptError): UserConfig {
    const warning = `${error.message}. Continuing with no projects or categories.`;
    logger.warn(warning);
    return {
      path: this.configPath,
      document: {
        projects: {},
        manual_tags: [],
        categories: { productive: {}, neutral: {}, distracting: {} },
      },
      warnings: [warning],
      corrupt: error,
    };
  }
}
