/**
 * Project Commands
 *
 * Define projects by rules, tag time manually, and report time spent.
 */

import chalk from 'chalk';
import { ValidationError } from '../errors.js';
import { formatDuration } from '../format.js';
import { toStructuredProject } from '../report.js';
import { compileRules, describeMatcher } from '../rules.js';
import { parseRangeArgs } from '../time.js';
import type { ManualTimeTag, ProjectRules } from '../types.js';
import { parseRulesJson } from '../userConfig.js';
import type { Session } from './context.js';

export interface ProjectDefineOptions {
  rules?: string;
  app?: string[];
  title?: string[];
  regex?: string;
}

export interface ProjectRangeOptions {
  start: string;
  end: string;
}

export interface ProjectTagOptions extends ProjectRangeOptions {
  notes?: string;
}

function rulesFromOptions(options: ProjectDefineOptions): ProjectRules {
  if (options.rules) {
    if (options.app || options.title || options.regex) {
      throw new ValidationError('Use either --rules or --app/--title/--regex, not both');
    }
    return parseRulesJson(options.rules);
  }

  const rules: ProjectRules = {};
  if (options.app?.length) rules.app_patterns = options.app;
  if (options.title?.length) rules.title_patterns = options.title;
  if (options.regex) rules.title_regex = options.regex;
  if (Object.keys(rules).length === 0) {
    throw new ValidationError('Give --rules or at least one of --app, --title, --regex');
  }
  return rules;
}

function printTag(tag: ManualTimeTag): void {
  const seconds = (Date.parse(tag.end) - Date.parse(tag.start)) / 1000;
  const notes = tag.notes ? chalk.gray(` — ${tag.notes}`) : '';
  console.log(`  ${chalk.cyan(tag.id)}  ${tag.project}  ${tag.start} → ${tag.end}  (${formatDuration(seconds)})${notes}`);
}

export function projectListCommand(session: Session): void {
  const projects = session.projects().listProjects();

  const structured = projects.map((p) => ({ name: p.name, rules: p.rules, manual_tags: p.manualTags }));

  session.output(structured, () => {
    if (projects.length === 0) {
      console.log(chalk.gray('No projects defined. Add one with "awtime project define <name> --app <pattern>".'));
      return;
    }
    console.log(chalk.bold(`\n${projects.length} project${projects.length === 1 ? '' : 's'}\n`));
    for (const project of projects) {
      console.log(`  ${chalk.cyan(project.name)}${project.manualTags ? chalk.gray(` (${project.manualTags} manual tags)`) : ''}`);
      const matchers = compileRules(project.rules);
      if (matchers.length === 0) {
        console.log(chalk.gray('    no rules'));
      }
      for (const matcher of matchers) {
        console.log(chalk.gray(`    ${describeMatcher(matcher)}`));
      }
    }
    console.log();
  });
}

export function projectDefineCommand(name: string, options: ProjectDefineOptions, session: Session): void {
  const project = session.projects().defineProject(name, rulesFromOptions(options));

  session.output({ status: 'ok', project: project.name, rules: project.rules }, () => {
    console.log(chalk.green(`✓ Project "${project.name}" saved`));
  });
}

export function projectDeleteCommand(name: string, session: Session): void {
  session.projects().deleteProject(name);

  session.output({ status: 'ok', deleted: name }, () => {
    console.log(chalk.green(`✓ Project "${name}" deleted`));
  });
}

export function projectTimeCommand(name: string, options: ProjectRangeOptions, session: Session): void {
  const range = parseRangeArgs(options.start, options.end);
  const summary = session.analyzer().projectTime(name, range);

  session.output(toStructuredProject(summary), () => {
    console.log(chalk.bold(`\n${summary.project}\n`));
    console.log(`Total:         ${chalk.green(formatDuration(summary.totalSeconds))}`);
    console.log(`Rule-matched:  ${formatDuration(summary.ruleBasedSeconds)}`);
    console.log(`Manual:        ${formatDuration(summary.manualSeconds)}`);
    if (summary.ruleBasedSeconds > 0 && summary.manualSeconds > 0) {
      console.log(chalk.gray('(manual time is added on top of rule-matched time)'));
    }
    if (summary.matchedApps.length > 0) {
      console.log(chalk.bold('\nMatched apps:'));
      for (const app of summary.matchedApps) {
        console.log(`  ${app.app.padEnd(30)} ${formatDuration(app.seconds).padStart(8)}`);
      }
    }
    console.log();
  });
}

export function projectTagCommand(project: string, options: ProjectTagOptions, session: Session): void {
  const range = parseRangeArgs(options.start, options.end);
  const tag = session.projects().tagTime(range, project, options.notes);

  session.output({ status: 'ok', tag }, () => {
    console.log(chalk.green(`✓ Tagged ${formatDuration((range.end.getTime() - range.start.getTime()) / 1000)} for "${tag.project}"`));
    console.log(chalk.gray(`  id: ${tag.id}`));
  });
}

export function projectUntagCommand(id: string, session: Session): void {
  const removed = session.projects().untagTime(id);

  session.output({ status: 'ok', removed }, () => {
    console.log(chalk.green(`✓ Removed tag ${removed.id} from "${removed.project}"`));
  });
}

export function projectTagsCommand(project: string | undefined, session: Session): void {
  const tags = session.projects().listTags(project);

  session.output(tags, () => {
    if (tags.length === 0) {
      console.log(chalk.gray('No manual tags.'));
      return;
    }
    for (const tag of tags) printTag(tag);
  });
}
