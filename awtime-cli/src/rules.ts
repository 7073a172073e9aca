/**
 * Rule tables
 *
 * Project rules and productivity category rules share one shape. Each rule
 * set compiles into a list of matchers that are OR-combined.
 */

import { ValidationError } from './errors.js';
import type { EventContext, ProjectRules } from './types.js';

export type RuleMatcher =
  | { kind: 'app-substring'; pattern: string }
  | { kind: 'title-substring'; pattern: string }
  | { kind: 'title-regex'; source: string; regex: RegExp };

export function compileRegex(source: string): RegExp {
  try {
    return new RegExp(source, 'i');
  } catch (error) {
    throw new ValidationError(
      `Invalid title_regex "${source}": ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

export function compileRules(rules: ProjectRules): RuleMatcher[] {
  const matchers: RuleMatcher[] = [];

  for (const pattern of rules.app_patterns ?? []) {
    if (pattern.trim()) matchers.push({ kind: 'app-substring', pattern: pattern.toLowerCase() });
  }
  for (const pattern of rules.title_patterns ?? []) {
    if (pattern.trim()) matchers.push({ kind: 'title-substring', pattern: pattern.toLowerCase() });
  }
  if (rules.title_regex) {
    matchers.push({
      kind: 'title-regex',
      source: rules.title_regex,
      regex: compileRegex(rules.title_regex),
    });
  }

  return matchers;
}

export function matches(matcher: RuleMatcher, context: EventContext): boolean {
  switch (matcher.kind) {
    case 'app-substring':
      return context.app.toLowerCase().includes(matcher.pattern);
    case 'title-substring':
      return context.title.toLowerCase().includes(matcher.pattern);
    case 'title-regex':
      return matcher.regex.test(context.title);
  }
}

export function matchesAny(matchers: RuleMatcher[], context: EventContext): boolean {
  return matchers.some((m) => matches(m, context));
}

export function describeMatcher(matcher: RuleMatcher): string {
  switch (matcher.kind) {
    case 'app-substring':
      return `app contains "${matcher.pattern}"`;
    case 'title-substring':
      return `title contains "${matcher.pattern}"`;
    case 'title-regex':
      return `title matches /${matcher.source}/i`;
  }
}
