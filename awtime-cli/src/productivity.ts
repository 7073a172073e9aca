/**
 * Productivity Classifier
 *
 * Sorts active time into productive, neutral and distracting buckets
 * using the category rules from the user configuration.
 */

import { formatPercent } from './format.js';
import { compileRules, matchesAny, type RuleMatcher } from './rules.js';
import type { CategoryRules, EventContext, NormalizedInterval, ProductivityCategory } from './types.js';

export interface AppCategoryTotal {
  app: string;
  category: ProductivityCategory;
  seconds: number;
}

export interface ProductivityReport {
  productiveSeconds: number;
  neutralSeconds: number;
  distractingSeconds: number;
  totalSeconds: number;
  percentages: Record<ProductivityCategory, number>;
  byApp: AppCategoryTotal[];
}

export class ProductivityClassifier {
  private readonly productive: RuleMatcher[];
  private readonly distracting: RuleMatcher[];

  constructor(categories: CategoryRules) {
    this.productive = compileRules(categories.productive);
    this.distracting = compileRules(categories.distracting);
  }

  /**
   * Productive rules win over distracting ones; anything unmatched is neutral
   */
  classify(context: EventContext): ProductivityCategory {
    if (matchesAny(this.productive, context)) return 'productive';
    if (matchesAny(this.distracting, context)) return 'distracting';
    return 'neutral';
  }

  report(intervals: NormalizedInterval[]): ProductivityReport {
    const totals: Record<ProductivityCategory, number> = { productive: 0, neutral: 0, distracting: 0 };
    const byApp = new Map<string, AppCategoryTotal>();

    for (const interval of intervals) {
      if (interval.activeSeconds <= 0) continue;
      const category = this.classify(interval.context);
      totals[category] += interval.activeSeconds;

      const key = `${interval.context.app}\u0000${category}`;
      const entry = byApp.get(key);
      if (entry) {
        entry.seconds += interval.activeSeconds;
      } else {
        byApp.set(key, { app: interval.context.app, category, seconds: interval.activeSeconds });
      }
    }

    const totalSeconds = totals.productive + totals.neutral + totals.distracting;
    return {
      productiveSeconds: totals.productive,
      neutralSeconds: totals.neutral,
      distractingSeconds: totals.distracting,
      totalSeconds,
      percentages: {
        productive: formatPercent(totals.productive, totalSeconds),
        neutral: formatPercent(totals.neutral, totalSeconds),
        distracting: formatPercent(totals.distracting, totalSeconds),
      },
      byApp: [...byApp.values()].sort((a, b) => b.seconds - a.seconds),
    };
  }
}

export function productivityReport(
  intervals: NormalizedInterval[],
  categories: CategoryRules
): ProductivityReport {
  return new ProductivityClassifier(categories).report(intervals);
}
