/**
 * Query Command
 *
 * Runs read-only SQL against the ActivityWatch tables.
 */

import chalk from 'chalk';
import { truncate } from '../format.js';
import type { Session } from './context.js';

function display(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function field(row: unknown, column: string): unknown {
  if (typeof row !== 'object' || row === null) return undefined;
  return Object.entries(row).find(([key]) => key === column)?.[1];
}

export function querySqlCommand(sql: string, session: Session): void {
  const result = session.store().runSql(sql);

  session.output(result.rows, () => {
    if (result.rows.length === 0) {
      console.log(chalk.gray('(no rows)'));
      return;
    }
    console.log(chalk.bold(result.columns.join('\t')));
    for (const row of result.rows) {
      console.log(result.columns.map((c) => truncate(display(field(row, c)), 60)).join('\t'));
    }
    console.log(chalk.gray(`\n${result.rows.length} row${result.rows.length === 1 ? '' : 's'}`));
  });
}
