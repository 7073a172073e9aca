/**
 * Info Command
 *
 * Shows where the database and configuration live and how much data
 * the store holds.
 */

import chalk from 'chalk';
import { formatDate } from '../format.js';
import type { Session } from './context.js';

export function infoCommand(session: Session): void {
  const info = session.store().info();
  const config = session.config();
  const projects = Object.keys(config.document.projects).length;
  const tags = config.document.manual_tags.length;

  session.output(
    {
      db_path: info.path,
      config_path: config.path,
      bucket_count: info.bucketCount,
      event_count: info.eventCount,
      hostnames: info.hostnames,
      first_event: info.firstEvent?.toISOString() ?? null,
      last_event: info.lastEvent?.toISOString() ?? null,
      projects,
      manual_tags: tags,
      warnings: config.warnings,
    },
    () => {
      console.log(chalk.bold('\nActivityWatch store\n'));
      console.log(`  Database:  ${info.path}`);
      console.log(`  Config:    ${config.path}`);
      console.log(`  Buckets:   ${info.bucketCount}`);
      console.log(`  Events:    ${info.eventCount}`);
      console.log(`  Hosts:     ${info.hostnames.join(', ') || chalk.gray('none')}`);
      if (info.firstEvent && info.lastEvent) {
        console.log(`  Data from: ${formatDate(info.firstEvent)} to ${formatDate(info.lastEvent)}`);
      }
      console.log(`  Projects:  ${projects} (${tags} manual tags)`);
      console.log();
    }
  );
}
