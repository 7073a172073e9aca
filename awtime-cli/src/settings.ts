/**
 * Settings
 *
 * Locates the ActivityWatch database and the user configuration file.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { StoreUnavailableError } from './errors.js';

export const DB_PATH_ENV = 'ACTIVITYWATCH_DB_PATH';
export const CONFIG_PATH_ENV = 'AWTIME_CONFIG';

const SERVER_DIRS = ['aw-server', 'aw-server-rust'];
const DB_FILES = ['peewee-sqlite.v2.db', 'sqlite.db'];

/**
 * ActivityWatch's data directory for the current platform
 */
function dataDir(env: NodeJS.ProcessEnv): string {
  const homeDir = os.homedir();
  const platform = os.platform();

  if (platform === 'darwin') {
    return path.join(homeDir, 'Library/Application Support/activitywatch');
  }
  if (platform === 'win32') {
    const localAppData = env.LOCALAPPDATA || path.join(homeDir, 'AppData/Local');
    return path.join(localAppData, 'activitywatch/activitywatch');
  }
  const xdgData = env.XDG_DATA_HOME || path.join(homeDir, '.local/share');
  return path.join(xdgData, 'activitywatch');
}

export function candidateDbPaths(env: NodeJS.ProcessEnv = process.env): string[] {
  const base = dataDir(env);
  const candidates: string[] = [];
  for (const server of SERVER_DIRS) {
    for (const file of DB_FILES) {
      candidates.push(path.join(base, server, file));
    }
  }
  return candidates;
}

/**
 * Resolve the database path: the environment override if set, else the
 * first existing file in the platform's data directory.
 */
export function resolveDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env[DB_PATH_ENV];
  if (explicit) {
    if (!fs.existsSync(explicit)) {
      throw new StoreUnavailableError(`${DB_PATH_ENV} points to ${explicit}, which does not exist`);
    }
    return explicit;
  }

  const candidates = candidateDbPaths(env);
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new StoreUnavailableError(
    `ActivityWatch database not found (looked in ${path.dirname(path.dirname(candidates[0]))}). ` +
      `Has ActivityWatch been run at least once? Set ${DB_PATH_ENV} to point at it.`
  );
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_PATH_ENV] || path.join(os.homedir(), '.config/awtime/config.json');
}
