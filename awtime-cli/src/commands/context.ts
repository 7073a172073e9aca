/**
 * Command plumbing
 *
 * Every action runs inside a Session that opens the store and loads the
 * configuration on first use, and inside runAction, which turns thrown
 * errors into an exit code and a one-line message.
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { TimeAnalyzer } from '../analyzer.js';
import { EventStore } from '../collectors/eventStore.js';
import { ValidationError, describeError } from '../errors.js';
import { logger, setLogLevel } from '../logger.js';
import { ProjectRegistry } from '../projects.js';
import { resolveConfigPath } from '../settings.js';
import { ConfigStore, type UserConfig } from '../userConfig.js';

// A type alias so it satisfies commander's OptionValues index signature
export type GlobalOptions = {
  host?: string;
  json?: boolean;
  verbose?: boolean;
};

export class Session {
  readonly configStore: ConfigStore;
  private openedStore: EventStore | null = null;
  private loadedConfig: UserConfig | null = null;

  constructor(
    readonly options: GlobalOptions,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {
    this.configStore = new ConfigStore(resolveConfigPath(env));
  }

  get json(): boolean {
    return this.options.json === true;
  }

  store(): EventStore {
    if (!this.openedStore) {
      this.openedStore = EventStore.open(this.env);
    }
    return this.openedStore;
  }

  config(): UserConfig {
    if (!this.loadedConfig) {
      this.loadedConfig = this.configStore.load();
    }
    return this.loadedConfig;
  }

  analyzer(): TimeAnalyzer {
    return new TimeAnalyzer(this.store(), this.config(), { host: this.options.host });
  }

  projects(): ProjectRegistry {
    return new ProjectRegistry(this.config(), this.configStore);
  }

  /**
   * Print `data` as JSON under --json, otherwise run the human renderer
   */
  output(data: unknown, human: () => void): void {
    if (this.json) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      human();
    }
  }

  close(): void {
    this.openedStore?.close();
    this.openedStore = null;
  }
}

export async function runAction(
  command: Command,
  action: (session: Session) => void | Promise<void>
): Promise<void> {
  const options = command.optsWithGlobals<GlobalOptions>();
  if (options.verbose) setLogLevel('debug');

  const session = new Session(options);
  try {
    await action(session);
  } catch (error) {
    const { kind, message } = describeError(error);
    if (kind === 'internal' && error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    if (session.json) {
      console.log(JSON.stringify({ error: { kind, message } }, null, 2));
    } else {
      console.error(chalk.red(`error[${kind}]: ${message}`));
    }
    process.exitCode = 1;
  } finally {
    session.close();
  }
}

export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}
