/**
 * Base Command - Shared logic for podlogs commands
 *
 * Loads configuration and turns fatal errors into a consistent message and
 * exit status.
 */

import { Command } from '@oclif/core';
import {
  ExternalToolError,
  formatError,
  loadConfig,
  PatternCompileError,
  type PodlogsConfig,
  type RunSettings,
  resolveRunSettings,
} from '@podlogs/core';
import chalk from 'chalk';

export abstract class BaseCommand extends Command {
  /**
   * Load ~/.podlogs/config.yaml and apply flag overrides
   *
   * Exits with status 1 when the config file is unreadable or malformed.
   */
  protected async loadSettings(overrides: Partial<RunSettings>): Promise<RunSettings> {
    let config: PodlogsConfig;
    try {
      config = await loadConfig();
    } catch (error) {
      this.fail(error);
    }
    return resolveRunSettings(config, overrides);
  }

  /**
   * Print a fatal error and exit with status 1
   */
  protected fail(error: unknown): never {
    let title = '✗ Failed';
    if (error instanceof PatternCompileError) {
      title = '✗ Invalid pod pattern';
    } else if (error instanceof ExternalToolError) {
      title = '✗ Pod discovery failed';
    }

    this.error(`${chalk.red(title)}\n\n${chalk.dim(formatError(error))}`, { exit: 1 });
  }
}
