/**
 * kubectl client
 *
 * Thin wrapper binding a CommandExecutor to a kubectl binary.
 */

import { ExternalToolError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { buildDiscoveryArgs, formatCommandLine } from './args.js';
import { type CommandExecutor, DirectExecutor, type SpawnedProcess } from './command-executor.js';

/**
 * Options for creating KubectlClient
 */
export interface KubectlClientOptions {
  /** kubectl binary name or path (default: 'kubectl') */
  binary?: string;
  executor?: CommandExecutor;
  logger?: Logger;
}

export class KubectlClient {
  readonly binary: string;
  private executor: CommandExecutor;
  private logger?: Logger;

  constructor(options: KubectlClientOptions = {}) {
    this.binary = options.binary || 'kubectl';
    this.executor = options.executor ?? new DirectExecutor();
    this.logger = options.logger;
  }

  formatCommand(args: string[]): string {
    return formatCommandLine(this.binary, args);
  }

  /**
   * Raw `<pod> <container>...|` listing for a namespace
   *
   * @throws ExternalToolError if kubectl exits non-zero or cannot be started
   */
  async getPodContainers(namespace: string): Promise<string> {
    const args = buildDiscoveryArgs(namespace);
    const commandLine = this.formatCommand(args);
    this.logger?.debug(commandLine);

    const result = await this.executor.run(this.binary, args);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || result.stdout.trim();
      throw new ExternalToolError(
        `Failed to list pods in namespace "${namespace}" (exit code ${result.exitCode})${detail ? `: ${detail}` : ''}`,
        commandLine,
        result.exitCode,
        result.stderr
      );
    }

    const warnings = result.stderr.trim();
    if (warnings) {
      this.logger?.debug(`kubectl stderr: ${warnings}`);
    }

    return result.stdout;
  }

  /**
   * Start `kubectl logs ...` with piped output
   */
  spawnLogs(args: string[]): SpawnedProcess {
    return this.executor.spawn(this.binary, args);
  }
}
