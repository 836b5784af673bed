/**
 * Command Executor Interface
 *
 * Abstraction for running kubectl. Two modes:
 * - run(): buffered, for discovery queries
 * - spawn(): streaming, for long-lived `kubectl logs` processes
 *
 * Commands are always executed as an argument vector, never through a shell,
 * so pod names and flag values cannot be interpreted as shell syntax.
 */

import { execFile, spawn } from 'node:child_process';
import os from 'node:os';
import type { Readable } from 'node:stream';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/** Discovery output for large namespaces can exceed the 1 MiB default */
const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Result of command execution
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  /** Process exit code, or 127 when the process could not be started */
  exitCode: number;
}

/**
 * The part of a child process the log streamer relies on
 */
export interface SpawnedProcess {
  readonly stdout: Readable;
  readonly stderr: Readable;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (error: Error) => void): this;
}

/**
 * Command executor interface
 *
 * Implementations determine HOW commands are executed.
 */
export interface CommandExecutor {
  /**
   * Execute a command and collect its output
   *
   * Never rejects for a failing command: a non-zero exit or a spawn failure
   * is reported through exitCode/stderr.
   */
  run(command: string, args: string[]): Promise<CommandResult>;

  /**
   * Start a command with piped stdout/stderr and return immediately
   *
   * Spawn failures surface as an 'error' event on the returned process.
   */
  spawn(command: string, args: string[]): SpawnedProcess;
}

/**
 * Direct command executor
 *
 * Executes commands with node:child_process, without a shell.
 */
export class DirectExecutor implements CommandExecutor {
  async run(command: string, args: string[]): Promise<CommandResult> {
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        encoding: 'utf-8',
        maxBuffer: MAX_BUFFER,
      });
      return { stdout, stderr, exitCode: 0 };
    } catch (error: unknown) {
      const err = error as {
        stdout?: string;
        stderr?: string;
        code?: number | string | null;
        signal?: NodeJS.Signals | null;
        message?: string;
      };
      if (err.signal) {
        const stderr = err.stderr || '';
        return {
          stdout: err.stdout || '',
          stderr: `${stderr}${stderr && !stderr.endsWith('\n') ? '\n' : ''}terminated by signal ${err.signal}\n`,
          // Shell convention for a signaled process
          exitCode: 128 + os.constants.signals[err.signal],
        };
      }
      return {
        stdout: err.stdout || '',
        stderr: err.stderr || err.message || '',
        // execFile reports spawn failures with a string code such as ENOENT
        exitCode: typeof err.code === 'number' ? err.code : 127,
      };
    }
  }

  spawn(command: string, args: string[]): SpawnedProcess {
    return spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  }
}
