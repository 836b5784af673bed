/**
 * In-process stand-ins for kubectl, used by tests
 */

import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import type { CommandExecutor, CommandResult, SpawnedProcess } from '../kubectl/command-executor.js';
import { createLogger, type Logger, type LogLevel } from '../utils/logger.js';

export interface ProcessScript {
  stdout?: string[];
  stderr?: string[];
  code?: number | null;
  signal?: NodeJS.Signals | null;
}

/**
 * Child process double with real streams
 */
export class FakeProcess extends EventEmitter implements SpawnedProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();

  constructor(
    readonly command: string,
    readonly args: string[]
  ) {
    super();
  }

  /** Write each entry as a line, end both streams, then close */
  finish({ stdout = [], stderr = [], code = 0, signal = null }: ProcessScript = {}): void {
    for (const line of stdout) this.stdout.write(`${line}\n`);
    for (const line of stderr) this.stderr.write(`${line}\n`);
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code, signal));
  }

  /** Simulate a process that could not be started */
  fail(error: Error): void {
    setImmediate(() => this.emit('error', error));
  }

  /** The `--container=<name>` value */
  get container(): string | undefined {
    return this.args.find((arg) => arg.startsWith('--container='))?.slice('--container='.length);
  }
}

export interface FakeExecutorOptions {
  run?: (command: string, args: string[]) => CommandResult;
  /** Drives each spawned process; runs on the next tick after spawn() */
  spawn?: (process: FakeProcess) => void;
}

export class FakeExecutor implements CommandExecutor {
  readonly runCalls: Array<{ command: string; args: string[] }> = [];
  readonly spawned: FakeProcess[] = [];

  constructor(private options: FakeExecutorOptions = {}) {}

  async run(command: string, args: string[]): Promise<CommandResult> {
    this.runCalls.push({ command, args });
    return this.options.run?.(command, args) ?? { stdout: '', stderr: '', exitCode: 0 };
  }

  spawn(command: string, args: string[]): SpawnedProcess {
    const child = new FakeProcess(command, args);
    this.spawned.push(child);
    const script = this.options.spawn;
    if (script) {
      setImmediate(() => script(child));
    }
    return child;
  }
}

/**
 * Logger writing uncolored lines into arrays
 */
export function createCaptureLogger(level: LogLevel = 'info'): {
  logger: Logger;
  out: string[];
  err: string[];
} {
  const out: string[] = [];
  const err: string[] = [];
  const sink = (lines: string[]) => ({
    write(chunk: string) {
      lines.push(chunk.replace(/\n$/, ''));
    },
  });
  return {
    logger: createLogger({ level, color: false, stdout: sink(out), stderr: sink(err) }),
    out,
    err,
  };
}
