/**
 * Concurrent Log Streamer
 *
 * Runs one `kubectl logs` subprocess per (pod, container) and multiplexes
 * their stdout and stderr onto the shared logger, one prefixed line at a time.
 *
 * Every task is independent: a spawn failure or non-zero exit is logged and
 * counted, never thrown, and never stops sibling tasks. streamLogs() resolves
 * only after every task's process exited and both of its streams drained.
 */

import { buildLogsArgs } from '../kubectl/args.js';
import type { SpawnedProcess } from '../kubectl/command-executor.js';
import type { KubectlClient } from '../kubectl/kubectl-client.js';
import type { LogOptions, PodSet, StreamSummary, StreamTask } from '../types/index.js';
import { formatError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { drainLines } from './line-reader.js';
import { Semaphore } from './semaphore.js';

export interface StreamOptions {
  namespace: string;

  /** Flags forwarded to every `kubectl logs` call */
  logOptions?: LogOptions;

  /** Cap on simultaneous subprocesses; 0 or undefined = unbounded */
  maxConcurrency?: number;
}

export interface StreamerDeps {
  kubectl: KubectlClient;
  logger: Logger;
}

type ExitOutcome =
  | { kind: 'exit'; code: number | null; signal: NodeJS.Signals | null }
  | { kind: 'error'; error: Error };

const PREFIX_COLORS = ['cyan', 'green', 'magenta', 'yellow', 'blue', 'red'] as const;

export function formatPrefix(podName: string, containerName: string): string {
  return `[${podName} ${containerName}]`;
}

/**
 * Expand a PodSet into one task per (pod, container), in discovery order
 */
export function buildStreamTasks(podSet: PodSet, options: StreamOptions): StreamTask[] {
  const tasks: StreamTask[] = [];
  for (const pod of podSet) {
    for (const container of pod.containers) {
      tasks.push({
        pod,
        container,
        args: buildLogsArgs(pod.name, container.name, options.namespace, options.logOptions ?? {}),
        prefix: formatPrefix(pod.name, container.name),
      });
    }
  }
  return tasks;
}

/**
 * Settles once the process closed, or failed to start
 */
function waitForExit(child: SpawnedProcess): Promise<ExitOutcome> {
  return new Promise((resolve) => {
    child.once('error', (error) => {
      // Streams of a process that never started may not close on their own
      child.stdout.destroy();
      child.stderr.destroy();
      resolve({ kind: 'error', error });
    });
    child.once('close', (code, signal) => resolve({ kind: 'exit', code, signal }));
  });
}

/**
 * Run one task to completion
 *
 * @returns true when the subprocess exited with code 0
 */
async function runTask(
  task: StreamTask,
  label: string,
  semaphore: Semaphore,
  deps: StreamerDeps
): Promise<boolean> {
  const { kubectl, logger } = deps;
  const release = await semaphore.acquire();

  try {
    let child: SpawnedProcess;
    try {
      child = kubectl.spawnLogs(task.args);
    } catch (error) {
      logger.error(`${label} ${formatError(error)}`);
      return false;
    }

    const emit = (line: string) => logger.info(`${label} ${line}`);
    const [outcome] = await Promise.all([
      waitForExit(child),
      drainLines(child.stdout, emit),
      drainLines(child.stderr, emit),
    ]);

    if (outcome.kind === 'error') {
      logger.error(`${label} ${outcome.error.message}`);
      return false;
    }
    if (outcome.signal) {
      logger.error(`${label} terminated by signal ${outcome.signal}`);
      return false;
    }
    if (outcome.code !== 0) {
      logger.error(`${label} exited with code ${outcome.code}`);
      return false;
    }

    logger.info(`${label} exit`);
    return true;
  } finally {
    release();
  }
}

/**
 * Stream logs for every container of every pod, concurrently
 */
export async function streamLogs(
  podSet: PodSet,
  options: StreamOptions,
  deps: StreamerDeps
): Promise<StreamSummary> {
  const { kubectl, logger } = deps;
  const semaphore = new Semaphore(options.maxConcurrency ?? 0);
  const tasks = buildStreamTasks(podSet, options);

  const running = tasks.map((task, index) => {
    const color = PREFIX_COLORS[index % PREFIX_COLORS.length];
    const label = logger.colors[color](task.prefix);

    logger.info(`${task.pod.name} ${task.container.name}`);
    logger.debug(kubectl.formatCommand(task.args));

    return runTask(task, label, semaphore, deps);
  });

  const results = await Promise.all(running);
  const succeeded = results.filter(Boolean).length;

  return {
    tasks: tasks.length,
    succeeded,
    failed: tasks.length - succeeded,
  };
}
