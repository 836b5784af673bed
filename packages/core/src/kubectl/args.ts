/**
 * kubectl argument builders
 */

import type { LogOptions } from '../types/index.js';

/**
 * JSONPath projection printing `<pod> <container>...|` for every pod,
 * regular and init containers included.
 */
export const POD_CONTAINERS_JSONPATH =
  "{range .items[*]}{.metadata.name} {.spec['containers', 'initContainers'][*].name}|{end}";

/** Record separator in the discovery output */
export const RECORD_SEPARATOR = '|';

/**
 * Arguments for listing every pod of a namespace with its container names
 */
export function buildDiscoveryArgs(namespace: string): string[] {
  return ['get', 'pod', `--namespace=${namespace}`, `--output=jsonpath=${POD_CONTAINERS_JSONPATH}`];
}

/**
 * Forwarded flags in `--name=value` form, in a fixed order.
 *
 * Only flags with a defined value are emitted.
 */
export function buildLogFlags(options: LogOptions): string[] {
  const entries: Array<[string, string | number | boolean | undefined]> = [
    ['follow', options.follow],
    ['timestamps', options.timestamps],
    ['limit-bytes', options.limitBytes],
    ['previous', options.previous],
    ['tail', options.tail],
    ['since-time', options.sinceTime],
    ['since', options.since],
  ];

  return entries
    .filter((entry): entry is [string, string | number | boolean] => entry[1] !== undefined)
    .map(([name, value]) => `--${name}=${String(value)}`);
}

/**
 * Arguments for fetching the logs of one container
 */
export function buildLogsArgs(
  podName: string,
  containerName: string,
  namespace: string,
  options: LogOptions
): string[] {
  return [
    'logs',
    podName,
    `--namespace=${namespace}`,
    ...buildLogFlags(options),
    `--container=${containerName}`,
  ];
}

/**
 * Render a command line for display, single-quoting arguments with shell
 * metacharacters. Display only; commands are never run through a shell.
 */
export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args]
    .map((arg) => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, "'\\''")}'`))
    .join(' ');
}
