/**
 * Flag definitions and their mapping to kubectl log options
 */

import { Flags } from '@oclif/core';
import type { LogOptions } from '@podlogs/core';

/** kubectl duration accepted by `kubectl logs --since`, e.g. 30s, 5m, 1h30m */
const DURATION_PATTERN = /^(\d+(\.\d+)?(ns|us|µs|ms|s|m|h))+$/;

/** RFC3339 timestamp, e.g. 2024-05-01T10:00:00Z or 2024-05-01T12:00:00.500+02:00 */
const RFC3339_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i;

export function parseDuration(input: string): string {
  const value = input.trim();
  if (value !== '0' && !DURATION_PATTERN.test(value)) {
    throw new Error(`Invalid duration "${input}" (expected e.g. 30s, 5m, 1h30m)`);
  }
  return value;
}

export function parseSinceTime(input: string): string {
  const value = input.trim();
  if (!RFC3339_PATTERN.test(value) || Number.isNaN(Date.parse(value))) {
    throw new Error(`Invalid time "${input}" (expected RFC3339, e.g. 2024-05-01T10:00:00Z)`);
  }
  return value;
}

export const logFlags = {
  follow: Flags.boolean({
    char: 'f',
    description: 'Specify if the logs should be streamed.',
  }),
  timestamps: Flags.boolean({
    description: 'Include timestamps on each line in the log output',
  }),
  'limit-bytes': Flags.integer({
    description: 'Maximum bytes of logs to return. Defaults to no limit.',
  }),
  previous: Flags.boolean({
    char: 'p',
    description:
      'If true, print the logs for the previous instance of the container in a pod if it exists.',
  }),
  tail: Flags.integer({
    description: 'Lines of recent log file to display. Defaults to all lines.',
  }),
  'since-time': Flags.string({
    description: 'Only return logs after a specific date (RFC3339). Defaults to all logs.',
    exclusive: ['since'],
    parse: async (input) => parseSinceTime(input),
  }),
  since: Flags.string({
    description:
      'Only return logs newer than a relative duration like 5s, 2m, or 3h. Defaults to all logs.',
    exclusive: ['since-time'],
    parse: async (input) => parseDuration(input),
  }),
  container: Flags.string({
    char: 'c',
    description: 'Print the logs of this container (exact name)',
  }),
  namespace: Flags.string({
    char: 'n',
    description: 'The Kubernetes namespace where the pods are located [default: config, then "default"]',
  }),
  debug: Flags.boolean({
    char: 'v',
    description: 'Debug output, including every kubectl command line',
  }),
  kubectl: Flags.string({
    description: 'kubectl binary to run [default: config, then "kubectl"]',
  }),
  'max-concurrency': Flags.integer({
    description: 'Maximum simultaneous log streams, 0 for no limit [default: config, then 0]',
    min: 0,
  }),
  color: Flags.boolean({
    description: 'Colored prefixes and messages [default: config, then true]',
    allowNo: true,
  }),
};

/**
 * The log-related flag values, as parsed
 */
export interface LogFlagValues {
  follow?: boolean;
  timestamps?: boolean;
  'limit-bytes'?: number;
  previous?: boolean;
  tail?: number;
  'since-time'?: string;
  since?: string;
}

/**
 * Map parsed flags to kubectl log options, keeping unset flags undefined
 */
export function toLogOptions(flags: LogFlagValues): LogOptions {
  return {
    follow: flags.follow,
    timestamps: flags.timestamps,
    limitBytes: flags['limit-bytes'],
    previous: flags.previous,
    tail: flags.tail,
    sinceTime: flags['since-time'],
    since: flags.since,
  };
}
