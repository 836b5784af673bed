/**
 * Pod and container model produced by pod discovery
 */

/**
 * A container inside a pod (regular or init container)
 */
export interface Container {
  readonly name: string;
}

/**
 * A pod with the containers kept after filtering, in discovery order
 */
export interface Pod {
  readonly name: string;
  readonly containers: readonly Container[];
}

/**
 * Pods accumulated across all patterns, in argument order.
 *
 * The same pod appears more than once when it matches several patterns.
 */
export type PodSet = readonly Pod[];

/**
 * Flags forwarded verbatim to `kubectl logs`
 *
 * `undefined` means the user did not set the flag, so it is left out and
 * kubectl's own default applies.
 */
export interface LogOptions {
  /** Stream continuously instead of returning a finite log */
  follow?: boolean;

  /** Include timestamps on each line */
  timestamps?: boolean;

  /** Maximum bytes of logs to return */
  limitBytes?: number;

  /** Logs of the previous container instance */
  previous?: boolean;

  /** Number of trailing lines (-1 = all) */
  tail?: number;

  /** Absolute cutoff (RFC3339) */
  sinceTime?: string;

  /** Relative cutoff, e.g. 5s, 2m, 1h30m */
  since?: string;
}

/**
 * One (pod, container) log subprocess
 */
export interface StreamTask {
  pod: Pod;
  container: Container;
  /** kubectl arguments (without the binary) */
  args: string[];
  /** Plain-text line prefix, e.g. `[web-7f9c api]` */
  prefix: string;
}

/**
 * Outcome counts once every task has finished
 */
export interface StreamSummary {
  tasks: number;
  succeeded: number;
  failed: number;
}
