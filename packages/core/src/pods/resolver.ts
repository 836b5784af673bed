/**
 * Pod Resolver
 *
 * Lists the pods of a namespace through kubectl and keeps the ones whose name
 * matches a pattern, narrowing their containers to an optional exact name.
 */

import { RECORD_SEPARATOR } from '../kubectl/args.js';
import type { KubectlClient } from '../kubectl/kubectl-client.js';
import type { Pod, PodSet } from '../types/index.js';
import { PatternCompileError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export interface ResolveOptions {
  /** Exact, case-sensitive container name; empty keeps every container */
  containerFilter?: string;
  namespace: string;
}

export interface ResolverDeps {
  kubectl: KubectlClient;
  logger: Logger;
}

/**
 * A discovery record before filtering
 */
export interface PodRecord {
  name: string;
  containers: string[];
}

/**
 * Compile a pod name pattern
 *
 * @throws PatternCompileError if the pattern is not a valid regular expression
 */
export function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PatternCompileError(`Invalid pod pattern "${pattern}": ${reason}`, pattern);
  }
}

/**
 * Parse `<pod> <container>...|<pod> <container>...|` discovery output
 *
 * Empty records and empty fields are skipped.
 */
export function parsePodRecords(output: string): PodRecord[] {
  const records: PodRecord[] = [];

  for (const record of output.split(RECORD_SEPARATOR)) {
    const [name, ...containers] = record.split(' ').filter((field) => field.trim() !== '');
    if (!name) continue;
    records.push({ name: name.trim(), containers: containers.map((c) => c.trim()) });
  }

  return records;
}

/**
 * Keep records whose name matches the pattern (search semantics) and narrow
 * their containers to the filter. Pods left without containers are kept.
 */
export function filterPods(records: PodRecord[], pattern: RegExp, containerFilter = ''): Pod[] {
  return records
    .filter((record) => pattern.test(record.name))
    .map((record) => ({
      name: record.name,
      containers: record.containers
        .filter((container) => containerFilter === '' || container === containerFilter)
        .map((name) => ({ name })),
    }));
}

/**
 * Resolve every pattern, in order, into one PodSet
 *
 * All patterns are compiled before kubectl runs, so an invalid pattern aborts
 * without starting any subprocess. kubectl is queried once per pattern.
 *
 * @throws PatternCompileError for an invalid pattern
 * @throws ExternalToolError when pod discovery fails
 */
export async function resolvePods(
  patterns: string[],
  options: ResolveOptions,
  deps: ResolverDeps
): Promise<PodSet> {
  const { kubectl, logger } = deps;
  const containerFilter = options.containerFilter ?? '';
  const compiled = patterns.map((pattern) => ({ pattern, regexp: compilePattern(pattern) }));

  const pods: Pod[] = [];
  for (const { pattern, regexp } of compiled) {
    const output = await kubectl.getPodContainers(options.namespace);
    const matched = filterPods(parsePodRecords(output), regexp, containerFilter);
    logger.debug(`Pattern "${pattern}" matched ${matched.length} pod(s)`);
    pods.push(...matched);
  }

  return pods;
}
