/**
 * One podlogs run: resolve the patterns, then stream every matching container.
 */

import type { KubectlClient } from './kubectl/kubectl-client.js';
import { resolvePods } from './pods/resolver.js';
import { streamLogs } from './streaming/log-streamer.js';
import type { LogOptions, StreamSummary } from './types/index.js';
import type { Logger } from './utils/logger.js';

export interface PodLogsRequest {
  patterns: string[];
  namespace: string;
  /** Exact container name; empty streams every container */
  containerFilter?: string;
  logOptions?: LogOptions;
  maxConcurrency?: number;
}

/**
 * @throws PatternCompileError or ExternalToolError before any log subprocess starts
 */
export async function runPodLogs(
  request: PodLogsRequest,
  deps: { kubectl: KubectlClient; logger: Logger }
): Promise<StreamSummary> {
  const pods = await resolvePods(
    request.patterns,
    { namespace: request.namespace, containerFilter: request.containerFilter },
    deps
  );

  deps.logger.info(`Streaming logs for ${pods.length} pod(s)`);

  return streamLogs(
    pods,
    {
      namespace: request.namespace,
      logOptions: request.logOptions,
      maxConcurrency: request.maxConcurrency,
    },
    deps
  );
}
