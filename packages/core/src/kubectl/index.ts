/**
 * kubectl Integration Module
 *
 * Argument builders and subprocess execution for the kubectl binary.
 *
 * @module kubectl
 */

export {
  buildDiscoveryArgs,
  buildLogFlags,
  buildLogsArgs,
  formatCommandLine,
  POD_CONTAINERS_JSONPATH,
  RECORD_SEPARATOR,
} from './args.js';
export {
  type CommandExecutor,
  type CommandResult,
  DirectExecutor,
  type SpawnedProcess,
} from './command-executor.js';
export { KubectlClient, type KubectlClientOptions } from './kubectl-client.js';
