/**
 * podlogs Configuration Types
 */

/**
 * Settings read from ~/.podlogs/config.yaml
 *
 * Every key is optional; missing keys fall back to getDefaultConfig().
 */
export interface PodlogsConfig {
  /** Namespace used when --namespace is not given (default: default) */
  namespace?: string;

  /** kubectl binary name or path (default: kubectl) */
  kubectl?: string;

  /** Maximum simultaneous log subprocesses, 0 = unbounded (default: 0) */
  maxConcurrency?: number;

  /** Colored prefixes and log levels (default: true) */
  colorOutput?: boolean;
}

/**
 * Fully resolved settings for one run
 */
export interface RunSettings {
  namespace: string;
  kubectl: string;
  maxConcurrency: number;
  colorOutput: boolean;
}
