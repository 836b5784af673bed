/**
 * Defaults shared by config loading and the CLI
 */

export const DEFAULTS = {
  NAMESPACE: 'default',
  KUBECTL: 'kubectl',
  /** 0 = no cap on simultaneous log subprocesses */
  MAX_CONCURRENCY: 0,
  COLOR_OUTPUT: true,
} as const;

export const CONFIG_DIR_NAME = '.podlogs';
export const CONFIG_FILE_NAME = 'config.yaml';
