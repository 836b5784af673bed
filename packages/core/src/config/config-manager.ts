/**
 * podlogs Config Manager
 *
 * Loads the optional YAML configuration file and merges it with CLI flags.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, DEFAULTS } from './constants.js';
import type { PodlogsConfig, RunSettings } from './types.js';

/**
 * Get podlogs home directory (~/.podlogs)
 */
export function getPodlogsHome(): string {
  return path.join(os.homedir(), CONFIG_DIR_NAME);
}

/**
 * Get config file path (~/.podlogs/config.yaml)
 */
export function getConfigPath(): string {
  return path.join(getPodlogsHome(), CONFIG_FILE_NAME);
}

/**
 * Get default config
 */
export function getDefaultConfig(): Required<PodlogsConfig> {
  return {
    namespace: DEFAULTS.NAMESPACE,
    kubectl: DEFAULTS.KUBECTL,
    maxConcurrency: DEFAULTS.MAX_CONCURRENCY,
    colorOutput: DEFAULTS.COLOR_OUTPUT,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Keep only the known keys with the right types
 */
export function normalizeConfig(raw: Record<string, unknown>): PodlogsConfig {
  const config: PodlogsConfig = {};

  const namespace = nonEmptyString(raw.namespace);
  if (namespace) config.namespace = namespace;

  const kubectl = nonEmptyString(raw.kubectl);
  if (kubectl) config.kubectl = kubectl;

  if (
    typeof raw.maxConcurrency === 'number' &&
    Number.isInteger(raw.maxConcurrency) &&
    raw.maxConcurrency >= 0
  ) {
    config.maxConcurrency = raw.maxConcurrency;
  }

  if (typeof raw.colorOutput === 'boolean') config.colorOutput = raw.colorOutput;

  return config;
}

/**
 * Load config from ~/.podlogs/config.yaml
 *
 * Returns default config if file doesn't exist.
 */
export async function loadConfig(configPath: string = getConfigPath()): Promise<PodlogsConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return getDefaultConfig();
    }
    throw new Error(
      `Failed to load config: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new Error(
      `Failed to load config: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // Empty file
  if (parsed === undefined || parsed === null) {
    return getDefaultConfig();
  }

  if (!isRecord(parsed)) {
    throw new Error(`Failed to load config: ${configPath} must contain a YAML mapping`);
  }

  return { ...getDefaultConfig(), ...normalizeConfig(parsed) };
}

/**
 * Merge CLI overrides over the config file over built-in defaults
 */
export function resolveRunSettings(
  config: PodlogsConfig,
  overrides: Partial<RunSettings> = {}
): RunSettings {
  const defaults = getDefaultConfig();
  return {
    namespace: overrides.namespace ?? config.namespace ?? defaults.namespace,
    kubectl: overrides.kubectl ?? config.kubectl ?? defaults.kubectl,
    maxConcurrency: overrides.maxConcurrency ?? config.maxConcurrency ?? defaults.maxConcurrency,
    colorOutput: overrides.colorOutput ?? config.colorOutput ?? defaults.colorOutput,
  };
}
