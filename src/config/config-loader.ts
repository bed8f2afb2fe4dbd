import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors';
import { deepMerge, isPlainObject } from '../utils/deep-merge';
import { resolveEnvRecursive } from '../utils/env-resolver';
import { DEFAULT_CONFIG_FILE, defaults } from './config-defaults';
import {
  type ConfigFile,
  ConfigFileSchema,
  type ConfigOverrides,
  formatIssues,
  type ResolvedConfig,
  ResolvedConfigSchema,
} from './config-schema';

export type LoadConfigOptions = {
  /** Base for relative paths and the default config file location */
  workDir: string;
  /** Explicit config file; it must exist when given */
  configPath?: string;
  overrides?: ConfigOverrides;
};

/**
 * Read and validate a YAML config file
 *
 * @param required - When false, a missing file yields an empty config
 * @throws ConfigError if the file is required and missing, or is invalid
 */
export async function loadConfigFile(path: string, required: boolean): Promise<ConfigFile> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (!required && error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Cannot read configuration file "${path}": ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML in "${path}": ${errorMessage(error)}`);
  }

  // An empty file parses to undefined
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isPlainObject(raw)) {
    throw new ConfigError(`Configuration file "${path}" must contain a mapping`);
  }

  const result = ConfigFileSchema.safeParse(resolveEnvRecursive(raw));
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in "${path}":\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Build the effective configuration: defaults, then the config file, then
 * command-line overrides. Relative paths are resolved against `workDir`.
 *
 * @throws ConfigError if the file or the merged result is invalid
 */
export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
  const workDir = resolve(options.workDir);
  const configPath = options.configPath
    ? resolve(workDir, options.configPath)
    : resolve(workDir, DEFAULT_CONFIG_FILE);
  const file = await loadConfigFile(configPath, options.configPath !== undefined);

  const merged = deepMerge(defaults, file, options.overrides, { workDir });
  const result = ResolvedConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error)}`);
  }

  const config = result.data;
  return {
    ...config,
    downloadDir: resolve(workDir, config.downloadDir),
    ledgerFile: resolve(workDir, config.ledgerFile),
    organize: { ...config.organize, libraryDir: resolve(workDir, config.organize.libraryDir) },
  };
}
