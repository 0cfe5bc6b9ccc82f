/**
 * Config system entry point
 */

import type { LoadConfigOptions } from '../../types/config.js';
import type { DeploymentRequest } from '../../types/deployment.js';
import { discoverAndLoadConfig, loadConfigFile } from './loader.js';
import { mergeEnvironment, mergeLayers, type PlainObject } from './merger.js';
import { validateConfig } from './schema.js';
import { loadEnvFiles } from './env-loader.js';

export interface LoadedConfig {
  request: DeploymentRequest;

  /** Config file used, null when every setting came from the command line */
  configPath: string | null;

  /** .env files applied, lowest priority first */
  envFiles: string[];
}

/**
 * Region from the standard AWS variables, the lowest-priority layer
 */
function environmentDefaults(env: NodeJS.ProcessEnv): PlainObject {
  const region = env.AWS_REGION || env.AWS_DEFAULT_REGION;
  return region ? { region } : {};
}

/**
 * Load, merge and validate the configuration of a run
 *
 * Layers (later wins): AWS_REGION/AWS_DEFAULT_REGION → config file →
 * its `environments[env]` section → command-line overrides.
 *
 * @example
 * ```ts
 * const { request } = await loadConfig({ env: 'prod', overrides: { validate: true } });
 * ```
 *
 * @throws ConfigError listing every problem
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const { configPath, env, overrides = {}, cwd = process.cwd() } = options;

  // .env files go first so the config file can read process.env
  const envFiles = loadEnvFiles(env, cwd);

  const loaded = configPath
    ? { config: await loadConfigFile(configPath), configPath }
    : await discoverAndLoadConfig(cwd);

  const merged = mergeLayers(
    environmentDefaults(process.env),
    mergeEnvironment(loaded.config, env),
    overrides
  );

  return {
    request: validateConfig(merged),
    configPath: loaded.configPath,
    envFiles,
  };
}

export { defineConfig } from '../../types/config.js';
export { validateConfig, configSchema, formatIssues, DEFAULT_REGION, DEFAULT_INDEX_FILE } from './schema.js';
export { findConfigFile, loadConfigFile, CONFIG_FILE_NAMES } from './loader.js';
export { loadEnvFiles, getEnvFilePaths } from './env-loader.js';
export { deepMerge, mergeEnvironment, mergeLayers, isPlainObject } from './merger.js';

export type {
  SiteDeployConfig,
  EnvironmentConfig,
  LoadConfigOptions,
} from '../../types/config.js';
