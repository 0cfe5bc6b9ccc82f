/**
 * Config file loader using jiti for TypeScript runtime execution
 */

import jiti from "jiti";
import { existsSync } from "node:fs";
import { resolve, join, dirname } from "node:path";
import { ConfigError } from "../errors.js";
import { isPlainObject, type PlainObject } from "./merger.js";

/**
 * Config file names to search for (in order of priority)
 */
export const CONFIG_FILE_NAMES = [
  "site-deploy.config.ts",
  "site-deploy.config.js",
  "site-deploy.config.mjs",
  "site-deploy.config.cjs",
] as const;

/**
 * Find config file in directory and parent directories
 */
export function findConfigFile(
  startDir: string = process.cwd()
): string | null {
  let currentDir = resolve(startDir);

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = join(currentDir, fileName);
      if (existsSync(configPath)) {
        return configPath;
      }
    }

    // Move up to parent directory
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Unwrap the supported export shapes: object, function, or either as default export
 */
function unwrapConfigModule(configModule: unknown): unknown {
  const exported =
    isPlainObject(configModule) && "default" in configModule
      ? configModule.default
      : configModule;

  return typeof exported === "function" ? exported() : exported;
}

/**
 * Load config file using jiti
 *
 * @throws ConfigError when the file is missing, fails to run or exports no object
 */
export async function loadConfigFile(configPath: string): Promise<PlainObject> {
  const absoluteConfigPath = resolve(configPath);

  if (!existsSync(absoluteConfigPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let config: unknown;
  try {
    // The first argument must be an absolute file path (not a directory)
    const jitiInstance = jiti(__filename, {
      interopDefault: true,
      requireCache: false,
      esmResolve: true,
    });

    const configModule: unknown = jitiInstance(absoluteConfigPath);
    config = await unwrapConfigModule(configModule);
  } catch (error) {
    throw new ConfigError(`Failed to load config file: ${configPath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (!isPlainObject(config)) {
    throw new ConfigError(
      `Config file ${configPath} must export an object (use defineConfig)`
    );
  }

  return config;
}

/**
 * Discover and load the config file; a missing file is not an error
 * since every setting can come from the command line
 */
export async function discoverAndLoadConfig(
  startDir?: string
): Promise<{ config: PlainObject; configPath: string | null }> {
  const configPath = findConfigFile(startDir);

  if (!configPath) {
    return { config: {}, configPath: null };
  }

  return {
    config: await loadConfigFile(configPath),
    configPath,
  };
}
