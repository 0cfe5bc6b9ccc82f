/**
 * Environment variables loader
 * Loads .env files based on environment name with priority
 */

import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import chalk from 'chalk';

/**
 * .env files of an environment, highest priority first
 */
function envFileNames(environment?: string): string[] {
  const envFiles: string[] = [];

  if (environment) {
    envFiles.push(`.env.${environment}.local`);
    envFiles.push(`.env.${environment}`);
  }
  envFiles.push('.env.local');
  envFiles.push('.env');

  return envFiles;
}

/**
 * Load environment variables based on environment name
 *
 * Priority (highest to lowest):
 * 1. .env.{environment}.local  (e.g., .env.prod.local)
 * 2. .env.{environment}         (e.g., .env.prod)
 * 3. .env.local
 * 4. .env
 *
 * @param environment - Environment name (e.g., 'staging', 'prod')
 * @param configDir - Directory containing .env files (defaults to process.cwd())
 * @returns the files that were loaded, lowest priority first
 *
 * @example
 * ```ts
 * loadEnvFiles('prod');
 * // Loads: .env.prod.local > .env.prod > .env.local > .env
 * ```
 */
export function loadEnvFiles(
  environment?: string,
  configDir: string = process.cwd()
): string[] {
  // Later files override earlier ones, so load from lowest priority to highest
  const filesToLoad = envFileNames(environment).reverse();
  const loadedFiles: string[] = [];

  for (const file of filesToLoad) {
    const filePath = resolve(configDir, file);

    if (existsSync(filePath)) {
      dotenvConfig({ path: filePath, override: true });
      loadedFiles.push(file);
    }
  }

  if (environment) {
    const envFile = `.env.${environment}`;

    if (
      !existsSync(resolve(configDir, envFile)) &&
      !existsSync(resolve(configDir, `.env.${environment}.local`))
    ) {
      console.log(
        chalk.yellow(`  ⚠ Warning: ${envFile} file not found. Using values from site-deploy.config.ts`)
      );
    }
  }

  if (process.env.SITE_DEPLOY_DEBUG === 'true' && loadedFiles.length > 0) {
    console.log(`[site-deploy] Loaded environment files: ${loadedFiles.join(', ')}`);
  }

  return loadedFiles;
}

/**
 * Get the list of .env files that would be loaded for an environment
 * Useful for debugging and documentation
 */
export function getEnvFilePaths(
  environment?: string,
  configDir: string = process.cwd()
): { path: string; exists: boolean; priority: number }[] {
  const envFiles = envFileNames(environment);

  return envFiles.map((file, index) => ({
    path: resolve(configDir, file),
    exists: existsSync(resolve(configDir, file)),
    priority: envFiles.length - index, // Higher number = higher priority
  }));
}
