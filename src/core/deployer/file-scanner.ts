/**
 * File scanner for deployment
 */

import glob from 'fast-glob';
import hasha from 'hasha';
import { lookup as getMimeType } from 'mime-types';
import { stat } from 'node:fs/promises';
import { basename, join, resolve, sep } from 'node:path';
import type { PublishableAsset } from '../../types/deployment.js';
import type { ScanOptions } from '../../types/deployer.js';

/**
 * Key a single index file is published under
 */
export const INDEX_KEY = 'index.html';

/**
 * Get Content-Type for file
 */
export function getContentType(filePath: string): string {
  const mimeType = getMimeType(filePath);
  return mimeType || 'application/octet-stream';
}

/**
 * Convert file path to S3 key (forward slashes, no leading slash)
 */
export function pathToS3Key(relativePath: string): string {
  return relativePath.split(sep).join('/').replace(/^\/+/, '');
}

/**
 * Hex MD5 of a file, the ETag S3 reports for a single-part upload
 */
export async function calculateFileHash(filePath: string): Promise<string> {
  return hasha.fromFile(filePath, { algorithm: 'md5' });
}

async function describeAsset(localPath: string, remoteKey: string): Promise<PublishableAsset> {
  const stats = await stat(localPath);

  return {
    localPath,
    remoteKey,
    contentType: getContentType(localPath),
    contentHash: await calculateFileHash(localPath),
    size: stats.size,
  };
}

/**
 * Scan the generated site directory, one asset per file, sorted by key
 *
 * @throws Error when the directory does not exist
 */
export async function scanFiles(options: ScanOptions): Promise<PublishableAsset[]> {
  const { exclude = [] } = options;
  const outputDir = resolve(options.outputDir);

  const dirStats = await stat(outputDir).catch((error: unknown) => {
    throw new Error(`Output directory not found: ${outputDir}`, { cause: error });
  });
  if (!dirStats.isDirectory()) {
    throw new Error(`Output path is not a directory: ${outputDir}`);
  }

  const files = await glob(['**/*'], {
    cwd: outputDir,
    absolute: false,
    ignore: exclude,
    onlyFiles: true,
    followSymbolicLinks: false,
    dot: true, // Include dotfiles
  });

  const assets: PublishableAsset[] = [];
  for (const file of files) {
    assets.push(await describeAsset(join(outputDir, file), pathToS3Key(file)));
  }

  return assets.sort((a, b) => (a.remoteKey < b.remoteKey ? -1 : a.remoteKey > b.remoteKey ? 1 : 0));
}

/**
 * Single-page mode: the file is published as index.html whatever its name
 */
export async function collectIndexAsset(indexFile: string): Promise<PublishableAsset> {
  const localPath = resolve(indexFile);

  const stats = await stat(localPath).catch((error: unknown) => {
    throw new Error(`Index file not found: ${localPath}`, { cause: error });
  });
  if (!stats.isFile()) {
    throw new Error(`Index file is not a regular file: ${basename(localPath)}`);
  }

  const asset = await describeAsset(localPath, INDEX_KEY);
  return { ...asset, contentType: getContentType(INDEX_KEY) };
}
