import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { findConfigFile, loadConfigFile, discoverAndLoadConfig } from '../../../core/config/loader.js';
import { ConfigError } from '../../../core/errors.js';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

describe('Config Loader', () => {
  let testDir: string;

  beforeEach(() => {
    // Create a unique temporary directory for each test
    testDir = join(tmpdir(), `site-deploy-test-${Date.now()}-${Math.random().toString(36).substring(7)}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    // Clean up test directory
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  describe('findConfigFile', () => {
    it('should find site-deploy.config.ts in current directory', () => {
      const configPath = join(testDir, 'site-deploy.config.ts');
      writeFileSync(configPath, 'export default {}');

      expect(findConfigFile(testDir)).toBe(configPath);
    });

    it('should prioritize .ts over .js', () => {
      const tsConfigPath = join(testDir, 'site-deploy.config.ts');
      writeFileSync(tsConfigPath, 'export default {}');
      writeFileSync(join(testDir, 'site-deploy.config.js'), 'module.exports = {}');

      expect(findConfigFile(testDir)).toBe(tsConfigPath);
    });

    it('should search in parent directories', () => {
      const subDir = join(testDir, 'subdir', 'nested');
      mkdirSync(subDir, { recursive: true });

      const configPath = join(testDir, 'site-deploy.config.cjs');
      writeFileSync(configPath, 'module.exports = {}');

      expect(findConfigFile(subDir)).toBe(configPath);
    });
  });

  describe('loadConfigFile', () => {
    it('should load a basic TypeScript config with default export', async () => {
      const configPath = join(testDir, 'site-deploy.config.ts');
      writeFileSync(
        configPath,
        `
        const retention: number = 90;

        export default {
          domain: 'example.org',
          prefix: 'example-org',
          bucketLogsLifecycle: retention,
        };
        `
      );

      await expect(loadConfigFile(configPath)).resolves.toEqual({
        domain: 'example.org',
        prefix: 'example-org',
        bucketLogsLifecycle: 90,
      });
    });

    it('should load a config with defineConfig helper', async () => {
      const configPath = join(testDir, 'site-deploy.config.ts');
      writeFileSync(
        configPath,
        `
        import { defineConfig } from '${join(process.cwd(), 'src/types/config').replace(/\\/g, '\\\\')}';

        export default defineConfig({
          domain: 'example.org',
          prefix: 'example-org',
          environments: { staging: { domain: 'staging.example.org' } },
        });
        `
      );

      const config = await loadConfigFile(configPath);
      expect(config.environments).toEqual({ staging: { domain: 'staging.example.org' } });
    });

    it('should load a CommonJS config', async () => {
      const configPath = join(testDir, 'site-deploy.config.cjs');
      writeFileSync(configPath, `module.exports = { domain: 'example.org', prefix: 'cjs' };`);

      const config = await loadConfigFile(configPath);
      expect(config.prefix).toBe('cjs');
    });

    it('should load a config exported as an async function', async () => {
      const configPath = join(testDir, 'site-deploy.config.ts');
      writeFileSync(
        configPath,
        `
        export default async () => ({
          domain: 'example.org',
          prefix: 'from-function',
        });
        `
      );

      const config = await loadConfigFile(configPath);
      expect(config.prefix).toBe('from-function');
    });

    it('should throw error if config file does not exist', async () => {
      const configPath = join(testDir, 'nonexistent.config.ts');

      await expect(loadConfigFile(configPath)).rejects.toThrow(`Config file not found: ${configPath}`);
    });

    it('should throw error if config file has syntax errors', async () => {
      const configPath = join(testDir, 'site-deploy.config.ts');
      writeFileSync(configPath, 'invalid typescript syntax {{{');

      const error = await loadConfigFile(configPath).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty('message', `Failed to load config file: ${configPath}`);
    });

    it('should reject a config that is not an object', async () => {
      const configPath = join(testDir, 'site-deploy.config.ts');
      writeFileSync(configPath, `export default 'example.org';`);

      await expect(loadConfigFile(configPath)).rejects.toThrow(
        `Config file ${configPath} must export an object (use defineConfig)`
      );
    });
  });

  describe('discoverAndLoadConfig', () => {
    it('should discover config from parent directory', async () => {
      const subDir = join(testDir, 'site');
      mkdirSync(subDir);
      const configPath = join(testDir, 'site-deploy.config.js');
      writeFileSync(configPath, `module.exports = { domain: 'example.org' };`);

      await expect(discoverAndLoadConfig(subDir)).resolves.toEqual({
        config: { domain: 'example.org' },
        configPath,
      });
    });

    it('should return an empty config when no file is found', async () => {
      await expect(discoverAndLoadConfig(testDir)).resolves.toEqual({ config: {}, configPath: null });
    });
  });
});
