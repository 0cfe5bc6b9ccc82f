/**
 * Environment loader tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { getEnvFilePaths, loadEnvFiles } from '../../../core/config/env-loader.js';
import { createTempSite } from '../../helpers/test-context.js';

describe('Environment Loader', () => {

  describe('getEnvFilePaths', () => {
    it('should return correct file paths and priorities for production', () => {
      const testDir = '/test/project';
      const paths = getEnvFilePaths('prod', testDir);

      expect(paths).toHaveLength(4);

      // Highest priority first
      expect(paths[0].path).toBe(`${testDir}/.env.prod.local`);
      expect(paths[0].priority).toBe(4);

      expect(paths[1].path).toBe(`${testDir}/.env.prod`);
      expect(paths[1].priority).toBe(3);

      expect(paths[2].path).toBe(`${testDir}/.env.local`);
      expect(paths[2].priority).toBe(2);

      expect(paths[3].path).toBe(`${testDir}/.env`);
      expect(paths[3].priority).toBe(1);
    });

    it('should return correct file paths when no environment specified', () => {
      const paths = getEnvFilePaths(undefined, '/test/project');

      expect(paths.map((p) => p.path)).toEqual(['/test/project/.env.local', '/test/project/.env']);
      expect(paths.every((p) => !p.exists)).toBe(true);
    });
  });

  describe('loadEnvFiles', () => {
    let project: ReturnType<typeof createTempSite>;

    beforeEach(() => {
      project = createTempSite({
        '.env': 'SITE_DEPLOY_TEST_A=base\nSITE_DEPLOY_TEST_B=base\n',
        '.env.staging': 'SITE_DEPLOY_TEST_B=staging\n',
      });
    });

    afterEach(() => {
      project.cleanup();
      jest.restoreAllMocks();
      delete process.env.SITE_DEPLOY_TEST_A;
      delete process.env.SITE_DEPLOY_TEST_B;
    });

    it('should load files from lowest to highest priority', () => {
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const loaded = loadEnvFiles('staging', project.dir);

      expect(loaded).toEqual(['.env', '.env.staging']);
      expect(process.env.SITE_DEPLOY_TEST_A).toBe('base');
      expect(process.env.SITE_DEPLOY_TEST_B).toBe('staging');
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should warn when the environment has no .env file', () => {
      const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const loaded = loadEnvFiles('prod', project.dir);

      expect(loaded).toEqual(['.env']);
      expect(process.env.SITE_DEPLOY_TEST_B).toBe('base');
      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(String(logSpy.mock.calls[0][0])).toContain('.env.prod file not found');
    });
  });
});
