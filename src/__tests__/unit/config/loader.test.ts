import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { findConfigFile, loadConfigFile, discoverAndLoadConfig } from '../../../core/config/loader.js';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createTempDir } from '../../helpers/test-helpers.js';

describe('Config Loader', () => {
  let testDir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir: testDir, cleanup } = createTempDir('cfi-config'));
  });

  afterEach(() => {
    cleanup();
  });

  describe('findConfigFile', () => {
    it('should find cfi.config.ts in current directory', () => {
      const configPath = join(testDir, 'cfi.config.ts');
      writeFileSync(configPath, 'export default {}');

      expect(findConfigFile(testDir)).toBe(configPath);
    });

    it('should find cfi.config.js in current directory', () => {
      const configPath = join(testDir, 'cfi.config.js');
      writeFileSync(configPath, 'module.exports = {}');

      expect(findConfigFile(testDir)).toBe(configPath);
    });

    it('should prioritize .ts over .js', () => {
      const tsConfigPath = join(testDir, 'cfi.config.ts');
      writeFileSync(tsConfigPath, 'export default {}');
      writeFileSync(join(testDir, 'cfi.config.js'), 'module.exports = {}');

      expect(findConfigFile(testDir)).toBe(tsConfigPath);
    });

    it('should search in parent directories', () => {
      const subDir = join(testDir, 'subdir', 'nested');
      mkdirSync(subDir, { recursive: true });

      const configPath = join(testDir, 'cfi.config.ts');
      writeFileSync(configPath, 'export default {}');

      expect(findConfigFile(subDir)).toBe(configPath);
    });

    it('should return null if no config file found', () => {
      expect(findConfigFile(testDir)).toBeNull();
    });

    it('should find cfi.config.cjs', () => {
      const configPath = join(testDir, 'cfi.config.cjs');
      writeFileSync(configPath, 'module.exports = {}');

      expect(findConfigFile(testDir)).toBe(configPath);
    });
  });

  describe('loadConfigFile', () => {
    it('should load a TypeScript config with default export', async () => {
      const configPath = join(testDir, 'cfi.config.ts');
      writeFileSync(
        configPath,
        `
        export default {
          settingsDir: '.cache/cfi',
          requestTokenPrefix: 'blog',
          constants: { CLOUDFRONT_AWS_ACCESS_KEY: 'test-access-key' },
        };
        `
      );

      const config = await loadConfigFile(configPath);
      expect(config.settingsDir).toBe('.cache/cfi');
      expect(config.requestTokenPrefix).toBe('blog');
      expect(config.constants).toEqual({ CLOUDFRONT_AWS_ACCESS_KEY: 'test-access-key' });
    });

    it('should load a JavaScript config', async () => {
      const configPath = join(testDir, 'cfi.config.js');
      writeFileSync(configPath, `module.exports = { requestTokenPrefix: 'js-site' };`);

      const config = await loadConfigFile(configPath);
      expect(config.requestTokenPrefix).toBe('js-site');
    });

    it('should load a config exported as a function', async () => {
      const configPath = join(testDir, 'cfi.config.ts');
      writeFileSync(
        configPath,
        `
        export default () => ({
          secrets: { keys: ['test-auth-key'] },
        });
        `
      );

      const config = await loadConfigFile(configPath);
      expect(config.secrets).toEqual({ keys: ['test-auth-key'] });
    });

    it('should load environments', async () => {
      const configPath = join(testDir, 'cfi.config.ts');
      writeFileSync(
        configPath,
        `
        export default {
          environments: {
            prod: { requestTokenPrefix: 'prod' },
          },
        };
        `
      );

      const config = await loadConfigFile(configPath);
      expect(config.environments).toEqual({ prod: { requestTokenPrefix: 'prod' } });
    });

    it('should throw error if config file does not exist', async () => {
      const configPath = join(testDir, 'nonexistent.config.ts');

      await expect(loadConfigFile(configPath)).rejects.toThrow('Config file not found');
    });

    it('should throw error if config file has syntax errors', async () => {
      const configPath = join(testDir, 'cfi.config.ts');
      writeFileSync(configPath, 'invalid typescript syntax {{{');

      await expect(loadConfigFile(configPath)).rejects.toThrow('Failed to load config file');
    });

    it('should reject invalid values', async () => {
      const configPath = join(testDir, 'cfi.config.ts');
      writeFileSync(configPath, `export default { requestTokenPrefix: 'has spaces' };`);

      await expect(loadConfigFile(configPath)).rejects.toThrow(
        'Config validation failed:\n  - requestTokenPrefix: Request token prefix must contain only letters, numbers, and hyphens'
      );
    });
  });

  describe('discoverAndLoadConfig', () => {
    it('should discover and load config from current directory', async () => {
      const configPath = join(testDir, 'cfi.config.ts');
      writeFileSync(configPath, `export default { settingsDir: 'found' };`);

      const result = await discoverAndLoadConfig(testDir);
      expect(result.config.settingsDir).toBe('found');
      expect(result.configPath).toBe(configPath);
    });

    it('should return an empty config when no file exists', async () => {
      const result = await discoverAndLoadConfig(testDir);

      expect(result).toEqual({ config: {}, configPath: null });
    });
  });
});
