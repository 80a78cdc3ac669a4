import { describe, it, expect } from '@jest/globals';
import { mergeEnvironment } from '../../../core/config/merger.js';
import type { InvalidatorConfig } from '../../../types/config.js';

describe('Config Merger', () => {
  const baseConfig: InvalidatorConfig = {
    settingsDir: '.cfi',
    requestTokenPrefix: 'site',
    constants: {
      CLOUDFRONT_AWS_ACCESS_KEY: 'base-access-key',
      CLOUDFRONT_AWS_SECRET_KEY: 'base-secret-key',
    },
    secrets: { keys: ['base-key'], salt: 'base-salt' },
    environments: {
      prod: {
        requestTokenPrefix: 'site-prod',
        constants: { CLOUDFRONT_AWS_ACCESS_KEY: 'prod-access-key' },
        secrets: { keys: ['prod-key'] },
      },
      staging: {
        settingsDir: '.cfi-staging',
      },
    },
  };

  describe('mergeEnvironment', () => {
    it('should return base config when no environment is specified', () => {
      const result = mergeEnvironment(baseConfig);

      expect(result).toEqual({
        settingsDir: '.cfi',
        requestTokenPrefix: 'site',
        constants: {
          CLOUDFRONT_AWS_ACCESS_KEY: 'base-access-key',
          CLOUDFRONT_AWS_SECRET_KEY: 'base-secret-key',
        },
        secrets: { keys: ['base-key'], salt: 'base-salt' },
      });
      expect('environments' in result).toBe(false);
    });

    it('should override scalars and merge constants key by key', () => {
      const result = mergeEnvironment(baseConfig, 'prod');

      expect(result.settingsDir).toBe('.cfi');
      expect(result.requestTokenPrefix).toBe('site-prod');
      expect(result.constants).toEqual({
        CLOUDFRONT_AWS_ACCESS_KEY: 'prod-access-key',
        CLOUDFRONT_AWS_SECRET_KEY: 'base-secret-key',
      });
    });

    it('should replace secret keys and keep the base salt', () => {
      const result = mergeEnvironment(baseConfig, 'prod');

      expect(result.secrets).toEqual({ keys: ['prod-key'], salt: 'base-salt' });
    });

    it('should keep base values the environment does not set', () => {
      const result = mergeEnvironment(baseConfig, 'staging');

      expect(result.settingsDir).toBe('.cfi-staging');
      expect(result.requestTokenPrefix).toBe('site');
      expect(result.secrets).toEqual({ keys: ['base-key'], salt: 'base-salt' });
    });

    it('should throw for an unknown environment', () => {
      expect(() => mergeEnvironment(baseConfig, 'dev')).toThrow(
        'Environment "dev" not found in config. Available environments: prod, staging'
      );
    });

    it('should ignore the environment when the config defines none', () => {
      const result = mergeEnvironment({ settingsDir: '.cfi' }, 'prod');

      expect(result).toEqual({ settingsDir: '.cfi' });
    });
  });
});
