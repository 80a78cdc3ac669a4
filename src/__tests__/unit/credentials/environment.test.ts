import { describe, it, expect } from '@jest/globals';
import {
  createEnvironmentLookup,
  createSecretSource,
  requireSecrets,
} from '../../../core/credentials/environment.js';

describe('Credential Environment', () => {
  describe('createEnvironmentLookup', () => {
    it('should read constants and environment variables separately', () => {
      const lookup = createEnvironmentLookup(
        { CLOUDFRONT_AWS_ACCESS_KEY: 'constant-value' },
        { CLOUDFRONT_AWS_ACCESS_KEY: 'env-value' }
      );

      expect(lookup.constant('CLOUDFRONT_AWS_ACCESS_KEY')).toBe('constant-value');
      expect(lookup.env('CLOUDFRONT_AWS_ACCESS_KEY')).toBe('env-value');
      expect(lookup.constant('MISSING')).toBeUndefined();
      expect(lookup.env('MISSING')).toBeUndefined();
    });
  });

  describe('createSecretSource', () => {
    it('should put config keys before environment keys', () => {
      const source = createSecretSource(
        { secrets: { keys: ['config-key'] } },
        { CFI_AUTH_KEY: 'env-auth-key', CFI_SECURE_AUTH_KEY: 'env-secure-key' }
      );

      expect(source).toEqual({
        keys: ['config-key', 'env-auth-key', 'env-secure-key'],
        salt: undefined,
      });
    });

    it('should skip empty keys', () => {
      const source = createSecretSource(
        { secrets: { keys: [''] } },
        { CFI_AUTH_KEY: '', CFI_SECURE_AUTH_KEY: 'env-secure-key' }
      );

      expect(source.keys).toEqual(['env-secure-key']);
    });

    it('should prefer the config salt over CFI_SALT', () => {
      const source = createSecretSource(
        { secrets: { keys: [], salt: 'config-salt' } },
        { CFI_SALT: 'env-salt' }
      );

      expect(source).toEqual({ keys: [], salt: 'config-salt' });
    });

    it('should use CFI_SALT when nothing else is configured', () => {
      const source = createSecretSource({ secrets: { keys: [] } }, { CFI_SALT: 'env-salt' });

      expect(source).toEqual({ keys: [], salt: 'env-salt' });
    });

    it('should return an empty source when no secrets are configured', () => {
      expect(createSecretSource({ secrets: { keys: [] } }, {})).toEqual({
        keys: [],
        salt: undefined,
      });
    });

    it('should not mutate the config keys', () => {
      const config = { secrets: { keys: ['config-key'] } };
      createSecretSource(config, { CFI_AUTH_KEY: 'env-auth-key' });

      expect(config.secrets.keys).toEqual(['config-key']);
    });
  });

  describe('requireSecrets', () => {
    it('should accept keys or a salt', () => {
      expect(() => requireSecrets({ keys: ['test-auth-key'] })).not.toThrow();
      expect(() => requireSecrets({ keys: [], salt: 'test-salt' })).not.toThrow();
    });

    it('should list where secrets can be configured', () => {
      expect(() => requireSecrets({ keys: [''] })).toThrow(
        'Environment variables (CFI_AUTH_KEY, CFI_SECURE_AUTH_KEY)'
      );
    });
  });
});
