import { describe, it, expect, jest } from '@jest/globals';
import { CredentialResolver } from '../../../core/credentials/credential-resolver.js';
import { PathValidator } from '../../../core/paths/path-validator.js';
import {
  InvalidationRequestBuilder,
  randomSuffix,
  type RequestBuilderOptions,
} from '../../../core/invalidation/request-builder.js';
import type {
  RequestBuiltEvent,
  RequestFailedEvent,
} from '../../../types/invalidation.js';
import type { Settings } from '../../../types/settings.js';
import {
  TEST_DISTRIBUTION_ID,
  createSettingsWithCredentials,
  createTestEnvironment,
  createTestSettings,
  createTestStore,
} from '../../helpers/test-helpers.js';

describe('InvalidationRequestBuilder', () => {
  const store = createTestStore();
  const now = () => 1700000000123;

  function createBuilder(
    settings: Settings = createTestSettings(),
    options: RequestBuilderOptions = {}
  ): InvalidationRequestBuilder {
    const resolver = new CredentialResolver(store, createTestEnvironment(), settings);
    return new InvalidationRequestBuilder(resolver, { now, ...options });
  }

  describe('build', () => {
    it('should build a request with sanitized paths', () => {
      const result = createBuilder().build(TEST_DISTRIBUTION_ID, ['blog/*', '/blog/*', '/about']);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.distributionId).toBe(TEST_DISTRIBUTION_ID);
        expect(result.data.paths).toEqual(['/blog/*', '/about']);
        expect(result.data.requestToken).toMatch(/^cfi-1700000000-[A-Za-z0-9]{6}$/);
      }
    });

    it('should use the configured token prefix', () => {
      const result = createBuilder(createTestSettings(), { tokenPrefix: 'site-a' }).build(
        TEST_DISTRIBUTION_ID,
        ['/*']
      );

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.requestToken).toMatch(/^site-a-1700000000-[A-Za-z0-9]{6}$/);
      }
    });

    it('should return a frozen request', () => {
      const result = createBuilder().build(TEST_DISTRIBUTION_ID, ['/*']);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(Object.isFrozen(result.data)).toBe(true);
        expect(Object.isFrozen(result.data.paths)).toBe(true);
      }
    });

    it('should fail without a distribution ID before validating paths', () => {
      const pathValidator = new PathValidator();
      const sanitize = jest.spyOn(pathValidator, 'sanitize');

      const result = createBuilder(createTestSettings(), { pathValidator }).build('', ['/*']);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('MissingDistribution');
        expect(result.error.message).toBe('CloudFront Distribution ID not configured.');
        expect(result.error.field).toBe('distributionId');
      }
      expect(sanitize).not.toHaveBeenCalled();
    });

    it('should return the path validation error', () => {
      const result = createBuilder().build(TEST_DISTRIBUTION_ID, ['', ' ']);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NoValidPaths');
      }
    });

    it('should create a new token for every request', () => {
      const builder = createBuilder();
      const tokens = new Set(
        Array.from({ length: 20 }, () => builder.createRequestToken())
      );

      expect(tokens.size).toBe(20);
    });
  });

  describe('auth mode', () => {
    it('should use explicit credentials when they resolve', () => {
      const result = createBuilder(createSettingsWithCredentials(store)).build(
        TEST_DISTRIBUTION_ID,
        ['/*']
      );

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.authMode).toEqual({
          type: 'explicit',
          credentials: {
            accessKeyId: 'test-access-key',
            secretAccessKey: 'test-secret-key',
          },
        });
        expect(Object.isFrozen(result.data.authMode)).toBe(true);
      }
    });

    it('should prefer the ambient credential when it is switched on', () => {
      const settings = createSettingsWithCredentials(store, 'test-access-key', 'test-secret-key', {
        useAmbientCredential: true,
      });
      const result = createBuilder(settings).build(TEST_DISTRIBUTION_ID, ['/*']);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.authMode).toEqual({ type: 'ambient' });
      }
    });

    it('should fall back to the ambient credential without explicit keys', () => {
      const result = createBuilder().build(TEST_DISTRIBUTION_ID, ['/*']);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.authMode).toEqual({ type: 'ambient' });
      }
    });
  });

  describe('hooks', () => {
    it('should signal a built request', () => {
      const onRequestBuilt = jest.fn<(event: RequestBuiltEvent) => void>();
      createBuilder(createTestSettings(), { hooks: { onRequestBuilt } }).build(
        TEST_DISTRIBUTION_ID,
        ['a', '/b']
      );

      expect(onRequestBuilt).toHaveBeenCalledTimes(1);
      expect(onRequestBuilt).toHaveBeenCalledWith({
        distributionId: TEST_DISTRIBUTION_ID,
        paths: ['/a', '/b'],
      });
    });

    it('should not signal a failed build', () => {
      const onRequestBuilt = jest.fn<(event: RequestBuiltEvent) => void>();
      createBuilder(createTestSettings(), { hooks: { onRequestBuilt } }).build('', ['/a']);

      expect(onRequestBuilt).not.toHaveBeenCalled();
    });

    it('should signal a transport failure', () => {
      const onRequestFailed = jest.fn<(event: RequestFailedEvent) => void>();
      const builder = createBuilder(createTestSettings(), { hooks: { onRequestFailed } });
      const result = builder.build(TEST_DISTRIBUTION_ID, ['/a']);
      const error = new Error('Access denied');

      expect(result.success).toBe(true);
      if (result.success) {
        builder.reportFailure(result.data, error);
        expect(onRequestFailed).toHaveBeenCalledWith({ request: result.data, error });
      }
    });
  });

  describe('randomSuffix', () => {
    it('should return alphanumerics of the requested length', () => {
      expect(randomSuffix()).toMatch(/^[A-Za-z0-9]{6}$/);
      expect(randomSuffix(10)).toMatch(/^[A-Za-z0-9]{10}$/);
    });
  });
});
