import { describe, it, expect } from '@jest/globals';
import { generateExampleConfig } from '../../../core/config/utils.js';

describe('generateExampleConfig', () => {
  it('should write the default settings directory', () => {
    expect(generateExampleConfig()).toContain("settingsDir: '.cfi',");
  });

  it('should write a custom settings directory', () => {
    const content = generateExampleConfig('.deploy/cfi');

    expect(content).toContain("settingsDir: '.deploy/cfi',");
    expect(content).toContain("import { defineConfig } from 'cloudfront-invalidator';");
  });
});
