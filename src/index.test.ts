import { describe, it, expect } from 'vitest';
import { getVersion } from './cli/commands/version.js';
import { VERSION, renderConfigH } from './index.js';

describe('keyboard-config-gen', () => {
  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match the package version', () => {
      expect(VERSION).toBe(getVersion());
    });
  });

  it('should expose the generator from the package root', () => {
    expect(renderConfigH({ manufacturer: 'Acme' })).toBe(
      '/* This file was generated by the config generator. Do not edit or copy. */\n' +
        '\n' +
        '#pragma once\n' +
        '\n' +
        '#ifndef MANUFACTURER\n' +
        '#    define MANUFACTURER Acme\n' +
        '#endif // MANUFACTURER\n'
    );
  });
});
