import { describe, it, expect } from 'vitest';
import { Validator } from './validator';

describe('Validator', () => {
  describe('versionTokenProblem', () => {
    it('accepts ordinary versions', () => {
      expect(Validator.versionTokenProblem('4.2.1')).toBeNull();
      expect(Validator.versionTokenProblem('3.5-rc1')).toBeNull();
    });

    it('explains what is wrong with a token', () => {
      expect(Validator.versionTokenProblem('')).toBe('version must not be empty');
      expect(Validator.versionTokenProblem('..')).toBe('version must not be a relative path segment');
      expect(Validator.versionTokenProblem('4/2')).toBe('version must not contain path separators');
      expect(Validator.versionTokenProblem('4 2')).toBe('version must not contain whitespace or control characters');
    });
  });

  it('recognises engine requirements', () => {
    expect(Validator.isEngineRequirement('4')).toBe(true);
    expect(Validator.isEngineRequirement('4.2')).toBe(true);
    expect(Validator.isEngineRequirement('4.2.1')).toBe(true);
    expect(Validator.isEngineRequirement('4.2.1.0')).toBe(false);
    expect(Validator.isEngineRequirement('Forward Plus')).toBe(false);
  });

  it('recognises SHA-512 digests', () => {
    expect(Validator.isSha512Hex('ab'.repeat(64))).toBe(true);
    expect(Validator.isSha512Hex('ab'.repeat(32))).toBe(false);
  });
});
