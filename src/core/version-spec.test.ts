import { describe, it, expect } from 'vitest';
import { InvalidVersionError } from './errors';
import { VersionSpec } from './version-spec';

describe('VersionSpec', () => {
  it('appends the release channel to form the canonical tag', () => {
    const spec = VersionSpec.from('3.5.1');

    expect(spec.requested).toBe('3.5.1');
    expect(spec.canonical).toBe('3.5.1-stable');
  });

  it('is deterministic for the same input', () => {
    expect(VersionSpec.from('4.2').canonical).toBe(VersionSpec.from('4.2').canonical);
  });

  it('is immutable', () => {
    expect(Object.isFrozen(VersionSpec.from('4.2'))).toBe(true);
  });

  it.each(['', '.', '..', '../4.2', '4.2/..', '4\\2', 'C:4.2', '4.2 beta', '4.2\n'])(
    'rejects %j',
    (token) => {
      expect(() => VersionSpec.from(token)).toThrow(InvalidVersionError);
    }
  );

  it('recovers a spec from a store directory name', () => {
    const spec = VersionSpec.fromCanonical('4.2.1-stable');

    expect(spec?.requested).toBe('4.2.1');
    expect(spec?.canonical).toBe('4.2.1-stable');
  });

  it('ignores directory names without the channel suffix', () => {
    expect(VersionSpec.fromCanonical('4.2.1-rc1')).toBeNull();
    expect(VersionSpec.fromCanonical('.4.2.1-stable.partial')).toBeNull();
  });

  it('orders versions numerically', () => {
    const versions = ['4.0', '3.5.1', '3.10', '3.5'].map(v => VersionSpec.from(v));

    const sorted = versions.sort(VersionSpec.compare).map(spec => spec.requested);

    expect(sorted).toEqual(['3.5', '3.5.1', '3.10', '4.0']);
  });

  it('matches prefix requirements component by component', () => {
    expect(VersionSpec.from('4.2').matches('4.2')).toBe(true);
    expect(VersionSpec.from('4.2.1').matches('4.2')).toBe(true);
    expect(VersionSpec.from('4.2.1').matches('4')).toBe(true);
    expect(VersionSpec.from('4.20').matches('4.2')).toBe(false);
    expect(VersionSpec.from('3.5').matches('4')).toBe(false);
  });
});
