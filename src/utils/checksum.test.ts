import { describe, it, expect } from 'vitest';
import { parseChecksums, sha512Hex } from './checksum';

describe('checksum', () => {
  it('hashes bytes with SHA-512', () => {
    expect(sha512Hex(Buffer.from(''))).toBe(
      'cf83e1357eefb8bdf1542850d66d8007d620e4050b5715dc83f4a921d36ce9ce' +
        '47d0d13c5d85f2b0ff8318d2877eec2f63b931bd47417a81a538327af927da3e'
    );
  });

  it('parses sums files into a name to digest map', () => {
    const digest = 'AB'.repeat(64);
    const sums = parseChecksums(
      [`${digest}  Godot_v4.2-stable_x11.64.zip`, `${'cd'.repeat(64)} *Godot_v4.2-stable_win64.exe.zip`, ''].join('\n')
    );

    expect(sums.get('Godot_v4.2-stable_x11.64.zip')).toBe('ab'.repeat(64));
    expect(sums.get('Godot_v4.2-stable_win64.exe.zip')).toBe('cd'.repeat(64));
    expect(sums.size).toBe(2);
  });

  it('skips lines without a SHA-512 digest', () => {
    const sums = parseChecksums(`${'ab'.repeat(32)}  short.zip\nnot a checksum line\n`);

    expect(sums.size).toBe(0);
  });
});
