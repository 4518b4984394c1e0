import { createHash } from 'node:crypto';
import { Validator } from './validator';

export function sha512Hex(data: Buffer): string {
  return createHash('sha512').update(data).digest('hex');
}

/**
 * Parse a sums file made of `<hex digest>  <file name>` lines into a name → digest map.
 * Lines that do not carry a SHA-512 digest are ignored.
 */
export function parseChecksums(text: string): Map<string, string> {
  const sums = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const match = line.match(/^([A-Fa-f0-9]+)\s+\*?(.+)$/);
    if (!match) continue;

    const [, digest, fileName] = match;
    if (digest && fileName && Validator.isSha512Hex(digest)) {
      sums.set(fileName.trim(), digest.toLowerCase());
    }
  }

  return sums;
}
