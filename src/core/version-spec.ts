import { Validator } from '../utils/validator';
import { InvalidVersionError } from './errors';

/**
 * Release channel appended to every requested version to form the release tag.
 */
export const RELEASE_CHANNEL = 'stable';

const CHANNEL_SUFFIX = `-${RELEASE_CHANNEL}`;

/**
 * A user-requested engine version and the release tag derived from it.
 *
 * `VersionSpec.from("3.5.1").canonical === "3.5.1-stable"`
 */
export class VersionSpec {
  private constructor(
    readonly requested: string,
    readonly canonical: string
  ) {
    Object.freeze(this);
  }

  /**
   * Build a spec from user input. Tokens that could escape the store directories are rejected.
   */
  static from(requested: string): VersionSpec {
    const problem = Validator.versionTokenProblem(requested);
    if (problem) {
      throw new InvalidVersionError(requested, problem);
    }

    return new VersionSpec(requested, `${requested}${CHANNEL_SUFFIX}`);
  }

  /**
   * Recover a spec from a store directory name such as "4.2.1-stable"; null for foreign names.
   */
  static fromCanonical(canonical: string): VersionSpec | null {
    if (!canonical.endsWith(CHANNEL_SUFFIX)) {
      return null;
    }

    const requested = canonical.slice(0, -CHANNEL_SUFFIX.length);
    if (!Validator.isValidVersionToken(requested)) {
      return null;
    }

    return new VersionSpec(requested, canonical);
  }

  /**
   * Order by numeric version components, e.g. 3.5 < 3.5.1 < 4.0
   */
  static compare(a: VersionSpec, b: VersionSpec): number {
    const partsA = numericParts(a.requested);
    const partsB = numericParts(b.requested);
    const length = Math.max(partsA.length, partsB.length);

    for (let i = 0; i < length; i++) {
      const diff = (partsA[i] ?? 0) - (partsB[i] ?? 0);
      if (diff !== 0) {
        return diff < 0 ? -1 : 1;
      }
    }

    return a.requested.localeCompare(b.requested);
  }

  /**
   * Whether this version satisfies a prefix requirement such as "4" or "4.2"
   */
  matches(requirement: string): boolean {
    const required = numericParts(requirement);
    const actual = numericParts(this.requested);
    return required.every((part, index) => actual[index] === part);
  }

  toString(): string {
    return this.requested;
  }
}

function numericParts(version: string): number[] {
  const parts: number[] = [];
  for (const segment of version.split('.')) {
    const match = segment.match(/^\d+/);
    if (!match) break;
    parts.push(parseInt(match[0], 10));
  }
  return parts;
}
