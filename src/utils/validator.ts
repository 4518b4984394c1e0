export class Validator {
  /**
   * Explain why a version token cannot be used to build store paths, or null when it can
   */
  static versionTokenProblem(token: string): string | null {
    if (token.length === 0) {
      return 'version must not be empty';
    }

    if (token === '.' || token === '..') {
      return 'version must not be a relative path segment';
    }

    if (/[/\\:]/.test(token)) {
      return 'version must not contain path separators';
    }

    if (/[\s\x00-\x1f\x7f]/.test(token)) {
      return 'version must not contain whitespace or control characters';
    }

    return null;
  }

  /**
   * Validate a user-supplied version token
   */
  static isValidVersionToken(token: string): boolean {
    return Validator.versionTokenProblem(token) === null;
  }

  /**
   * Validate an engine requirement such as "4", "4.2" or "3.5.1"
   */
  static isEngineRequirement(value: string): boolean {
    return /^\d+(\.\d+){0,2}$/.test(value);
  }

  /**
   * Validate a hex-encoded SHA-512 digest
   */
  static isSha512Hex(value: string): boolean {
    return /^[a-f0-9]{128}$/i.test(value);
  }
}
