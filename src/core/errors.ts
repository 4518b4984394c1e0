import type { InstallPhase } from '../types/install';

export class EngineManagerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineManagerError';
  }
}

export class InvalidVersionError extends EngineManagerError {
  constructor(
    public readonly version: string,
    reason: string
  ) {
    super(`Invalid version "${version}": ${reason}`);
    this.name = 'InvalidVersionError';
  }
}

export class VersionNotFoundError extends EngineManagerError {
  constructor(public readonly version: string) {
    super(`Sorry, version "${version}" not found.`);
    this.name = 'VersionNotFoundError';
  }
}

export class PlatformUnsupportedError extends EngineManagerError {
  constructor(public readonly version: string) {
    super(`Sorry, version "${version}" does not support your platform.`);
    this.name = 'PlatformUnsupportedError';
  }
}

export class TransportError extends EngineManagerError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export type FileSystemPhase = InstallPhase | 'Uninstall' | 'Cache';

export class FileSystemError extends EngineManagerError {
  constructor(
    public readonly phase: FileSystemPhase,
    public readonly path: string,
    message: string
  ) {
    super(`${phase} failed at ${path}: ${message}`);
    this.name = 'FileSystemError';
  }
}

export type ArchiveErrorCode = 'INVALID_ARCHIVE' | 'EXTRACTION_FAILED' | 'PERMISSION_DENIED';

export class ArchiveError extends EngineManagerError {
  constructor(
    message: string,
    public readonly errorCode: ArchiveErrorCode
  ) {
    super(message);
    this.name = 'ArchiveError';
  }
}

export class CorruptCacheError extends EngineManagerError {
  constructor(
    public readonly version: string,
    public readonly archivePath: string,
    reason: string
  ) {
    super(
      `Cached archive for version ${version} is corrupt and has been removed (${reason}). ` +
        `Run 'engman install ${version}' again to download it.`
    );
    this.name = 'CorruptCacheError';
  }
}

export class ChecksumMismatchError extends EngineManagerError {
  constructor(
    public readonly assetName: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(`Checksum mismatch for ${assetName}. Expected: ${expected}, got: ${actual}`);
    this.name = 'ChecksumMismatchError';
  }
}

export class NotInstalledError extends EngineManagerError {
  constructor(public readonly version: string) {
    super(`Version ${version} is not installed.`);
    this.name = 'NotInstalledError';
  }
}

export class LaunchError extends EngineManagerError {
  constructor(
    public readonly binaryPath: string,
    message: string
  ) {
    super(`Failed to launch ${binaryPath}: ${message}`);
    this.name = 'LaunchError';
  }
}

export class ConfigError extends EngineManagerError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * Errors that describe an expected user-facing outcome rather than a failure of the tool.
 */
export function isUserFacingOutcome(error: unknown): boolean {
  return (
    error instanceof VersionNotFoundError ||
    error instanceof PlatformUnsupportedError ||
    error instanceof NotInstalledError ||
    error instanceof InvalidVersionError
  );
}
