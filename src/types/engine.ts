/**
 * Host platforms the engine publishes binaries for.
 * `Unsupported` still maps to an artifact suffix so path construction never fails.
 */
export type EnginePlatform =
  | 'Windows32'
  | 'Windows64'
  | 'MacOS'
  | 'Linux32'
  | 'Linux64'
  | 'Unsupported';

/**
 * Installation state derived from the filesystem each time it is needed.
 */
export type InstallationState = 'NotInstalled' | 'CachedOnly' | 'Installed';

export interface EnginePaths {
  installedRootDir: string;
  installedBinaryPath: string;
  cachedArchivePath: string;
}

export interface CachedArchive {
  canonical: string;
  archivePath: string;
  size: number;
}

export interface CacheStats {
  totalSize: number;
  archives: CachedArchive[];
}
