import type { DownloadProgressCallback } from './release';

export type InstallPhase =
  | 'CheckInstalled'
  | 'CheckCache'
  | 'Locate'
  | 'Fetch'
  | 'Extract'
  | 'Finalize';

export interface InstallOptions {
  force?: boolean;
  onProgress?: DownloadProgressCallback;
}

export type InstallResult =
  | {
      status: 'already-installed';
      installedRootDir: string;
      installedBinaryPath: string;
    }
  | {
      status: 'installed';
      source: 'download' | 'cache';
      installedRootDir: string;
      installedBinaryPath: string;
      cachedArchivePath: string;
    };

export interface LaunchOptions {
  projectManager: boolean;
  projectPath?: string;
  args?: string[];
}

export interface LaunchResult {
  pid: number;
  binaryPath: string;
  args: string[];
}
