import path from 'path';
import type { EnginePaths, EnginePlatform } from '../types/engine';
import { PlatformResolver } from './platform-resolver';
import type { VersionSpec } from './version-spec';

export const ENGINES_DIR = 'engines';
export const ARCHIVE_EXTENSION = 'zip';
/** Empty file that switches the engine to self-contained mode */
export const SELF_CONTAINED_MARKER = '_sc_';

export interface StoreLayoutOptions {
  dataDir: string;
  cacheDir: string;
  platform: EnginePlatform;
  binaryPrefix: string;
}

/**
 * Path arithmetic for the two-tier store. Performs no I/O.
 *
 * ```
 * <cache>/engines/<canonical>/<binaryName>.zip
 * <data>/engines/<canonical>/<binaryName>
 * <data>/engines/<canonical>/_sc_
 * ```
 */
export class StoreLayout {
  constructor(private readonly options: StoreLayoutOptions) {}

  get platform(): EnginePlatform {
    return this.options.platform;
  }

  get installRoot(): string {
    return path.join(this.options.dataDir, ENGINES_DIR);
  }

  get cacheRoot(): string {
    return path.join(this.options.cacheDir, ENGINES_DIR);
  }

  binaryName(spec: VersionSpec): string {
    const suffix = PlatformResolver.suffix(this.options.platform);
    return `${this.options.binaryPrefix}_v${spec.canonical}_${suffix}`;
  }

  archiveName(spec: VersionSpec): string {
    return `${this.binaryName(spec)}.${ARCHIVE_EXTENSION}`;
  }

  paths(spec: VersionSpec): EnginePaths {
    const installedRootDir = path.join(this.installRoot, spec.canonical);
    return {
      installedRootDir,
      installedBinaryPath: path.join(installedRootDir, this.binaryName(spec)),
      cachedArchivePath: path.join(this.cacheRoot, spec.canonical, this.archiveName(spec)),
    };
  }

  /**
   * Sibling directory an install is extracted into before being renamed into place
   */
  stagingDir(spec: VersionSpec): string {
    return path.join(this.installRoot, `.${spec.canonical}.partial`);
  }
}
