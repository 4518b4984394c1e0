import fs from 'fs-extra';
import path from 'path';
import type { EnginePaths } from '../types/engine';
import type { InstallOptions, InstallPhase, InstallResult } from '../types/install';
import type { DownloadProgressCallback, ReleaseArtifact } from '../types/release';
import { parseChecksums, sha512Hex } from '../utils/checksum';
import { FileSystem } from '../utils/file-system';
import { Logger } from '../utils/logger';
import { Platform } from '../utils/platform';
import type { ArchiveExtractor } from './archive-extractor';
import type { EngineStore } from './engine-store';
import {
  ArchiveError,
  ChecksumMismatchError,
  CorruptCacheError,
  FileSystemError,
  PlatformUnsupportedError,
  VersionNotFoundError,
} from './errors';
import type { HttpTransport } from './http-transport';
import type { ReleaseLocator } from './release-locator';
import { SELF_CONTAINED_MARKER, type StoreLayout } from './store-layout';
import type { VersionSpec } from './version-spec';

export interface InstallPipelineDeps {
  layout: StoreLayout;
  store: EngineStore;
  locator: ReleaseLocator;
  transport: HttpTransport;
  extractor: ArchiveExtractor;
}

/**
 * Installs an engine version:
 * CheckInstalled → CheckCache → Locate → Fetch → Extract → Finalize.
 *
 * Extraction happens in a staging directory that is renamed into place only after
 * the self-contained marker is written, so a directory under engines/ is either
 * a complete install or absent.
 */
export class InstallPipeline {
  constructor(private readonly deps: InstallPipelineDeps) {}

  async install(spec: VersionSpec, options: InstallOptions = {}): Promise<InstallResult> {
    const { layout, store } = this.deps;
    const paths = layout.paths(spec);

    // CheckInstalled
    if (options.force) {
      if (await this.uninstall(spec)) {
        Logger.debug(`Removed previous install at ${paths.installedRootDir}`);
      }
    } else if (await store.isInstalled(spec)) {
      return {
        status: 'already-installed',
        installedRootDir: paths.installedRootDir,
        installedBinaryPath: paths.installedBinaryPath,
      };
    }

    await store.removeStaging(spec);

    // CheckCache
    if (await store.hasCachedArchive(spec)) {
      Logger.info(`Version ${spec} is already downloaded. Extracting from cache.`);
      const data = await this.io('CheckCache', paths.cachedArchivePath, () => fs.readFile(paths.cachedArchivePath));
      await this.extractCached(spec, data, paths);
      await this.finalize(spec, paths);
      return { status: 'installed', source: 'cache', ...paths };
    }

    // Locate
    const artifact = await this.locate(spec);
    Logger.debug(`Package URL: ${artifact.downloadUrl}`);

    // Fetch
    const data = await this.fetch(artifact, options.onProgress);
    await this.io('Fetch', paths.cachedArchivePath, () => FileSystem.writeFileAtomic(paths.cachedArchivePath, data));
    Logger.info(`Downloaded to: ${paths.cachedArchivePath}`);

    // Extract straight from the downloaded bytes, which are identical to the cached file
    await this.extract(spec, data);
    await this.finalize(spec, paths);
    return { status: 'installed', source: 'download', ...paths };
  }

  /**
   * Remove an installed version. The cached archive stays, so reinstalling needs no network.
   */
  async uninstall(spec: VersionSpec): Promise<boolean> {
    return this.deps.store.removeInstall(spec);
  }

  private async locate(spec: VersionSpec): Promise<ReleaseArtifact> {
    const result = await this.deps.locator.locate(spec);

    switch (result.status) {
      case 'found':
        return result.artifact;
      case 'release-not-found':
        throw new VersionNotFoundError(spec.requested);
      case 'platform-unsupported':
        throw new PlatformUnsupportedError(spec.requested);
    }
  }

  private async fetch(artifact: ReleaseArtifact, onProgress?: DownloadProgressCallback): Promise<Buffer> {
    const { transport } = this.deps;
    const data = await transport.download(artifact.downloadUrl, onProgress);

    if (!artifact.checksumsUrl) {
      Logger.debug(`Release ${artifact.tagName} publishes no checksums; skipping verification`);
      return data;
    }

    const sums = parseChecksums(await transport.getText(artifact.checksumsUrl));
    const expected = sums.get(artifact.assetName);

    if (!expected) {
      Logger.warning(`No checksum listed for ${artifact.assetName}; skipping verification`);
      return data;
    }

    const actual = sha512Hex(data);
    if (actual !== expected) {
      throw new ChecksumMismatchError(artifact.assetName, expected, actual);
    }

    Logger.debug(`Checksum verified for ${artifact.assetName}`);
    return data;
  }

  /**
   * Extract a cache hit. An archive that cannot be read is evicted so the next install downloads it again.
   */
  private async extractCached(spec: VersionSpec, data: Buffer, paths: EnginePaths): Promise<void> {
    try {
      await this.extract(spec, data);
    } catch (error) {
      if (error instanceof ArchiveError && error.errorCode === 'INVALID_ARCHIVE') {
        await this.deps.store.removeCached(spec);
        throw new CorruptCacheError(spec.requested, paths.cachedArchivePath, error.message);
      }
      throw error;
    }
  }

  private async extract(spec: VersionSpec, data: Buffer): Promise<void> {
    const { layout, extractor, store } = this.deps;
    const stagingDir = layout.stagingDir(spec);

    try {
      await extractor.extract(data, stagingDir);
    } catch (error) {
      await store.removeStaging(spec);
      throw error;
    }

    const stagedBinary = path.join(stagingDir, layout.binaryName(spec));
    if (await FileSystem.isFile(stagedBinary)) {
      if (!Platform.isWindows()) {
        await this.io('Extract', stagedBinary, () => fs.chmod(stagedBinary, 0o755));
      }
    } else {
      Logger.warning(`Archive did not contain ${layout.binaryName(spec)}; the engine may not be launchable`);
    }
  }

  /**
   * Write the self-contained marker into the staged tree, then move the tree into place.
   */
  private async finalize(spec: VersionSpec, paths: EnginePaths): Promise<void> {
    const stagingDir = this.deps.layout.stagingDir(spec);

    await this.io('Finalize', paths.installedRootDir, async () => {
      await fs.writeFile(path.join(stagingDir, SELF_CONTAINED_MARKER), '');
      // Leftovers of an install without its binary are not an installation
      await fs.remove(paths.installedRootDir);
      await fs.move(stagingDir, paths.installedRootDir);
    });
  }

  private async io<T>(phase: InstallPhase, target: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw new FileSystemError(phase, target, error instanceof Error ? error.message : String(error));
    }
  }
}
