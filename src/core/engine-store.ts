import fs from 'fs-extra';
import path from 'path';
import type { CachedArchive, CacheStats, InstallationState } from '../types/engine';
import { FileSystem } from '../utils/file-system';
import { FileSystemError, type FileSystemPhase } from './errors';
import type { StoreLayout } from './store-layout';
import { VersionSpec } from './version-spec';

/**
 * Filesystem queries and removals over the store. There is no manifest:
 * every answer is derived from which paths exist.
 */
export class EngineStore {
  constructor(readonly layout: StoreLayout) {}

  async getState(spec: VersionSpec): Promise<InstallationState> {
    if (await this.isInstalled(spec)) {
      return 'Installed';
    }
    if (await this.hasCachedArchive(spec)) {
      return 'CachedOnly';
    }
    return 'NotInstalled';
  }

  async isInstalled(spec: VersionSpec): Promise<boolean> {
    const { installedBinaryPath } = this.layout.paths(spec);
    return this.guard('CheckInstalled', installedBinaryPath, () => FileSystem.isFile(installedBinaryPath));
  }

  async hasCachedArchive(spec: VersionSpec): Promise<boolean> {
    const { cachedArchivePath } = this.layout.paths(spec);
    return this.guard('CheckCache', cachedArchivePath, () => FileSystem.isFile(cachedArchivePath));
  }

  /**
   * Installed versions, newest first
   */
  async listInstalled(): Promise<VersionSpec[]> {
    const root = this.layout.installRoot;
    const names = await this.guard('CheckInstalled', root, () => FileSystem.listDirectories(root));

    const installed: VersionSpec[] = [];
    for (const name of names) {
      const spec = VersionSpec.fromCanonical(name);
      if (spec && (await this.isInstalled(spec))) {
        installed.push(spec);
      }
    }

    return installed.sort((a, b) => VersionSpec.compare(b, a));
  }

  /**
   * Cached archives, newest version first
   */
  async listCached(): Promise<CachedArchive[]> {
    const root = this.layout.cacheRoot;
    const names = await this.guard('Cache', root, () => FileSystem.listDirectories(root));

    const specs = names
      .map(name => VersionSpec.fromCanonical(name))
      .filter((spec): spec is VersionSpec => spec !== null)
      .sort((a, b) => VersionSpec.compare(b, a));

    const archives: CachedArchive[] = [];
    for (const spec of specs) {
      const { cachedArchivePath } = this.layout.paths(spec);
      if (await this.hasCachedArchive(spec)) {
        const stat = await this.guard('Cache', cachedArchivePath, () => fs.stat(cachedArchivePath));
        archives.push({ canonical: spec.canonical, archivePath: cachedArchivePath, size: stat.size });
      }
    }

    return archives;
  }

  async getCacheStats(): Promise<CacheStats> {
    const archives = await this.listCached();
    return {
      totalSize: archives.reduce((total, archive) => total + archive.size, 0),
      archives,
    };
  }

  /**
   * Remove an installation. Never touches the cached archive.
   */
  async removeInstall(spec: VersionSpec): Promise<boolean> {
    const { installedRootDir } = this.layout.paths(spec);
    return this.guard('Uninstall', installedRootDir, async () => {
      if (!(await FileSystem.isDirectory(installedRootDir))) {
        return false;
      }
      await fs.remove(installedRootDir);
      return true;
    });
  }

  /**
   * Remove the cached archive of one version along with its directory.
   */
  async removeCached(spec: VersionSpec): Promise<boolean> {
    const { cachedArchivePath } = this.layout.paths(spec);
    const versionDir = path.dirname(cachedArchivePath);
    return this.guard('Cache', versionDir, () => FileSystem.removeIfExists(versionDir));
  }

  /**
   * Remove every cached archive, returning how many versions were removed.
   */
  async clearCache(): Promise<number> {
    const archives = await this.listCached();
    for (const archive of archives) {
      await this.guard('Cache', archive.archivePath, () => fs.remove(path.dirname(archive.archivePath)));
    }
    return archives.length;
  }

  /**
   * Remove a staging directory left behind by an interrupted install.
   */
  async removeStaging(spec: VersionSpec): Promise<boolean> {
    const stagingDir = this.layout.stagingDir(spec);
    return this.guard('Extract', stagingDir, () => FileSystem.removeIfExists(stagingDir));
  }

  private async guard<T>(phase: FileSystemPhase, target: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof FileSystemError) {
        throw error;
      }
      throw new FileSystemError(phase, target, error instanceof Error ? error.message : String(error));
    }
  }
}
