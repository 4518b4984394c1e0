import fs from 'fs-extra';

export class FileSystem {
  /**
   * Check that a path exists and is a regular file
   */
  static async isFile(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (error) {
      if (FileSystem.isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Check that a path exists and is a directory
   */
  static async isDirectory(dir: string): Promise<boolean> {
    try {
      const stat = await fs.stat(dir);
      return stat.isDirectory();
    } catch (error) {
      if (FileSystem.isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * List the names of the sub-directories of a directory (empty if it doesn't exist)
   */
  static async listDirectories(dir: string): Promise<string[]> {
    if (!(await fs.pathExists(dir))) {
      return [];
    }

    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter(entry => entry.isDirectory()).map(entry => entry.name);
  }

  /**
   * Remove a file or directory tree, returning whether anything was there
   */
  static async removeIfExists(target: string): Promise<boolean> {
    if (!(await fs.pathExists(target))) {
      return false;
    }

    await fs.remove(target);
    return true;
  }

  /**
   * Write bytes to a temporary sibling and rename it into place, so readers never see a partial file
   */
  static async writeFileAtomic(filePath: string, data: Buffer): Promise<void> {
    const tempPath = `${filePath}.download`;

    try {
      await fs.outputFile(tempPath, data);
      await fs.move(tempPath, filePath, { overwrite: true });
    } catch (error) {
      await fs.remove(tempPath);
      throw error;
    }
  }

  static isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
  }
}

/**
 * Render a byte count for humans, e.g. "48.2 MB"
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}
