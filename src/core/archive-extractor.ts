/**
 * Archive extraction from in-memory bytes.
 */

import fs from 'fs-extra';
import path from 'path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import * as tar from 'tar';
import yauzl from 'yauzl';
import { ArchiveError } from './errors';

export type ArchiveFormat = 'zip' | 'tar.gz' | 'tar';

/**
 * Interface for extracting archives.
 */
export interface ArchiveExtractor {
  /**
   * Unpack an archive into a directory (created if missing), keeping relative paths and file modes.
   *
   * @throws ArchiveError on extraction failure
   */
  extract(data: Buffer, destDir: string): Promise<void>;
}

const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;

/**
 * Identify an archive by its leading bytes rather than its file name.
 */
export function detectArchiveFormat(data: Buffer): ArchiveFormat | null {
  if (data.length >= 4 && data.readUInt32LE(0) === 0x04034b50) {
    return 'zip';
  }
  // Empty zip: end of central directory record only
  if (data.length >= 4 && data.readUInt32LE(0) === 0x06054b50) {
    return 'zip';
  }
  if (data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b) {
    return 'tar.gz';
  }
  if (data.length >= 262 && data.toString('ascii', 257, 262) === 'ustar') {
    return 'tar';
  }
  return null;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function classify(error: unknown, fallback: string): ArchiveError {
  if (error instanceof ArchiveError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (message.includes('EACCES') || message.includes('EPERM')) {
    return new ArchiveError(`Permission denied: ${message}`, 'PERMISSION_DENIED');
  }
  return new ArchiveError(`${fallback}: ${message}`, 'EXTRACTION_FAILED');
}

/**
 * Resolve an entry name below destDir, refusing names that climb out of it.
 */
export function resolveEntryPath(destDir: string, entryName: string): string {
  const root = path.resolve(destDir);
  const target = path.resolve(root, entryName);
  if (!isInside(root, target)) {
    throw traversal(entryName);
  }
  return target;
}

function isInside(root: string, target: string): boolean {
  return target === root || target.startsWith(root + path.sep);
}

function traversal(entryName: string): ArchiveError {
  return new ArchiveError(`Path traversal detected in archive: ${entryName}`, 'INVALID_ARCHIVE');
}

/**
 * Refuse an entry whose parent directories lead outside the extraction root
 * through a symlink extracted earlier.
 */
async function assertRealParentInside(realRoot: string, destDir: string, entryPath: string, entryName: string): Promise<void> {
  const root = path.resolve(destDir);
  const segments = path.relative(root, path.dirname(entryPath)).split(path.sep).filter(Boolean);
  let current = root;

  for (const segment of segments) {
    current = path.join(current, segment);

    let isLink: boolean;
    try {
      isLink = (await fs.lstat(current)).isSymbolicLink();
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return;
      }
      throw error;
    }

    if (isLink) {
      let realPath: string;
      try {
        realPath = await fs.realpath(current);
      } catch (error) {
        throw new ArchiveError(
          `Entry ${entryName} goes through a dangling link: ${error instanceof Error ? error.message : String(error)}`,
          'INVALID_ARCHIVE'
        );
      }
      if (!isInside(realRoot, realPath)) {
        throw traversal(entryName);
      }
    }
  }
}

/**
 * Extractor for gzip-compressed or plain tarballs using the `tar` package.
 */
export class TarExtractor implements ArchiveExtractor {
  async extract(data: Buffer, destDir: string): Promise<void> {
    try {
      await fs.ensureDir(destDir);
      await this.unpack(data, destDir);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const code = errorCode(error) ?? '';
      // node-tar reports TAR_* codes, zlib Z_* codes
      if (code.startsWith('TAR_') || code.startsWith('Z_') || message.includes('unexpected end')) {
        throw new ArchiveError(`Invalid or corrupt tar archive: ${message}`, 'INVALID_ARCHIVE');
      }
      throw classify(error, `Failed to extract tar archive to ${destDir}`);
    }
  }

  private unpack(data: Buffer, destDir: string): Promise<void> {
    return new Promise((resolve, reject) => {
      // tar detects gzip on its own and keeps entries inside cwd
      const unpack = tar.x({ cwd: destDir, strict: true });
      unpack.on('error', reject);
      unpack.on('finish', () => resolve());
      unpack.on('close', () => resolve());
      unpack.end(data);
    });
  }
}

/**
 * Extractor for .zip archives using the `yauzl` package.
 */
export class ZipExtractor implements ArchiveExtractor {
  async extract(data: Buffer, destDir: string): Promise<void> {
    try {
      await fs.ensureDir(destDir);
      const realRoot = await fs.realpath(destDir);
      await this.extractZip(data, destDir, realRoot);
    } catch (error) {
      throw classify(error, `Failed to extract zip archive to ${destDir}`);
    }
  }

  private extractZip(data: Buffer, destDir: string, realRoot: string): Promise<void> {
    return new Promise((resolve, reject) => {
      yauzl.fromBuffer(data, { lazyEntries: true }, (openError, zipfile) => {
        if (openError || !zipfile) {
          reject(
            new ArchiveError(
              `Invalid or corrupt zip archive: ${openError ? openError.message : 'no entries'}`,
              'INVALID_ARCHIVE'
            )
          );
          return;
        }

        const archive = zipfile;
        const fail = (error: unknown): void => {
          archive.close();
          reject(error);
        };

        archive.on('entry', (entry: yauzl.Entry) => {
          this.writeEntry(archive, entry, destDir, realRoot)
            .then(() => archive.readEntry())
            .catch(fail);
        });
        archive.on('end', () => resolve());
        archive.on('error', (error: Error) => {
          reject(new ArchiveError(`Error reading zip archive: ${error.message}`, 'INVALID_ARCHIVE'));
        });

        archive.readEntry();
      });
    });
  }

  private async writeEntry(
    zipfile: yauzl.ZipFile,
    entry: yauzl.Entry,
    destDir: string,
    realRoot: string
  ): Promise<void> {
    const entryPath = resolveEntryPath(destDir, entry.fileName);
    await assertRealParentInside(realRoot, destDir, entryPath, entry.fileName);

    if (entry.fileName.endsWith('/')) {
      await fs.ensureDir(entryPath);
      return;
    }

    await fs.ensureDir(path.dirname(entryPath));

    // Unix mode lives in the upper 16 bits of the external attributes
    const unixMode = (entry.externalFileAttributes >>> 16) & 0xffff;
    const readStream = await this.openReadStream(zipfile, entry);

    if ((unixMode & S_IFMT) === S_IFLNK) {
      const linkTarget = (await this.readEntryData(readStream, entry)).toString('utf-8');
      if (path.isAbsolute(linkTarget) || /^[A-Za-z]:/.test(linkTarget)) {
        throw traversal(`${entry.fileName} -> ${linkTarget}`);
      }
      if (!isInside(path.resolve(destDir), path.resolve(path.dirname(entryPath), linkTarget))) {
        throw traversal(`${entry.fileName} -> ${linkTarget}`);
      }
      await fs.remove(entryPath);
      await fs.symlink(linkTarget, entryPath);
      return;
    }

    // Never write through a link left by an earlier entry
    if (await this.isSymlink(entryPath)) {
      await fs.remove(entryPath);
    }

    const read: { failure?: Error } = {};
    readStream.once('error', (error: Error) => {
      read.failure = error;
    });

    try {
      await pipeline(readStream, fs.createWriteStream(entryPath));
    } catch (error) {
      // Inflate and size errors come from the entry stream; anything else is the write side
      if (read.failure) {
        throw new ArchiveError(`Corrupt data in entry ${entry.fileName}: ${read.failure.message}`, 'INVALID_ARCHIVE');
      }
      throw error;
    }

    const permissions = unixMode & 0o777;
    if (permissions !== 0) {
      await fs.chmod(entryPath, permissions);
    }
  }

  private async readEntryData(readStream: Readable, entry: yauzl.Entry): Promise<Buffer> {
    const chunks: Buffer[] = [];
    try {
      for await (const chunk of readStream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      }
    } catch (error) {
      throw new ArchiveError(
        `Corrupt data in entry ${entry.fileName}: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_ARCHIVE'
      );
    }
    return Buffer.concat(chunks);
  }

  private async isSymlink(target: string): Promise<boolean> {
    try {
      return (await fs.lstat(target)).isSymbolicLink();
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  private openReadStream(zipfile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
    return new Promise((resolve, reject) => {
      zipfile.openReadStream(entry, (error, stream) => {
        if (error || !stream) {
          reject(
            new ArchiveError(
              `Failed to read entry ${entry.fileName}: ${error ? error.message : 'no data'}`,
              'INVALID_ARCHIVE'
            )
          );
          return;
        }
        resolve(stream);
      });
    });
  }
}

/**
 * Archive extractor that selects the implementation from the archive's content.
 */
export class DefaultArchiveExtractor implements ArchiveExtractor {
  private readonly tarExtractor = new TarExtractor();
  private readonly zipExtractor = new ZipExtractor();

  async extract(data: Buffer, destDir: string): Promise<void> {
    const format = detectArchiveFormat(data);

    switch (format) {
      case 'zip':
        return this.zipExtractor.extract(data, destDir);
      case 'tar.gz':
      case 'tar':
        return this.tarExtractor.extract(data, destDir);
      default:
        throw new ArchiveError(
          'Unrecognised archive format. Supported formats: zip, tar.gz, tar',
          'INVALID_ARCHIVE'
        );
    }
  }
}
