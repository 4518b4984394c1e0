import fs from 'fs-extra';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ReleaseRecord } from '../types/release';
import type { EngineManagerConfig } from '../utils/config';
import { sha512Hex } from '../utils/checksum';
import { createContext, type EngineManagerContext } from './context';
import {
  ChecksumMismatchError,
  CorruptCacheError,
  PlatformUnsupportedError,
  TransportError,
  VersionNotFoundError,
} from './errors';
import { HttpTransport } from './http-transport';
import {
  createFakeFetch,
  createTempDir,
  createTestZip,
  damage,
  engineLikeContent,
  FakeReleaseIndex,
} from './test-utils';
import { VersionSpec } from './version-spec';

const BINARY = 'Godot_v3.5.1-stable_x11.64';
const DOWNLOAD_URL = 'https://downloads.example.com/3.5.1/Godot_v3.5.1-stable_x11.64.zip';
const SUMS_URL = 'https://downloads.example.com/3.5.1/SHA512-SUMS.txt';

function release(withChecksums = false): ReleaseRecord {
  const assets = [
    { name: 'Godot_v3.5.1-stable_win64.exe.zip', browserDownloadUrl: 'https://downloads.example.com/3.5.1/win.zip' },
    { name: `${BINARY}.zip`, browserDownloadUrl: DOWNLOAD_URL },
  ];
  if (withChecksums) {
    assets.push({ name: 'SHA512-SUMS.txt', browserDownloadUrl: SUMS_URL });
  }
  return { tagName: '3.5.1-stable', assets };
}

describe('InstallPipeline', () => {
  let root: string;
  let archive: Buffer;
  let requests: string[];
  let context: EngineManagerContext;
  const spec = VersionSpec.from('3.5.1');

  function setup(releases: ReleaseRecord[], routes: Record<string, Buffer | string>): void {
    const config: EngineManagerConfig = {
      dataDir: path.join(root, 'data'),
      cacheDir: path.join(root, 'cache'),
      releaseRepo: 'example/engine',
      githubApiUrl: 'https://api.example.com',
      binaryPrefix: 'Godot',
      userAgent: 'engman-test',
    };
    const fake = createFakeFetch(routes);
    requests = fake.requests;
    context = createContext(config, {
      platform: 'Linux64',
      transport: new HttpTransport({ userAgent: config.userAgent, fetch: fake.fetch }),
      index: new FakeReleaseIndex(releases),
    });
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    root = await createTempDir();
    archive = await createTestZip({
      [BINARY]: { content: '#!/bin/sh\necho engine\n', mode: 0o755 },
      'editor_data/readme.txt': 'bundled data',
    });
    setup([release()], { [DOWNLOAD_URL]: archive });
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('downloads, caches, extracts and marks a fresh install', async () => {
    const result = await context.pipeline.install(spec);
    const paths = context.layout.paths(spec);

    expect(result).toEqual({ status: 'installed', source: 'download', ...paths });
    expect(paths.installedRootDir).toBe(path.join(root, 'data', 'engines', '3.5.1-stable'));
    expect(paths.cachedArchivePath).toBe(path.join(root, 'cache', 'engines', '3.5.1-stable', `${BINARY}.zip`));
    expect(requests).toEqual([DOWNLOAD_URL]);
    expect((await fs.readFile(paths.cachedArchivePath)).equals(archive)).toBe(true);
    expect(await fs.readFile(paths.installedBinaryPath, 'utf-8')).toBe('#!/bin/sh\necho engine\n');
    expect(await fs.readFile(path.join(paths.installedRootDir, '_sc_'), 'utf-8')).toBe('');
    expect(await fs.pathExists(context.layout.stagingDir(spec))).toBe(false);
    expect(await context.store.getState(spec)).toBe('Installed');
  });

  it.skipIf(process.platform === 'win32')('leaves the engine binary executable', async () => {
    await context.pipeline.install(spec);

    const stat = await fs.stat(context.layout.paths(spec).installedBinaryPath);
    expect(stat.mode & 0o111).not.toBe(0);
  });

  it('fails with VersionNotFoundError and writes nothing for an unknown version', async () => {
    await expect(context.pipeline.install(VersionSpec.from('9.9.9'))).rejects.toThrow(VersionNotFoundError);

    expect(requests).toEqual([]);
    expect(await fs.pathExists(path.join(root, 'data'))).toBe(false);
    expect(await fs.pathExists(path.join(root, 'cache'))).toBe(false);
  });

  it('fails with PlatformUnsupportedError when the release has no asset for this platform', async () => {
    setup([{ tagName: '3.5.1-stable', assets: [release().assets[0]] }], {});

    const error = await context.pipeline.install(spec).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PlatformUnsupportedError);
    expect(error).toMatchObject({ message: 'Sorry, version "3.5.1" does not support your platform.' });
  });

  it('is a no-op when the version is already installed', async () => {
    await context.pipeline.install(spec);

    const second = await context.pipeline.install(spec);

    expect(second).toEqual({
      status: 'already-installed',
      installedRootDir: context.layout.paths(spec).installedRootDir,
      installedBinaryPath: context.layout.paths(spec).installedBinaryPath,
    });
    expect(requests).toHaveLength(1);
  });

  it('reinstalls from the cache without touching the network', async () => {
    await context.pipeline.install(spec);
    const paths = context.layout.paths(spec);
    const firstBinary = await fs.readFile(paths.installedBinaryPath);
    const firstData = await fs.readFile(path.join(paths.installedRootDir, 'editor_data', 'readme.txt'));
    await fs.remove(paths.installedRootDir);

    const result = await context.pipeline.install(spec);

    expect(result).toMatchObject({ status: 'installed', source: 'cache' });
    expect(requests).toHaveLength(1);
    expect((await fs.readFile(paths.installedBinaryPath)).equals(firstBinary)).toBe(true);
    expect((await fs.readFile(path.join(paths.installedRootDir, 'editor_data', 'readme.txt'))).equals(firstData)).toBe(true);
  });

  it('removes the previous install before a forced reinstall', async () => {
    await context.pipeline.install(spec);
    const stale = path.join(context.layout.paths(spec).installedRootDir, 'stale.txt');
    await fs.outputFile(stale, 'left over');

    const result = await context.pipeline.install(spec, { force: true });

    expect(result).toMatchObject({ status: 'installed', source: 'cache' });
    expect(await fs.pathExists(stale)).toBe(false);
    expect(await context.store.isInstalled(spec)).toBe(true);
  });

  it('keeps the cache on uninstall so the next install is extract-only', async () => {
    await context.pipeline.install(spec);

    expect(await context.pipeline.uninstall(spec)).toBe(true);
    expect(await context.store.getState(spec)).toBe('CachedOnly');
    expect(await context.pipeline.uninstall(spec)).toBe(false);

    const result = await context.pipeline.install(spec);

    expect(result).toMatchObject({ status: 'installed', source: 'cache' });
    expect(requests).toHaveLength(1);
  });

  it('verifies the download against the published checksums', async () => {
    setup([release(true)], {
      [DOWNLOAD_URL]: archive,
      [SUMS_URL]: `${sha512Hex(archive)}  ${BINARY}.zip\n`,
    });

    await expect(context.pipeline.install(spec)).resolves.toMatchObject({ source: 'download' });
    expect(requests).toEqual([DOWNLOAD_URL, SUMS_URL]);
  });

  it('refuses a download whose checksum does not match and caches nothing', async () => {
    setup([release(true)], {
      [DOWNLOAD_URL]: archive,
      [SUMS_URL]: `${'0'.repeat(128)}  ${BINARY}.zip\n`,
    });

    await expect(context.pipeline.install(spec)).rejects.toThrow(ChecksumMismatchError);
    expect(await context.store.getState(spec)).toBe('NotInstalled');
  });

  it('evicts a corrupt cached archive and downloads it again next time', async () => {
    const { cachedArchivePath } = context.layout.paths(spec);
    await fs.outputFile(cachedArchivePath, 'truncated download');

    await expect(context.pipeline.install(spec)).rejects.toThrow(CorruptCacheError);
    expect(await fs.pathExists(cachedArchivePath)).toBe(false);
    expect(await fs.pathExists(context.layout.paths(spec).installedRootDir)).toBe(false);
    expect(await fs.pathExists(context.layout.stagingDir(spec))).toBe(false);
    expect(await context.store.isInstalled(spec)).toBe(false);
    expect(requests).toEqual([]);

    await expect(context.pipeline.install(spec)).resolves.toMatchObject({ source: 'download' });
    expect(requests).toEqual([DOWNLOAD_URL]);
  });

  it('evicts a cached archive whose entry data is damaged', async () => {
    const { cachedArchivePath, installedRootDir } = context.layout.paths(spec);
    const cached = await createTestZip({ [BINARY]: { content: engineLikeContent(), mode: 0o755 } });
    await fs.outputFile(cachedArchivePath, damage(cached, 200, 260));

    const error = await context.pipeline.install(spec).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CorruptCacheError);
    expect(error).toMatchObject({ archivePath: cachedArchivePath });
    expect(await fs.pathExists(cachedArchivePath)).toBe(false);
    expect(await fs.pathExists(installedRootDir)).toBe(false);
    expect(await fs.pathExists(context.layout.stagingDir(spec))).toBe(false);

    await expect(context.pipeline.install(spec)).resolves.toMatchObject({ source: 'download' });
    expect(requests).toEqual([DOWNLOAD_URL]);
  });

  it('clears the leftovers of an interrupted install before extracting', async () => {
    const { cachedArchivePath, installedRootDir } = context.layout.paths(spec);
    const stagingDir = context.layout.stagingDir(spec);
    await fs.outputFile(path.join(stagingDir, 'stray.txt'), 'half extracted');
    await fs.outputFile(cachedArchivePath, archive);

    const result = await context.pipeline.install(spec);

    expect(result).toMatchObject({ status: 'installed', source: 'cache' });
    expect(await fs.pathExists(stagingDir)).toBe(false);
    expect(await fs.pathExists(path.join(installedRootDir, 'stray.txt'))).toBe(false);
    expect(await context.store.getState(spec)).toBe('Installed');
    expect(requests).toEqual([]);
  });

  it('surfaces download failures as TransportError without caching', async () => {
    setup([release()], {});

    await expect(context.pipeline.install(spec)).rejects.toThrow(TransportError);
    expect(await context.store.hasCachedArchive(spec)).toBe(false);
  });
});
