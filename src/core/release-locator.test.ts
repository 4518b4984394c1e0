import { describe, it, expect } from 'vitest';
import { ReleaseLocator } from './release-locator';
import { StoreLayout } from './store-layout';
import { FakeReleaseIndex } from './test-utils';
import { VersionSpec } from './version-spec';

const layout = new StoreLayout({ dataDir: '/data', cacheDir: '/cache', platform: 'Linux64', binaryPrefix: 'Godot' });

describe('ReleaseLocator', () => {
  it('finds the platform asset and the checksums file', async () => {
    const index = new FakeReleaseIndex([
      {
        tagName: '3.5.1-stable',
        assets: [
          { name: 'Godot_v3.5.1-stable_win64.exe.zip', browserDownloadUrl: 'https://dl.example.com/win.zip' },
          { name: 'Godot_v3.5.1-stable_x11.64.zip', browserDownloadUrl: 'https://dl.example.com/linux.zip' },
          { name: 'SHA512-SUMS.txt', browserDownloadUrl: 'https://dl.example.com/SHA512-SUMS.txt' },
        ],
      },
    ]);
    const locator = new ReleaseLocator(index, layout);

    const result = await locator.locate(VersionSpec.from('3.5.1'));

    expect(index.lookups).toEqual(['3.5.1-stable']);
    expect(result).toEqual({
      status: 'found',
      artifact: {
        tagName: '3.5.1-stable',
        assetName: 'Godot_v3.5.1-stable_x11.64.zip',
        downloadUrl: 'https://dl.example.com/linux.zip',
        checksumsUrl: 'https://dl.example.com/SHA512-SUMS.txt',
      },
    });
  });

  it('distinguishes a missing release', async () => {
    const locator = new ReleaseLocator(new FakeReleaseIndex([]), layout);

    await expect(locator.locate(VersionSpec.from('9.9.9'))).resolves.toEqual({
      status: 'release-not-found',
      tagName: '9.9.9-stable',
    });
  });

  it('distinguishes a release without an asset for this platform', async () => {
    const index = new FakeReleaseIndex([
      {
        tagName: '3.5.1-stable',
        assets: [{ name: 'Godot_v3.5.1-stable_win64.exe.zip', browserDownloadUrl: 'https://dl.example.com/win.zip' }],
      },
    ]);
    const locator = new ReleaseLocator(index, layout);

    await expect(locator.locate(VersionSpec.from('3.5.1'))).resolves.toEqual({
      status: 'platform-unsupported',
      tagName: '3.5.1-stable',
      assetName: 'Godot_v3.5.1-stable_x11.64.zip',
    });
  });
});
