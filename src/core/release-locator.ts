import type { LocateResult } from '../types/release';
import type { ReleaseIndex } from './release-index';
import type { StoreLayout } from './store-layout';
import type { VersionSpec } from './version-spec';
import { Logger } from '../utils/logger';

/** Per-release file listing the SHA-512 of every asset */
export const CHECKSUMS_ASSET = 'SHA512-SUMS.txt';

/**
 * Resolves a version to the platform-specific artifact of its release.
 *
 * Keeps "no such release" and "no asset for this platform" apart so the user can be told which one happened.
 */
export class ReleaseLocator {
  constructor(
    private readonly index: ReleaseIndex,
    private readonly layout: StoreLayout
  ) {}

  async locate(spec: VersionSpec): Promise<LocateResult> {
    const tagName = spec.canonical;
    const release = await this.index.getRelease(tagName);

    if (!release) {
      Logger.debug(`No release tagged ${tagName}`);
      return { status: 'release-not-found', tagName };
    }

    const assetName = this.layout.archiveName(spec);
    const asset = release.assets.find(candidate => candidate.name === assetName);

    if (!asset) {
      Logger.debug(`Release ${tagName} has no asset named ${assetName}`);
      return { status: 'platform-unsupported', tagName, assetName };
    }

    const checksums = release.assets.find(candidate => candidate.name === CHECKSUMS_ASSET);

    return {
      status: 'found',
      artifact: {
        tagName: release.tagName,
        assetName,
        downloadUrl: asset.browserDownloadUrl,
        checksumsUrl: checksums?.browserDownloadUrl,
      },
    };
  }
}
