import type { EnginePlatform } from '../types/engine';
import { Platform, type HostInfo } from '../utils/platform';

/**
 * Artifact name suffixes used by the engine's release packaging.
 */
export const PLATFORM_SUFFIXES: Readonly<Record<EnginePlatform, string>> = {
  Windows32: 'win32.exe',
  Windows64: 'win64.exe',
  MacOS: 'osx.universal',
  Linux32: 'x11.32',
  Linux64: 'x11.64',
  Unsupported: 'unsupported',
};

export class PlatformResolver {
  /**
   * Map the host OS/architecture to a release platform. Never throws: unknown hosts are `Unsupported`.
   */
  static resolve(host: HostInfo = Platform.host()): EnginePlatform {
    if (Platform.isWindows(host)) {
      if (host.arch === 'ia32') return 'Windows32';
      if (host.arch === 'x64') return 'Windows64';
      return 'Unsupported';
    }

    // Universal builds cover every Mac architecture
    if (Platform.isMac(host)) {
      return 'MacOS';
    }

    if (Platform.isLinux(host)) {
      if (host.arch === 'ia32') return 'Linux32';
      if (host.arch === 'x64') return 'Linux64';
      return 'Unsupported';
    }

    return 'Unsupported';
  }

  static suffix(platform: EnginePlatform): string {
    return PLATFORM_SUFFIXES[platform];
  }

  static isSupported(platform: EnginePlatform): boolean {
    return platform !== 'Unsupported';
  }
}
