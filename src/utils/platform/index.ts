export interface HostInfo {
  os: NodeJS.Platform;
  arch: NodeJS.Architecture;
}

export class Platform {
  /**
   * Describe the host this process runs on
   */
  static host(): HostInfo {
    return { os: process.platform, arch: process.arch };
  }

  /**
   * Check if running on Windows
   */
  static isWindows(host: HostInfo = Platform.host()): boolean {
    return host.os === 'win32';
  }

  /**
   * Check if running on Linux
   */
  static isLinux(host: HostInfo = Platform.host()): boolean {
    return host.os === 'linux';
  }

  /**
   * Check if running on macOS
   */
  static isMac(host: HostInfo = Platform.host()): boolean {
    return host.os === 'darwin';
  }
}
