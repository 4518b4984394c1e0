import execa from 'execa';
import type { LaunchOptions, LaunchResult } from '../types/install';
import { FileSystem } from '../utils/file-system';
import { Logger } from '../utils/logger';
import { LaunchError, NotInstalledError } from './errors';
import type { StoreLayout } from './store-layout';
import type { VersionSpec } from './version-spec';

export interface SpawnOptions {
  cwd: string;
  stdio: 'ignore' | 'inherit';
}

export interface SpawnedProcess {
  pid?: number;
  unref(): void;
}

export type ProcessSpawner = (file: string, args: string[], options: SpawnOptions) => SpawnedProcess;

/**
 * Start a detached process. Its later exit is only reported in debug output,
 * since the launcher's job ends once the process exists.
 */
export const spawnDetached: ProcessSpawner = (file, args, options) => {
  const subprocess = execa(file, args, {
    cwd: options.cwd,
    stdio: options.stdio,
    detached: true,
    cleanup: false,
    buffer: false,
  });

  subprocess.catch((error: unknown) => {
    Logger.debug(`${file} exited: ${error instanceof Error ? error.message : String(error)}`);
  });

  return subprocess;
};

export class Launcher {
  constructor(
    private readonly layout: StoreLayout,
    private readonly spawn: ProcessSpawner = spawnDetached
  ) {}

  /**
   * Launch an installed engine and return as soon as the process has been created.
   *
   * In project-manager mode the engine runs in the background with its output discarded;
   * otherwise it opens `projectPath` in the editor and shares this terminal.
   *
   * @throws NotInstalledError when the engine binary is absent; nothing is spawned
   */
  async launch(spec: VersionSpec, options: LaunchOptions): Promise<LaunchResult> {
    const { installedBinaryPath, installedRootDir } = this.layout.paths(spec);

    if (!(await FileSystem.isFile(installedBinaryPath))) {
      throw new NotInstalledError(spec.requested);
    }

    const projectPath = options.projectPath ?? process.cwd();
    const args = options.projectManager
      ? ['--project-manager']
      : ['--editor', '--path', projectPath];
    args.push(...(options.args ?? []));

    Logger.info(`Running: ${installedBinaryPath}`);

    const child = this.spawn(installedBinaryPath, args, {
      cwd: options.projectManager ? installedRootDir : projectPath,
      stdio: options.projectManager ? 'ignore' : 'inherit',
    });

    if (child.pid === undefined) {
      throw new LaunchError(installedBinaryPath, 'the process could not be started');
    }

    child.unref();

    return { pid: child.pid, binaryPath: installedBinaryPath, args };
  }
}
