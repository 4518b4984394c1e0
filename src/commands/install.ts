import { Command } from 'commander';
import chalk from 'chalk';
import { createContext } from '../core/context';
import { VersionSpec } from '../core/version-spec';
import type { DownloadProgress } from '../types/release';
import { formatBytes } from '../utils/file-system';
import { Logger } from '../utils/logger';
import { exitWithError } from './report';

interface InstallCommandOptions {
  force?: boolean;
}

export function installCommand(program: Command): void {
  program
    .command('install')
    .description('Download and install an engine version')
    .argument('<version>', 'Version to install, e.g. 4.2.1')
    .option('-f, --force', 'Remove an existing install of this version first')
    .action(async (version: string, options: InstallCommandOptions) => {
      try {
        const spec = VersionSpec.from(version);
        const context = createContext();

        Logger.title(`Install ${spec.requested}`);

        let downloading = false;
        const result = await context.pipeline.install(spec, {
          force: options.force,
          onProgress: (progress) => {
            downloading = true;
            Logger.progress(describeProgress(progress));
          }
        });

        if (downloading) {
          Logger.clearProgress();
        }

        if (result.status === 'already-installed') {
          Logger.info(`Version ${chalk.bold(spec.requested)} is already installed. Pass --force to re-install.`);
          return;
        }

        Logger.success(`Extracted to: ${result.installedRootDir}`);

      } catch (error) {
        Logger.clearProgress();
        exitWithError(error);
      }
    });
}

function describeProgress({ bytesDownloaded, totalBytes }: DownloadProgress): string {
  if (totalBytes === null || totalBytes === 0) {
    return `Downloading... ${formatBytes(bytesDownloaded)}`;
  }
  const percent = Math.floor((bytesDownloaded / totalBytes) * 100);
  return `Downloading... ${percent}% (${formatBytes(bytesDownloaded)} / ${formatBytes(totalBytes)})`;
}
