import { Command } from 'commander';
import chalk from 'chalk';
import { createContext } from '../core/context';
import { VersionSpec } from '../core/version-spec';
import { Logger } from '../utils/logger';
import { exitWithError } from './report';

interface ListCommandOptions {
  available?: boolean;
}

export function listCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List installed engine versions')
    .option('-a, --available', 'List every version published in the release repository')
    .action(async (options: ListCommandOptions) => {
      try {
        const context = createContext();
        const installed = await context.store.listInstalled();

        if (!options.available) {
          Logger.title('Installed Versions');

          if (installed.length === 0) {
            Logger.info("No versions installed. Use 'engman install <version>' to install one.");
            return;
          }

          installed.forEach(spec => {
            console.log(`  • ${spec.requested} ${chalk.gray(context.layout.paths(spec).installedRootDir)}`);
          });
          return;
        }

        Logger.title('Available Versions');

        const installedTags = new Set(installed.map(spec => spec.canonical));
        const releases = await context.index.listReleases();
        const available = releases
          .map(release => VersionSpec.fromCanonical(release.tagName))
          .filter((spec): spec is VersionSpec => spec !== null)
          .sort((a, b) => VersionSpec.compare(b, a));

        if (available.length === 0) {
          Logger.warning(`No stable releases found in ${context.config.releaseRepo}`);
          return;
        }

        available.forEach(spec => {
          const marker = installedTags.has(spec.canonical) ? chalk.green(' (installed)') : '';
          console.log(`  • ${spec.requested}${marker}`);
        });

      } catch (error) {
        exitWithError(error);
      }
    });
}
