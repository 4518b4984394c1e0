import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { createContext } from '../core/context';
import { VersionSpec } from '../core/version-spec';
import { formatBytes } from '../utils/file-system';
import { Logger } from '../utils/logger';
import { exitWithError } from './report';

interface CacheRemoveOptions {
  all?: boolean;
  yes?: boolean;
}

export function cacheCommand(program: Command): void {
  const cache = program
    .command('cache')
    .description('Inspect or clear downloaded engine archives');

  cache
    .command('show', { isDefault: true })
    .description('List cached archives and their sizes')
    .action(async () => {
      try {
        const context = createContext();
        const stats = await context.store.getCacheStats();

        Logger.title('Download Cache');
        console.log(`  Location: ${context.layout.cacheRoot}`);

        if (stats.archives.length === 0) {
          Logger.info('Cache is empty');
          return;
        }

        Logger.subTitle('Archives');
        stats.archives.forEach(archive => {
          console.log(`  • ${archive.canonical} ${chalk.gray(formatBytes(archive.size))}`);
        });

        console.log();
        console.log(`  Total: ${chalk.bold(formatBytes(stats.totalSize))}`);

      } catch (error) {
        exitWithError(error);
      }
    });

  cache
    .command('rm')
    .description('Remove cached archives')
    .argument('[versions...]', 'Versions whose archives to remove')
    .option('-a, --all', 'Remove every cached archive')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (versions: string[], options: CacheRemoveOptions) => {
      try {
        if (!options.all && versions.length === 0) {
          Logger.error('Name the versions to remove, or pass --all');
          process.exit(1);
        }

        const specs = versions.map(version => VersionSpec.from(version));
        const context = createContext();

        if (!options.yes) {
          const target = options.all ? 'all cached archives' : specs.map(spec => spec.requested).join(', ');
          const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
            {
              type: 'confirm',
              name: 'confirmed',
              message: `Remove ${target}?`,
              default: false
            }
          ]);

          if (!confirmed) {
            Logger.info('Nothing removed');
            return;
          }
        }

        if (options.all) {
          const removed = await context.store.clearCache();
          Logger.success(`Removed ${removed} cached archive${removed === 1 ? '' : 's'}`);
          return;
        }

        for (const spec of specs) {
          if (await context.store.removeCached(spec)) {
            Logger.success(`Removed cached archive for ${spec.requested}`);
          } else {
            Logger.warning(`No cached archive for ${spec.requested}`);
          }
        }

      } catch (error) {
        exitWithError(error);
      }
    });
}
