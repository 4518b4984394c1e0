import { Command } from 'commander';
import { createContext } from '../core/context';
import { VersionSpec } from '../core/version-spec';
import { Logger } from '../utils/logger';
import { exitWithError } from './report';

export function uninstallCommand(program: Command): void {
  program
    .command('uninstall')
    .alias('rm')
    .description('Remove an installed engine version (its download stays cached)')
    .argument('<version>', 'Version to remove')
    .action(async (version: string) => {
      try {
        const spec = VersionSpec.from(version);
        const context = createContext();

        if (await context.pipeline.uninstall(spec)) {
          Logger.success(`Uninstalled version ${spec.requested}`);
        } else {
          Logger.warning(`Version ${spec.requested} is not installed`);
        }

      } catch (error) {
        exitWithError(error);
      }
    });
}
