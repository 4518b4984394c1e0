import { Command } from 'commander';
import { createContext } from '../core/context';
import { VersionSpec } from '../core/version-spec';
import { Logger } from '../utils/logger';
import { exitWithError } from './report';

export function launchCommand(program: Command): void {
  program
    .command('launch')
    .description('Open the project manager of an installed engine version')
    .argument('<version>', 'Installed version to launch')
    .argument('[args...]', 'Extra arguments passed to the engine')
    .action(async (version: string, args: string[]) => {
      try {
        const spec = VersionSpec.from(version);
        const context = createContext();

        const result = await context.launcher.launch(spec, { projectManager: true, args });
        Logger.success(`Started ${spec.requested} (pid ${result.pid})`);

      } catch (error) {
        exitWithError(error);
      }
    });
}
