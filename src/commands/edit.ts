import { Command } from 'commander';
import chalk from 'chalk';
import { createContext } from '../core/context';
import { EngineResolver } from '../core/engine-resolver';
import { VersionSpec } from '../core/version-spec';
import { Logger } from '../utils/logger';
import { exitWithError } from './report';

interface EditCommandOptions {
  project?: string;
  engine?: string;
}

export function editCommand(program: Command): void {
  program
    .command('edit')
    .alias('open')
    .description('Open the project in the current directory with a matching installed engine')
    .option('-p, --project <path>', 'Path to the project directory')
    .option('-e, --engine <version>', 'Use this installed version instead of the one the project asks for')
    .action(async (options: EditCommandOptions) => {
      try {
        const context = createContext();
        const resolution = await EngineResolver.resolveEngine(context.store, options.project);

        resolution.warnings.forEach(warning => Logger.warning(warning));

        if (!resolution.project) {
          Logger.error(resolution.error || 'No project found');
          process.exit(1);
        }

        const requested = options.engine ?? resolution.engine;
        if (!requested) {
          Logger.error(resolution.error || 'No matching engine installed');
          process.exit(1);
        }

        const spec = VersionSpec.from(requested);
        Logger.info(`Opening ${chalk.bold(resolution.project.name)} with ${spec.requested}`);

        await context.launcher.launch(spec, {
          projectManager: false,
          projectPath: resolution.project.path
        });

      } catch (error) {
        exitWithError(error);
      }
    });
}
