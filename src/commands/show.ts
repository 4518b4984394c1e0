import { Command } from 'commander';
import chalk from 'chalk';
import { createContext } from '../core/context';
import { EngineResolver } from '../core/engine-resolver';
import { Logger } from '../utils/logger';
import { exitWithError } from './report';

interface ShowCommandOptions {
  project?: string;
}

export function showCommand(program: Command): void {
  program
    .command('show')
    .description('Show the project in the current directory and the engine it resolves to')
    .option('-p, --project <path>', 'Path to the project directory')
    .action(async (options: ShowCommandOptions) => {
      try {
        Logger.title('Project');

        const context = createContext();
        const result = await EngineResolver.resolveEngine(context.store, options.project);

        if (!result.project) {
          Logger.error(result.error || 'Project detection failed');
          process.exit(1);
        }

        const project = result.project;
        Logger.success(`Found project: ${chalk.bold(project.name)}`);

        Logger.subTitle('Basic Information');
        console.log(`  Path: ${project.path}`);
        console.log(`  Config Version: ${project.config.configVersion ?? 'unknown'}`);
        console.log(`  Required Engine: ${project.engineRequirement ?? 'unknown'}`);
        if (project.config.features.length > 0) {
          console.log(`  Features: ${project.config.features.join(', ')}`);
        }

        Logger.subTitle('Engine');
        if (result.engine) {
          console.log(`  Installed Match: ${chalk.green(result.engine)}`);
        } else {
          Logger.warning(result.error || 'No matching engine installed');
        }

        if (result.warnings.length > 0) {
          Logger.subTitle('Warnings');
          result.warnings.forEach(warning => {
            console.log(`  • ${warning}`);
          });
        }

      } catch (error) {
        exitWithError(error);
      }
    });
}
