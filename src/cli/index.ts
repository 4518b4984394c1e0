#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { listCommand } from '../commands/list';
import { installCommand } from '../commands/install';
import { uninstallCommand } from '../commands/uninstall';
import { launchCommand } from '../commands/launch';
import { editCommand } from '../commands/edit';
import { showCommand } from '../commands/show';
import { cacheCommand } from '../commands/cache';
import { version, description } from '../../package.json';

const program = new Command();

program
  .name('engman')
  .description(description)
  .version(version)
  .configureOutput({
    outputError: (str, write) => write(chalk.red(str))
  });

// Register commands
listCommand(program);
installCommand(program);
uninstallCommand(program);
launchCommand(program);
editCommand(program);
showCommand(program);
cacheCommand(program);

program.configureHelp({
  sortSubcommands: true,
  subcommandTerm: (cmd) => cmd.name()
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
