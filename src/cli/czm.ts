#!/usr/bin/env node
/**
 * czm - Terminal front end for chezmoi
 *
 * Commands:
 *   czm                      Interactive main menu
 *   czm status [targets..]   Files with pending changes
 *   czm managed              List managed files (alias: ls)
 *   czm diff [target]        Review pending changes
 *   czm apply [targets..]    Apply pending changes
 *   czm add <paths..>        Start managing files
 *   czm remove <paths..>     Stop managing files (alias: rm)
 *   czm data                 Template data
 *   czm doctor               Installation checks
 *   czm verify               Exit status reflects pending changes
 *   czm update               Pull and apply
 *   czm init [repo]          Set up the source directory
 *   czm source-path [target] / czm target-path <source>
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { addCommand } from './czm/add.js';
import { applyCommand } from './czm/apply.js';
import { createAppContext, type GlobalArgs } from './czm/context.js';
import { dataCommand } from './czm/data.js';
import { diffCommand } from './czm/diff.js';
import { doctorCommand } from './czm/doctor.js';
import { initCommand } from './czm/init.js';
import { showMainMenu } from './czm/interactive-menu.js';
import { managedCommand } from './czm/managed.js';
import { removeCommand } from './czm/remove.js';
import { sourcePathCommand } from './czm/source-path.js';
import { statusCommand } from './czm/status.js';
import { targetPathCommand } from './czm/target-path.js';
import { updateCommand } from './czm/update.js';
import { verifyCommand } from './czm/verify.js';

yargs(hideBin(process.argv))
  .scriptName('czm')
  .usage('$0 [command] [options]')
  .option('verbose', {
    alias: 'v',
    type: 'boolean',
    description: 'Show debug output, including every chezmoi invocation',
    global: true,
  })
  .option('quiet', {
    alias: 'q',
    type: 'boolean',
    description: 'Only show errors',
    global: true,
  })
  .option('color', {
    type: 'boolean',
    default: true,
    description: 'Colored output (--no-color to disable)',
    global: true,
  })
  .option('chezmoi', {
    type: 'string',
    description: 'Path to the chezmoi executable',
    global: true,
  })
  .command(
    '$0',
    'Interactive main menu (when no command specified)',
    () => {},
    async (argv: GlobalArgs) => {
      await showMainMenu(createAppContext(argv, { commandName: 'menu' }));
    }
  )
  .command(statusCommand)
  .command(managedCommand)
  .command(diffCommand)
  .command(applyCommand)
  .command(addCommand)
  .command(removeCommand)
  .command(dataCommand)
  .command(doctorCommand)
  .command(verifyCommand)
  .command(updateCommand)
  .command(initCommand)
  .command(sourcePathCommand)
  .command(targetPathCommand)
  .alias('h', 'help')
  .help()
  .version()
  .wrap(Math.min(100, process.stdout.columns ?? 100))
  .example('czm', 'Launch interactive main menu')
  .example('czm diff --stats', 'Summary of pending changes')
  .example('czm add ~/.gitconfig --template', 'Manage a file as a template')
  .example('czm ls --json', 'Managed files as JSON')
  .example('czm -v apply --dry-run', 'Preview apply with debug logging')
  .strict()
  .fail((msg, err) => {
    if (err) {
      console.error(err.message);
    } else {
      console.error(msg);
    }
    process.exit(1);
  })
  .parseAsync()
  .catch((err) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
