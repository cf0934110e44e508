/**
 * czm remove - Remove files from the source state
 */

import type { CommandModule } from 'yargs';
import { buildRemoveArgs } from '../../lib/chezmoi/index.js';
import { recordTargets } from '../../lib/logger.js';
import { promptConfirm } from '../../lib/prompts.js';
import { printDim, printStatus, withSpinner } from '../../lib/ui/index.js';
import { createAppContext, type GlobalArgs } from './context.js';
import { failWithError, removeConfirmation, resolveTarget } from './shared.js';

interface RemoveArgs extends GlobalArgs {
  paths: string[];
  yes?: boolean;
}

export const removeCommand: CommandModule<object, RemoveArgs> = {
  command: ['remove <paths..>', 'rm <paths..>'],
  describe: 'Remove files from chezmoi and delete them from disk',
  builder: (yargs) => {
    return yargs
      .positional('paths', {
        type: 'string',
        array: true,
        demandOption: true,
        description: 'Managed files to remove',
      })
      .option('yes', {
        alias: 'y',
        type: 'boolean',
        default: false,
        description: 'Skip the confirmation prompt',
      })
      .example('$0 remove ~/.vimrc', 'Remove after confirming')
      .example('$0 rm -y ~/.vimrc ~/.tmux.conf', 'Remove without confirmation');
  },
  handler: async (argv) => {
    const ctx = createAppContext(argv, { commandName: 'remove' });
    const targets = argv.paths.map(resolveTarget);
    recordTargets(targets);

    try {
      if (!argv.yes) {
        printDim(ctx.adapter.describe(buildRemoveArgs(targets)));
        if (!(await promptConfirm(removeConfirmation(targets)))) {
          printDim('Nothing removed.');
          return;
        }
      }

      await withSpinner('Removing...', () => ctx.adapter.remove(targets));
      printStatus(
        'success',
        targets.length === 1 ? 'File removed successfully!' : `Removed ${targets.length} files`
      );
    } catch (error) {
      failWithError('remove', error);
    }
  },
};
