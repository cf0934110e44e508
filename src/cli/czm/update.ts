/**
 * czm update - Pull the source repository and apply
 */

import type { CommandModule } from 'yargs';
import { print, printStatus, withSpinner } from '../../lib/ui/index.js';
import { createAppContext, type GlobalArgs } from './context.js';
import { failWithError } from './shared.js';

interface UpdateArgs extends GlobalArgs {
  apply?: boolean;
}

export const updateCommand: CommandModule<object, UpdateArgs> = {
  command: 'update',
  describe: 'Pull changes from the source repository and apply them',
  builder: (yargs) => {
    return yargs
      .option('apply', {
        type: 'boolean',
        default: true,
        description: 'Apply after pulling (--no-apply to only pull)',
      })
      .example('$0 update', 'Pull and apply')
      .example('$0 update --no-apply', 'Pull without touching the destination');
  },
  handler: async (argv) => {
    const ctx = createAppContext(argv, { commandName: 'update' });
    const apply = argv.apply !== false;

    try {
      const output = await withSpinner('Updating from source repository...', () =>
        ctx.adapter.update(apply)
      );
      if (output.trim()) {
        print(output.trimEnd());
      }
      printStatus('info', apply ? 'Update finished' : 'Source state pulled without applying');
    } catch (error) {
      failWithError('update', error);
    }
  },
};
