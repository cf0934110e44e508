/**
 * czm status - List files that differ from the target state
 */

import type { CommandModule } from 'yargs';
import { formatStatus } from '../../lib/format/index.js';
import { printLines, withSpinner } from '../../lib/ui/index.js';
import { createAppContext, type GlobalArgs } from './context.js';
import { failWithError, resolveTarget } from './shared.js';

interface StatusArgs extends GlobalArgs {
  targets?: string[];
}

export const statusCommand: CommandModule<object, StatusArgs> = {
  command: ['status [targets..]', 'st [targets..]'],
  describe: 'Show files with pending changes',
  builder: (yargs) => {
    return yargs
      .positional('targets', {
        type: 'string',
        array: true,
        description: 'Only report these files',
      })
      .example('$0 status', 'Show every pending change')
      .example('$0 st ~/.zshrc', 'Status of one file');
  },
  handler: async (argv) => {
    const ctx = createAppContext(argv, { commandName: 'status' });
    const targets = (argv.targets ?? []).map(resolveTarget);

    try {
      const text = await withSpinner('Checking status...', () => ctx.adapter.getStatus(targets));
      printLines(formatStatus(text));
    } catch (error) {
      failWithError('status', error);
    }
  },
};
