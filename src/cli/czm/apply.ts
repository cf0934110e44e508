/**
 * czm apply - Bring the destination in line with the target state
 */

import type { CommandModule } from 'yargs';
import { buildApplyArgs, type ApplyOptions } from '../../lib/chezmoi/index.js';
import { logger, recordTargets } from '../../lib/logger.js';
import { promptConfirm } from '../../lib/prompts.js';
import { print, printDim, printStatus, withSpinner } from '../../lib/ui/index.js';
import { createAppContext, type GlobalArgs } from './context.js';
import { failWithError, resolveTarget } from './shared.js';

interface ApplyArgs extends GlobalArgs {
  targets?: string[];
  dryRun?: boolean;
  yes?: boolean;
}

export const applyCommand: CommandModule<object, ApplyArgs> = {
  command: 'apply [targets..]',
  describe: 'Apply pending changes',
  builder: (yargs) => {
    return yargs
      .positional('targets', {
        type: 'string',
        array: true,
        description: 'Only apply these files',
      })
      .option('dry-run', {
        alias: 'n',
        type: 'boolean',
        default: false,
        description: 'Show what would change without writing anything',
      })
      .option('yes', {
        alias: 'y',
        type: 'boolean',
        default: false,
        description: 'Skip the confirmation prompt',
      })
      .example('$0 apply', 'Apply everything after confirming')
      .example('$0 apply --dry-run', 'Preview without changing files')
      .example('$0 apply -y ~/.bashrc', 'Apply one file without confirmation');
  },
  handler: async (argv) => {
    const ctx = createAppContext(argv, { commandName: 'apply' });
    const targets = (argv.targets ?? []).map(resolveTarget);
    const options: ApplyOptions = { targets, dryRun: !!argv.dryRun, verbose: true };
    if (targets.length > 0) {
      recordTargets(targets);
    }

    try {
      if (!argv.yes && !options.dryRun) {
        printDim(ctx.adapter.describe(buildApplyArgs(options)));
        const scope = targets.length > 0 ? `${targets.length} file(s)` : 'all pending changes';
        if (!(await promptConfirm(`Apply ${scope}?`))) {
          printDim('Nothing applied.');
          return;
        }
      }

      const output = await withSpinner(options.dryRun ? 'Checking...' : 'Applying...', () =>
        ctx.adapter.apply(options)
      );
      if (output.trim()) {
        print(output.trimEnd());
      }

      if (options.dryRun) {
        printStatus('info', 'Dry run: no files were changed');
      } else {
        logger.info(`Applied ${targets.length > 0 ? targets.join(' ') : 'all targets'}`);
        printStatus('success', 'Changes applied');
      }
    } catch (error) {
      failWithError('apply', error);
    }
  },
};
