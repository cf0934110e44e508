/**
 * czm init - Create the source directory, optionally from a repository
 */

import type { CommandModule } from 'yargs';
import { print, printNextSteps, printStatus, withSpinner } from '../../lib/ui/index.js';
import { createAppContext, type GlobalArgs } from './context.js';
import { failWithError } from './shared.js';

interface InitArgs extends GlobalArgs {
  repo?: string;
}

export const initCommand: CommandModule<object, InitArgs> = {
  command: 'init [repo]',
  describe: 'Set up the source directory',
  builder: (yargs) => {
    return yargs
      .positional('repo', {
        type: 'string',
        description: 'Repository to clone, e.g. a GitHub username or URL',
      })
      .example('$0 init', 'Create an empty source directory')
      .example('$0 init https://example.com/dotfiles.git', 'Clone an existing dotfiles repo');
  },
  handler: async (argv) => {
    const ctx = createAppContext(argv, { commandName: 'init' });

    try {
      const output = await withSpinner('Initializing...', () => ctx.adapter.init(argv.repo));
      if (output.trim()) {
        print(output.trimEnd());
      }
      printStatus('success', 'Source directory ready');
      printNextSteps(
        argv.repo
          ? [{ command: 'czm diff', description: 'review what the repository would change' }]
          : [{ command: 'czm add ~/.bashrc', description: 'start managing a file' }]
      );
    } catch (error) {
      failWithError('init', error);
    }
  },
};
