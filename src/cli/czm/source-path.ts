/**
 * czm source-path - Print where chezmoi keeps a file (or the source directory)
 */

import type { CommandModule } from 'yargs';
import { createAppContext, type GlobalArgs } from './context.js';
import { failWithError, resolveTarget } from './shared.js';

interface SourcePathArgs extends GlobalArgs {
  target?: string;
}

export const sourcePathCommand: CommandModule<object, SourcePathArgs> = {
  command: 'source-path [target]',
  describe: 'Print the source path of a target, or the source directory',
  builder: (yargs) => {
    return yargs
      .positional('target', {
        type: 'string',
        description: 'Managed file',
      })
      .example('$0 source-path', 'Print the source directory')
      .example('$0 source-path ~/.bashrc', 'Print where .bashrc is stored');
  },
  handler: async (argv) => {
    const ctx = createAppContext(argv, { commandName: 'source-path' });

    try {
      const target = argv.target ? resolveTarget(argv.target) : undefined;
      // plain stdout so the result can be used in $(...)
      console.log(await ctx.adapter.getSourcePath(target));
    } catch (error) {
      failWithError('source-path', error);
    }
  },
};
