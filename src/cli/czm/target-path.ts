/**
 * czm target-path - Print the destination path of a source-state file
 */

import type { CommandModule } from 'yargs';
import { createAppContext, type GlobalArgs } from './context.js';
import { failWithError, resolveTarget } from './shared.js';

interface TargetPathArgs extends GlobalArgs {
  source: string;
}

export const targetPathCommand: CommandModule<object, TargetPathArgs> = {
  command: 'target-path <source>',
  describe: 'Print the destination path of a file in the source directory',
  builder: (yargs) => {
    return yargs
      .positional('source', {
        type: 'string',
        demandOption: true,
        description: 'File in the source directory',
      })
      .example('$0 target-path ~/.local/share/chezmoi/dot_bashrc', 'Prints ~/.bashrc');
  },
  handler: async (argv) => {
    const ctx = createAppContext(argv, { commandName: 'target-path' });

    try {
      console.log(await ctx.adapter.getTargetPath(resolveTarget(argv.source)));
    } catch (error) {
      failWithError('target-path', error);
    }
  },
};
