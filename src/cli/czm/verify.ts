/**
 * czm verify - Exit 0 when the destination matches the target state
 */

import type { CommandModule } from 'yargs';
import { print, printStatus } from '../../lib/ui/index.js';
import { createAppContext, type GlobalArgs } from './context.js';
import { failWithError } from './shared.js';

export const verifyCommand: CommandModule<object, GlobalArgs> = {
  command: 'verify',
  describe: 'Check that the destination matches the target state',
  builder: (yargs) =>
    yargs.example('$0 verify && echo clean', 'Use the exit code in scripts'),
  handler: async (argv) => {
    const ctx = createAppContext(argv, { commandName: 'verify' });

    try {
      const result = await ctx.adapter.verify();
      if (result.ok) {
        printStatus('success', 'Destination matches the target state');
        return;
      }
      printStatus('warning', 'Destination differs from the target state');
      if (result.output) {
        print(result.output);
      }
      process.exit(1);
    } catch (error) {
      failWithError('verify', error);
    }
  },
};
