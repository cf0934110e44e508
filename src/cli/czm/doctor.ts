/**
 * czm doctor - Check the chezmoi installation
 *
 * Exits 1 when any check reports an error.
 */

import type { CommandModule } from 'yargs';
import { formatDoctor, parseDoctor, summarizeDoctor } from '../../lib/format/index.js';
import { printLines, printStatus, withSpinner } from '../../lib/ui/index.js';
import { createAppContext, type GlobalArgs } from './context.js';

export const doctorCommand: CommandModule<object, GlobalArgs> = {
  command: 'doctor',
  describe: 'Check for potential problems',
  builder: (yargs) => yargs.example('$0 doctor', 'Run chezmoi doctor with coloured results'),
  handler: async (argv) => {
    const ctx = createAppContext(argv, { commandName: 'doctor' });

    const text = await withSpinner('Running chezmoi doctor...', () => ctx.adapter.runDiagnostics());
    printLines(formatDoctor(text));

    const counts = summarizeDoctor(parseDoctor(text));
    if (counts.error > 0) {
      printStatus('error', `${counts.error} check(s) failed`);
      process.exit(1);
    }
    if (counts.warning > 0) {
      printStatus('warning', `${counts.warning} warning(s)`);
    }
  },
};
