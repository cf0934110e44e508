/**
 * czm managed - List managed files
 */

import type { CommandModule } from 'yargs';
import { formatManagedFiles } from '../../lib/format/index.js';
import { createSuccessResult, type ManagedResultData } from '../../lib/json-output.js';
import { emitJson, printLines, setJsonMode } from '../../lib/ui/index.js';
import { createAppContext, type GlobalArgs } from './context.js';
import { failWithError } from './shared.js';

interface ManagedArgs extends GlobalArgs {
  json?: boolean;
}

export const managedCommand: CommandModule<object, ManagedArgs> = {
  command: ['managed', 'ls'],
  describe: 'List managed files',
  builder: (yargs) => {
    return yargs
      .option('json', {
        alias: 'j',
        type: 'boolean',
        default: false,
        description: 'Output as JSON',
      })
      .example('$0 managed', 'Numbered table of managed files')
      .example('$0 ls --json', 'JSON output for scripting');
  },
  handler: async (argv) => {
    const json = !!argv.json;
    setJsonMode(json);
    const ctx = createAppContext(argv, { commandName: 'managed' });

    try {
      const files = await ctx.adapter.listManaged();
      if (json) {
        const data: ManagedResultData = { files, count: files.length };
        emitJson(createSuccessResult('managed', data, ctx.configWarnings));
        return;
      }
      printLines(formatManagedFiles(files));
    } catch (error) {
      failWithError('managed', error, json);
    }
  },
};
