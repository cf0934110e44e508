/**
 * czm data - Show template data
 */

import type { CommandModule } from 'yargs';
import { formatDataTree } from '../../lib/format/index.js';
import { createSuccessResult, type DataResultData } from '../../lib/json-output.js';
import { emitJson, printLines, setJsonMode } from '../../lib/ui/index.js';
import { createAppContext, type GlobalArgs } from './context.js';
import { failWithError } from './shared.js';

interface DataArgs extends GlobalArgs {
  json?: boolean;
}

export const dataCommand: CommandModule<object, DataArgs> = {
  command: 'data',
  describe: 'Show the variables available to templates',
  builder: (yargs) => {
    return yargs
      .option('json', {
        alias: 'j',
        type: 'boolean',
        default: false,
        description: 'Output as JSON',
      })
      .example('$0 data', 'Template data as a tree')
      .example('$0 data --json', 'Raw template data');
  },
  handler: async (argv) => {
    const json = !!argv.json;
    setJsonMode(json);
    const ctx = createAppContext(argv, { commandName: 'data' });

    try {
      const data = await ctx.adapter.getTemplateData();
      if (json) {
        const payload: DataResultData = { data };
        emitJson(createSuccessResult('data', payload, ctx.configWarnings));
        return;
      }
      printLines(formatDataTree(data));
    } catch (error) {
      failWithError('data', error, json);
    }
  },
};
