/**
 * czm diff - Show pending changes, optionally as JSON or a patch file
 */

import type { CommandModule } from 'yargs';
import { formatSummary, isEmptyDiff, NO_CHANGES_MESSAGE } from '../../lib/diff/index.js';
import {
  ErrorCode,
  createSuccessResult,
  type DiffResultData,
} from '../../lib/json-output.js';
import { emitJson, print, printDim, printStatus, setJsonMode } from '../../lib/ui/index.js';
import { createAppContext, type GlobalArgs } from './context.js';
import { createDiffSession, renderSession } from './screens/diff.js';
import { failWithCode, failWithError, resolveTarget } from './shared.js';

interface DiffArgs extends GlobalArgs {
  target?: string;
  stats?: boolean;
  export?: boolean;
  json?: boolean;
}

export const diffCommand: CommandModule<object, DiffArgs> = {
  command: 'diff [target]',
  describe: 'Show pending changes',
  builder: (yargs) => {
    return yargs
      .positional('target', {
        type: 'string',
        description: 'Limit the diff to one file',
      })
      .option('stats', {
        alias: 's',
        type: 'boolean',
        default: false,
        description: 'Print only the summary line',
      })
      .option('export', {
        alias: 'e',
        type: 'boolean',
        default: false,
        description: 'Write the diff to a .patch file in exportDir',
      })
      .option('json', {
        alias: 'j',
        type: 'boolean',
        default: false,
        description: 'Output as JSON',
      })
      .example('$0 diff', 'Show all pending changes')
      .example('$0 diff ~/.bashrc', 'Show changes to one file')
      .example('$0 diff --stats --json', 'Summary for scripting')
      .example('$0 diff --export', 'Save the diff as a patch');
  },
  handler: async (argv) => {
    const json = !!argv.json;
    setJsonMode(json);

    const ctx = createAppContext(argv, { commandName: 'diff' });
    const session = createDiffSession(ctx);
    const target = argv.target ? resolveTarget(argv.target) : null;

    await session.load(target);
    const error = session.error$.value;
    if (session.status$.value === 'error' && error) {
      failWithError('diff', error, json);
      return;
    }

    let exportedTo: string | undefined;
    if (argv.export) {
      const result = session.exportPatch();
      if (!result.ok) {
        failWithCode('diff', ErrorCode.EXPORT_FAILED, `Export failed: ${result.error.message}`, {
          json,
        });
        return;
      }
      exportedTo = result.path;
    }

    const text = session.text$.value;
    const summary = session.summary$.value;

    if (json) {
      const data: DiffResultData = {
        target,
        files: summary.files,
        additions: summary.additions,
        deletions: summary.deletions,
        net: summary.net,
        diff: argv.stats ? undefined : text,
        exportedTo,
      };
      emitJson(createSuccessResult('diff', data, ctx.configWarnings));
      return;
    }

    if (argv.stats) {
      print(isEmptyDiff(text) ? NO_CHANGES_MESSAGE.split('\n')[0] : formatSummary(summary));
    } else {
      renderSession(session);
    }

    if (exportedTo) {
      print('');
      printStatus('success', `Diff exported to ${exportedTo}`);
    } else if (!argv.stats && !isEmptyDiff(text)) {
      printDim('Run `czm apply` to apply these changes.');
    }
  },
};
