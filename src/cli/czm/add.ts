/**
 * czm add - Start managing one or more files
 */

import type { CommandModule } from 'yargs';
import type { AddOptions } from '../../lib/chezmoi/index.js';
import { ErrorCode } from '../../lib/json-output.js';
import { recordTargets } from '../../lib/logger.js';
import { checkAddablePath } from '../../lib/paths.js';
import { withSpinner } from '../../lib/ui/index.js';
import { createAppContext, type GlobalArgs } from './context.js';
import { ALREADY_MANAGED_MESSAGE, printAddSuccess } from './screens/add.js';
import { failWithCode, failWithError, resolveTarget } from './shared.js';

interface AddArgs extends GlobalArgs {
  paths: string[];
  template?: boolean;
  encrypt?: boolean;
  private?: boolean;
  executable?: boolean;
  readonly?: boolean;
  exact?: boolean;
  autotemplate?: boolean;
  follow?: boolean;
  create?: boolean;
  recursive?: boolean;
}

export function addOptionsFromArgs(argv: AddArgs): AddOptions {
  const options: AddOptions = {
    template: argv.template,
    encrypt: argv.encrypt,
    private: argv.private,
    executable: argv.executable,
    readonly: argv.readonly,
    exact: argv.exact,
    autotemplate: argv.autotemplate,
    follow: argv.follow,
    create: argv.create,
  };
  if (argv.recursive === false) {
    options.recursive = false;
  }
  return options;
}

export const addCommand: CommandModule<object, AddArgs> = {
  command: 'add <paths..>',
  describe: 'Add files to the source state',
  builder: (yargs) => {
    return yargs
      .positional('paths', {
        type: 'string',
        array: true,
        demandOption: true,
        description: 'Files or directories to add',
      })
      .option('template', {
        alias: 'T',
        type: 'boolean',
        description: 'Store as a template',
      })
      .option('encrypt', {
        type: 'boolean',
        description: 'Encrypt in the source state',
      })
      .option('private', {
        alias: 'p',
        type: 'boolean',
        description: 'Remove group and world permissions',
      })
      .option('executable', {
        alias: 'x',
        type: 'boolean',
        description: 'Set the executable bit',
      })
      .option('readonly', {
        alias: 'r',
        type: 'boolean',
        description: 'Remove write permissions',
      })
      .option('exact', {
        type: 'boolean',
        description: 'Remove unmanaged entries from directories',
      })
      .option('autotemplate', {
        type: 'boolean',
        description: 'Replace known values with template variables',
      })
      .option('follow', {
        type: 'boolean',
        description: 'Add the symlink target instead of the symlink',
      })
      .option('create', {
        type: 'boolean',
        description: 'Add as a file that must exist, whatever its contents',
      })
      .option('recursive', {
        type: 'boolean',
        default: true,
        description: 'Recurse into directories (--no-recursive to disable)',
      })
      .example('$0 add ~/.bashrc', 'Manage your bash config')
      .example('$0 add ~/.gitconfig --template', 'Add as a template')
      .example('$0 add ~/.ssh/config --private', 'Add with private permissions');
  },
  handler: async (argv) => {
    const ctx = createAppContext(argv, { commandName: 'add' });
    const targets: string[] = [];

    for (const input of argv.paths) {
      const check = checkAddablePath(input);
      if (!check.ok) {
        failWithCode('add', ErrorCode.PATH_NOT_FOUND, check.message, { detail: input });
        return;
      }
      targets.push(resolveTarget(input));
    }

    recordTargets(targets);

    try {
      for (const target of targets) {
        if (await ctx.adapter.isManaged(target)) {
          failWithCode('add', ErrorCode.ALREADY_MANAGED, ALREADY_MANAGED_MESSAGE, {
            detail: target,
          });
          return;
        }
      }

      const options = addOptionsFromArgs(argv);
      await withSpinner('Adding...', () => ctx.adapter.add(targets, options));
      printAddSuccess(targets, options);
    } catch (error) {
      failWithError('add', error);
    }
  },
};
