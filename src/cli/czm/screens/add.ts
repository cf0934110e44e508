/**
 * Add flow: pick a path, pick options, preview, add
 */

import {
  ADD_FLAGS,
  ADD_PRESETS,
  buildAddArgs,
  enabledFlags,
  optionsFromFlags,
  type AddFlag,
  type AddOptions,
  type AddPreset,
} from '../../../lib/chezmoi/index.js';
import { checkAddablePath } from '../../../lib/paths.js';
import {
  pressEnterToContinue,
  promptCheckbox,
  promptChoice,
  promptConfirm,
  promptInput,
  promptSelect,
  type PromptOption,
} from '../../../lib/prompts.js';
import {
  printDetail,
  printDim,
  printError,
  printNextSteps,
  printStatus,
  withSpinner,
} from '../../../lib/ui/index.js';
import { resolveTarget } from '../shared.js';
import { CANCELLED, COMPLETED_RETURN, runFlow, type FlowResult, type ScreenContext } from './flow.js';

export const ALREADY_MANAGED_MESSAGE = 'This file is already managed by chezmoi';

type PathSource = 'common' | 'input' | 'back';

const pathSourceOptions: PromptOption<PathSource>[] = [
  { label: 'Common dotfiles', description: 'Pick from a list of well-known files', value: 'common' },
  { label: 'Enter a path', value: 'input' },
  { label: '← Back', value: 'back' },
];

type OptionsChoice = AddPreset | 'none' | 'custom' | 'back';

const optionsChoiceOptions: PromptOption<OptionsChoice>[] = [
  { label: 'No options', description: 'Add the file as it is', value: 'none' },
  { label: 'Private config', description: '--private', value: 'private' },
  { label: 'Template', description: '--template', value: 'template' },
  { label: 'Executable', description: '--executable', value: 'executable' },
  { label: 'Readonly', description: '--readonly', value: 'readonly' },
  { label: 'Custom...', description: 'Choose flags one by one', value: 'custom' },
  { label: '← Back', value: 'back' },
];

export async function addFile(ctx: ScreenContext): Promise<FlowResult> {
  return runFlow('Add File', async () => {
    const input = await choosePath(ctx);
    if (input === null) {
      return CANCELLED;
    }

    const check = checkAddablePath(input);
    if (!check.ok) {
      printError({ title: check.message, detail: input });
      return COMPLETED_RETURN;
    }

    const target = resolveTarget(input);
    if (await ctx.adapter.isManaged(target)) {
      printError({
        title: ALREADY_MANAGED_MESSAGE,
        detail: target,
        hint: 'Use `chezmoi edit <file>` to change it.',
      });
      return COMPLETED_RETURN;
    }

    const options = await chooseOptions();
    if (options === null) {
      return CANCELLED;
    }

    printDim(`Command: ${ctx.adapter.describe(buildAddArgs([target], options))}`);
    const confirmed = await promptConfirm('Add this file?', true);
    if (!confirmed) {
      return CANCELLED;
    }

    await withSpinner('Adding...', () => ctx.adapter.add(target, options));
    printAddSuccess([target], options);
    await pressEnterToContinue();
    return COMPLETED_RETURN;
  });
}

async function choosePath(ctx: ScreenContext): Promise<string | null> {
  const source = await promptChoice('Which file would you like to add?', pathSourceOptions);

  switch (source) {
    case 'back':
      return null;

    case 'input': {
      const input = await promptInput('Path to add');
      return input || null;
    }

    case 'common': {
      const options: PromptOption<string>[] = [
        ...ctx.config.commonDotfiles.map((file) => ({ label: file, value: file })),
        { label: '← Back', value: '' },
      ];
      const selected = await promptSelect('Select a file', options);
      return selected || null;
    }
  }
}

async function chooseOptions(): Promise<AddOptions | null> {
  const choice = await promptChoice('How should chezmoi store it?', optionsChoiceOptions);

  switch (choice) {
    case 'back':
      return null;
    case 'none':
      return {};
    case 'custom': {
      const flags = await promptCheckbox<AddFlag>(
        'Select options',
        ADD_FLAGS.map((entry) => ({
          label: entry.label,
          description: entry.description,
          value: entry.flag,
        }))
      );
      return optionsFromFlags(flags);
    }
    default:
      return { ...ADD_PRESETS[choice] };
  }
}

export function printAddSuccess(targets: string[], options: AddOptions): void {
  const flags = enabledFlags(options);
  const suffix = flags.length > 0 ? ` (${flags.join(', ')})` : '';
  const title = targets.length === 1 ? 'File added successfully!' : `Added ${targets.length} files`;
  printStatus('success', title);
  for (const target of targets) {
    printDetail('File', `${target}${suffix}`);
  }
  if (options.template) {
    printStatus('info', "Don't forget to use template variables!");
  }
  printNextSteps([{ command: 'czm diff', description: 'review pending changes' }]);
}
