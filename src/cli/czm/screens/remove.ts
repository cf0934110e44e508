import { buildRemoveArgs } from '../../../lib/chezmoi/index.js';
import { dim } from '../../../lib/colors.js';
import {
  pressEnterToContinue,
  promptChoice,
  promptConfirm,
  promptInput,
  promptSelect,
  type PromptOption,
} from '../../../lib/prompts.js';
import { print, printStatus, withSpinner } from '../../../lib/ui/index.js';
import { removeConfirmation, resolveTarget } from '../shared.js';
import { CANCELLED, COMPLETED_RETURN, runFlow, type FlowResult, type ScreenContext } from './flow.js';

type RemoveSource = 'managed' | 'input' | 'back';

const removeSourceOptions: PromptOption<RemoveSource>[] = [
  { label: 'Pick from managed files', value: 'managed' },
  { label: 'Enter a path', value: 'input' },
  { label: '← Back', value: 'back' },
];

export async function removeFile(ctx: ScreenContext): Promise<FlowResult> {
  return runFlow('Remove File', async () => {
    const target = await chooseTarget(ctx);
    if (!target) {
      return CANCELLED;
    }
    return confirmAndRemove(ctx, target);
  });
}

async function chooseTarget(ctx: ScreenContext): Promise<string | null> {
  const source = await promptChoice('Which file should be removed?', removeSourceOptions);

  switch (source) {
    case 'back':
      return null;

    case 'input': {
      const input = await promptInput('Path to remove');
      return input ? resolveTarget(input) : null;
    }

    case 'managed': {
      const files = await withSpinner('Loading managed files...', () => ctx.adapter.listManaged());
      if (files.length === 0) {
        printStatus('info', 'No files managed');
        return null;
      }
      const options: PromptOption<string>[] = [
        ...files.map((file) => ({ label: file, value: ctx.adapter.toAbsoluteTarget(file) })),
        { label: '← Back', value: '' },
      ];
      const selected = await promptSelect('Select a file', options);
      return selected || null;
    }
  }
}

/**
 * Confirm, then remove one target from the source state
 */
export async function confirmAndRemove(ctx: ScreenContext, target: string): Promise<FlowResult> {
  print(dim(`  ${ctx.adapter.describe(buildRemoveArgs([target]))}`));
  const confirmed = await promptConfirm(removeConfirmation([target]));
  if (!confirmed) {
    return CANCELLED;
  }

  await withSpinner('Removing...', () => ctx.adapter.remove(target));
  printStatus('success', 'File removed successfully!');
  await pressEnterToContinue();
  return COMPLETED_RETURN;
}
