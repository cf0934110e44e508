import { formatManagedFiles } from '../../../lib/format/index.js';
import { pressEnterToContinue, promptChoice, promptSelect, type PromptOption } from '../../../lib/prompts.js';
import { printDetail, printLines, withSpinner } from '../../../lib/ui/index.js';
import { browseDiff } from './diff.js';
import { CANCELLED, COMPLETED_RETURN, runFlow, type FlowResult, type ScreenContext } from './flow.js';
import { confirmAndRemove } from './remove.js';

type FileAction = 'diff' | 'source-path' | 'remove' | 'back';

const fileActionOptions: PromptOption<FileAction>[] = [
  { label: 'Show diff', description: 'Pending changes for this file only', value: 'diff' },
  { label: 'Show source path', description: 'Where chezmoi keeps this file', value: 'source-path' },
  { label: 'Remove', description: 'Remove from chezmoi and delete from disk', value: 'remove' },
  { label: '← Back', value: 'back' },
];

const BACK = Symbol('back');

export async function showManagedFiles(ctx: ScreenContext): Promise<FlowResult> {
  return runFlow('Browse', async () => {
    const files = await withSpinner('Loading managed files...', () => ctx.adapter.listManaged());
    printLines(formatManagedFiles(files));

    if (files.length === 0) {
      await pressEnterToContinue();
      return COMPLETED_RETURN;
    }

    const options: PromptOption<string | typeof BACK>[] = [
      ...files.map((file) => ({ label: file, value: file })),
      { label: '← Back', value: BACK },
    ];
    const selected = await promptSelect('Select a file', options);
    if (selected === BACK) {
      return CANCELLED;
    }

    return handleFileAction(ctx, selected);
  });
}

async function handleFileAction(ctx: ScreenContext, file: string): Promise<FlowResult> {
  const action = await promptChoice(`What would you like to do with ${file}?`, fileActionOptions);

  switch (action) {
    case 'back':
      return CANCELLED;

    case 'diff':
      return browseDiff(ctx, ctx.adapter.toAbsoluteTarget(file));

    case 'source-path': {
      const target = ctx.adapter.toAbsoluteTarget(file);
      const sourcePath = await ctx.adapter.getSourcePath(target);
      printDetail('Target', target);
      printDetail('Source', sourcePath);
      await pressEnterToContinue();
      return COMPLETED_RETURN;
    }

    case 'remove':
      return confirmAndRemove(ctx, ctx.adapter.toAbsoluteTarget(file));
  }
}
