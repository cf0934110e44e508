/**
 * Diff browser: scoped re-query, apply and export over a DiffSession
 */

import {
  DiffSession,
  formatSummary,
  isEmptyDiff,
  renderDiff,
} from '../../../lib/diff/index.js';
import { promptChoice, promptConfirm, promptSelect, type PromptOption } from '../../../lib/prompts.js';
import {
  errorToDisplay,
  print,
  printDim,
  printError,
  printStatus,
  withSpinner,
} from '../../../lib/ui/index.js';
import { COMPLETED_RETURN, runFlow, type FlowResult, type ScreenContext } from './flow.js';

type DiffAction = 'select' | 'all' | 'apply' | 'export' | 'refresh' | 'back';

export function createDiffSession(ctx: ScreenContext): DiffSession {
  return new DiffSession(ctx.adapter, {
    exportDir: ctx.config.exportDir,
    patchPrefix: ctx.config.patchPrefix,
  });
}

export function renderSession(session: DiffSession): void {
  const target = session.target$.value;
  printDim(target ? `Showing: ${target}` : 'Showing: all files');
  print('');

  const error = session.error$.value;
  if (session.status$.value === 'error' && error) {
    printError(errorToDisplay(error, 'chezmoi reported an error'));
    print('');
  }

  const text = session.text$.value;
  print(renderDiff(text));
  if (!isEmptyDiff(text)) {
    print('');
    print(formatSummary(session.summary$.value));
  }
}

/**
 * Actions available for the current session state
 */
export function diffActions(session: DiffSession): PromptOption<DiffAction>[] {
  const options: PromptOption<DiffAction>[] = [];
  const { files } = session.summary$.value;

  if (files.length > 0) {
    options.push({ label: 'Select file', description: 'Show the diff of one file', value: 'select' });
  }
  if (session.target$.value !== null) {
    options.push({ label: 'Show all files', value: 'all' });
  }
  if (session.canApply$.value) {
    options.push({ label: 'Apply', description: 'Apply all pending changes', value: 'apply' });
  }
  options.push(
    { label: 'Export', description: 'Save the diff as a .patch file', value: 'export' },
    { label: 'Refresh', value: 'refresh' },
    { label: '← Back', value: 'back' }
  );
  return options;
}

export async function browseDiff(ctx: ScreenContext, target: string | null = null): Promise<FlowResult> {
  return runFlow('Diff', async () => {
    const session = createDiffSession(ctx);
    await withSpinner('Loading diff...', () => session.load(target));

    while (true) {
      renderSession(session);

      const action = await promptChoice('What would you like to do?', diffActions(session));

      switch (action) {
        case 'back':
          return COMPLETED_RETURN;

        case 'select': {
          const file = await selectChangedFile(session);
          if (file) {
            await withSpinner(`Loading diff for ${file}...`, () => session.selectFile(file));
          }
          break;
        }

        case 'all':
          await withSpinner('Loading diff...', () => session.showAll());
          break;

        case 'refresh':
          await withSpinner('Refreshing...', () => session.refresh());
          break;

        case 'apply':
          await applyChanges(session);
          break;

        case 'export': {
          const result = session.exportPatch();
          if (result.ok) {
            printStatus('success', `Diff exported to ${result.path}`);
          } else {
            printError(errorToDisplay(result.error, 'Export failed'));
          }
          break;
        }
      }
    }
  });
}

async function selectChangedFile(session: DiffSession): Promise<string | null> {
  const options: PromptOption<string>[] = [
    ...session.summary$.value.files.map((file) => ({ label: file, value: file })),
    { label: '← Back', value: '' },
  ];
  const file = await promptSelect('Select a file', options);
  return file || null;
}

async function applyChanges(session: DiffSession): Promise<void> {
  if (session.target$.value !== null) {
    printDim('Apply updates every managed file, not only the one shown.');
  }
  const confirmed = await promptConfirm('Apply all pending changes?');
  if (!confirmed) {
    return;
  }

  const result = await withSpinner('Applying changes...', () => session.apply());
  switch (result.kind) {
    case 'nothing-to-apply':
      printStatus('info', 'Nothing to apply');
      break;
    case 'applied':
      printStatus('success', 'Changes applied');
      if (result.output.trim()) {
        printDim(result.output.trimEnd());
      }
      break;
    case 'failed':
      // renderSession shows the error with the pre-apply diff
      break;
  }
}
