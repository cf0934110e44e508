/**
 * Interactive main menu shown by a bare `czm`
 */

import { dim } from '../../lib/colors.js';
import { APP_NAME, INSTALL_URL } from '../../lib/constants.js';
import { isUserCancelledError } from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';
import { promptChoice, type PromptOption } from '../../lib/prompts.js';
import { print, printBanner, printDetail, printStatus } from '../../lib/ui/index.js';
import { addFile } from './screens/add.js';
import { browseDiff } from './screens/diff.js';
import type { FlowResult, ScreenContext } from './screens/flow.js';
import { runUpdate, showDoctor, showTemplateData, showVerify } from './screens/info.js';
import { showManagedFiles } from './screens/managed.js';
import { removeFile } from './screens/remove.js';
import { showStatus } from './screens/status.js';

type MainMenuAction =
  | 'status'
  | 'managed'
  | 'diff'
  | 'add'
  | 'remove'
  | 'data'
  | 'doctor'
  | 'verify'
  | 'update'
  | 'exit';

const mainMenuOptions: PromptOption<MainMenuAction>[] = [
  { label: 'Status', description: 'Files that differ from the target state', value: 'status' },
  { label: 'Managed files', description: 'Browse files chezmoi manages', value: 'managed' },
  { label: 'Diff', description: 'Review and apply pending changes', value: 'diff' },
  { label: 'Add file', description: 'Start managing a dotfile', value: 'add' },
  { label: 'Remove file', description: 'Stop managing a dotfile', value: 'remove' },
  { label: 'Template data', description: 'Variables available to templates', value: 'data' },
  { label: 'Doctor', description: 'Check the chezmoi installation', value: 'doctor' },
  { label: 'Verify', description: 'Check the destination matches the target state', value: 'verify' },
  { label: 'Update', description: 'Pull the source repository and apply', value: 'update' },
  { label: 'Exit', description: 'Return to shell', value: 'exit' },
];

const screens: Record<Exclude<MainMenuAction, 'exit'>, (ctx: ScreenContext) => Promise<FlowResult>> = {
  status: showStatus,
  managed: showManagedFiles,
  diff: (ctx) => browseDiff(ctx),
  add: addFile,
  remove: removeFile,
  data: showTemplateData,
  doctor: showDoctor,
  verify: showVerify,
  update: runUpdate,
};

/**
 * Banner plus quick status. Returns false when chezmoi is missing.
 */
export async function showWelcome(ctx: ScreenContext): Promise<boolean> {
  if (!(await ctx.adapter.checkInstalled())) {
    printBanner(APP_NAME, 'chezmoi was not found');
    printStatus('error', `${ctx.adapter.executable} is not installed or not in PATH`);
    print(dim(`  Install it from ${INSTALL_URL}`));
    return false;
  }

  const version = await ctx.adapter.getVersion();
  printBanner(APP_NAME, version);

  try {
    const [managed, sourceDir] = await Promise.all([
      ctx.adapter.listManaged(),
      ctx.adapter.getSourcePath(),
    ]);
    printDetail('Managed files', String(managed.length));
    printDetail('Source', sourceDir);
  } catch (error) {
    logger.debug('Quick status unavailable:', error);
    print(dim('  Quick status unavailable; run `chezmoi init` to set up a source directory.'));
  }
  return true;
}

/**
 * Display the interactive main menu
 */
export async function showMainMenu(ctx: ScreenContext): Promise<void> {
  if (!(await showWelcome(ctx))) {
    return;
  }

  // Loop to allow returning to menu after actions
  while (true) {
    let choice: MainMenuAction;
    try {
      choice = await promptChoice('What would you like to do?', mainMenuOptions);
    } catch (error) {
      if (isUserCancelledError(error)) {
        return;
      }
      throw error;
    }

    if (choice === 'exit') {
      return;
    }

    const result = await screens[choice](ctx);
    if (!result.returnToMenu) {
      return;
    }
  }
}
