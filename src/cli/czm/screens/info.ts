/**
 * Read-only screens: template data, doctor and verify, plus update
 */

import { buildUpdateArgs } from '../../../lib/chezmoi/index.js';
import { dim } from '../../../lib/colors.js';
import { formatDataTree, formatDoctor, parseDoctor, summarizeDoctor } from '../../../lib/format/index.js';
import { pressEnterToContinue, promptConfirm } from '../../../lib/prompts.js';
import { print, printLines, printStatus, withSpinner } from '../../../lib/ui/index.js';
import { CANCELLED, COMPLETED_RETURN, runFlow, type FlowResult, type ScreenContext } from './flow.js';

export async function showTemplateData(ctx: ScreenContext): Promise<FlowResult> {
  return runFlow('Template Data', async () => {
    const data = await withSpinner('Loading template data...', () => ctx.adapter.getTemplateData());
    printLines(formatDataTree(data));
    await pressEnterToContinue();
    return COMPLETED_RETURN;
  });
}

export async function showDoctor(ctx: ScreenContext): Promise<FlowResult> {
  return runFlow('Doctor', async () => {
    const text = await withSpinner('Running chezmoi doctor...', () => ctx.adapter.runDiagnostics());
    printLines(formatDoctor(text));

    const counts = summarizeDoctor(parseDoctor(text));
    if (counts.error > 0) {
      printStatus('error', `${counts.error} check(s) failed`);
    } else if (counts.warning > 0) {
      printStatus('warning', `${counts.warning} warning(s)`);
    } else if (text.trim()) {
      printStatus('success', 'All checks passed');
    }

    await pressEnterToContinue();
    return COMPLETED_RETURN;
  });
}

export async function showVerify(ctx: ScreenContext): Promise<FlowResult> {
  return runFlow('Verify', async () => {
    const result = await withSpinner('Verifying target state...', () => ctx.adapter.verify());
    if (result.ok) {
      printStatus('success', 'Destination matches the target state');
    } else {
      printStatus('warning', 'Destination differs from the target state');
      if (result.output) {
        print(dim(result.output));
      }
      print(dim('  Run the diff screen to see what would change.'));
    }
    await pressEnterToContinue();
    return COMPLETED_RETURN;
  });
}

export async function runUpdate(ctx: ScreenContext): Promise<FlowResult> {
  return runFlow('Update', async () => {
    const apply = await promptConfirm('Apply changes after pulling?', true);
    const confirmed = await promptConfirm(
      `Run ${ctx.adapter.describe(buildUpdateArgs(apply))}?`,
      true
    );
    if (!confirmed) {
      return CANCELLED;
    }

    const output = await withSpinner('Updating from source repository...', () =>
      ctx.adapter.update(apply)
    );
    if (output.trim()) {
      print(output.trimEnd());
    }
    printStatus('info', apply ? 'Update finished' : 'Source state pulled without applying');
    await pressEnterToContinue();
    return COMPLETED_RETURN;
  });
}
