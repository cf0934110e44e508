import { formatStatus } from '../../../lib/format/index.js';
import { pressEnterToContinue } from '../../../lib/prompts.js';
import { printLines, withSpinner } from '../../../lib/ui/index.js';
import { COMPLETED_RETURN, runFlow, type FlowResult, type ScreenContext } from './flow.js';

export async function showStatus(ctx: ScreenContext): Promise<FlowResult> {
  return runFlow('Status', async () => {
    const text = await withSpinner('Checking status...', () => ctx.adapter.getStatus());
    printLines(formatStatus(text));
    await pressEnterToContinue();
    return COMPLETED_RETURN;
  });
}
