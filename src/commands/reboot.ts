/**
 * reboot command - Run the reboot playbook against every recorded node
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { RunReport } from '../orchestrator/orchestrator.js';
import { header } from '../utils/output.js';
import { runPass, type RuntimeOverrides } from './runtime.js';

export async function rebootCommand(
  ctx: CommandContext,
  overrides?: RuntimeOverrides
): Promise<CommandResult<RunReport>> {
  if (ctx.outputFormat === 'human') {
    header(`Reboot ${ctx.settings.fleet}`);
  }
  return runPass(ctx, { mode: 'reboot' }, overrides);
}
