/**
 * destroy command - Tear down every recorded node of the fleet
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { RunReport } from '../orchestrator/orchestrator.js';
import { header, warn } from '../utils/output.js';
import { runPass, type RuntimeOverrides } from './runtime.js';

export async function destroyCommand(
  ctx: CommandContext,
  overrides?: RuntimeOverrides
): Promise<CommandResult<RunReport>> {
  if (ctx.outputFormat === 'human') {
    header(`Destroy ${ctx.settings.fleet}`);
    if (!ctx.settings.yes && !ctx.settings.interactive) {
      warn('No terminal to confirm on and --yes not given; nothing will be destroyed');
    }
  }
  return runPass(ctx, { mode: 'destroy' }, overrides);
}
