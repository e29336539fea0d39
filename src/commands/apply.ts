/**
 * apply command - Provision only; new nodes stay pending configuration
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { RunReport } from '../orchestrator/orchestrator.js';
import { header } from '../utils/output.js';
import { runPass, type RuntimeOverrides } from './runtime.js';

export async function applyCommand(
  ctx: CommandContext,
  overrides?: RuntimeOverrides
): Promise<CommandResult<RunReport>> {
  if (ctx.outputFormat === 'human') {
    header(`Apply ${ctx.settings.fleet}`);
  }
  return runPass(ctx, { mode: 'apply' }, overrides);
}
