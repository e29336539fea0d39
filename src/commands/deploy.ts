/**
 * deploy command - Provision, probe and configure until the fleet matches its definition
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { RunReport } from '../orchestrator/orchestrator.js';
import { header } from '../utils/output.js';
import { runPass, type RuntimeOverrides } from './runtime.js';

export interface DeployOptions {
  /** Configure every node, not only new and changed ones */
  configureAll?: boolean;
}

/**
 * Execute the deploy command
 */
export async function deployCommand(
  ctx: CommandContext,
  options: DeployOptions = {},
  overrides?: RuntimeOverrides
): Promise<CommandResult<RunReport>> {
  if (ctx.outputFormat === 'human') {
    header(`Deploy ${ctx.settings.fleet}`);
  }
  return runPass(ctx, { mode: 'deploy', configureAll: options.configureAll ?? false }, overrides);
}
