/**
 * Wiring shared by the reconciliation commands
 *
 * Builds the concrete drivers from the resolved settings and maps a run
 * report onto a CommandResult.
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { RuntimeSettings } from '../config/settings.js';
import { loadFleet } from '../registry/index.js';
import { FleetStateStore } from '../state/index.js';
import { TerraformProvisionDriver } from '../drivers/provision/index.js';
import { AnsibleConfigDriver } from '../drivers/configure/index.js';
import { ConnectivityProbe, SshManagementChannel } from '../probe/index.js';
import {
  Orchestrator,
  createConfirmer,
  type OrchestratorDeps,
  type RunOptions,
  type RunReport,
} from '../orchestrator/index.js';
import type { Logger } from '../utils/logger.js';
import { printReport, printResult, verbose } from '../utils/output.js';

/**
 * Replacements for the concrete drivers, used by tests and embedders
 */
export type RuntimeOverrides = Partial<OrchestratorDeps>;

export function createProvisionDriver(
  settings: RuntimeSettings,
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env
): TerraformProvisionDriver {
  return new TerraformProvisionDriver({
    workingDir: settings.terraform.workingDir,
    outputName: settings.terraform.outputName,
    instanceAddress: settings.terraform.instanceAddress,
    registrationAddress: settings.terraform.registrationAddress,
    env,
    logger,
  });
}

/**
 * Assemble the orchestrator's collaborators from settings
 */
export function createOrchestratorDeps(
  settings: RuntimeSettings,
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env
): OrchestratorDeps {
  const credential = { user: settings.sshUser, keyPath: settings.sshKeyPath };

  return {
    loadDesired: () => loadFleet(settings.fleetFile, settings.fleet, { logger }),
    store: new FleetStateStore(settings.stateDir, settings.fleet),
    provision: createProvisionDriver(settings, logger, env),
    probe: new ConnectivityProbe(new SshManagementChannel(), credential, settings.probe, { logger }),
    configure: new AnsibleConfigDriver({
      ansibleDir: settings.ansibleDir,
      sshUser: settings.sshUser,
      sshKeyPath: settings.sshKeyPath,
      env,
      logger,
    }),
    confirmer: createConfirmer({ yes: settings.yes, interactive: settings.interactive }),
    logger,
  };
}

function outcomeMessage(report: RunReport): string {
  const fleet = report.fleet ? `fleet "${report.fleet}"` : 'fleet';
  switch (report.outcome) {
    case 'success':
      return `${report.mode} completed for ${fleet}`;
    case 'no-changes':
      return report.mode === 'deploy' || report.mode === 'apply'
        ? `${fleet} is already in sync`
        : `No nodes recorded for ${fleet}`;
    case 'cancelled':
      return `${report.mode} cancelled; nothing was changed`;
    case 'failed':
      return `${report.mode} failed for ${fleet}`;
  }
}

/**
 * Convert a run report to a command result
 */
export function toCommandResult(report: RunReport): CommandResult<RunReport> {
  const result: CommandResult<RunReport> = {
    success: report.outcome === 'success' || report.outcome === 'no-changes',
    message: outcomeMessage(report),
    data: report,
  };
  if (report.error) {
    result.errors = [report.error.message];
  }
  return result;
}

/**
 * Run one pass for a command and report it
 */
export async function runPass(
  ctx: CommandContext,
  options: RunOptions,
  overrides: RuntimeOverrides = {}
): Promise<CommandResult<RunReport>> {
  const { settings, logger } = ctx;

  verbose(`Fleet file: ${settings.fleetFile} (${settings.sources.fleetFile ?? 'default'})`, settings.verbose);
  verbose(`State file: ${settings.statePath}`, settings.verbose);
  verbose(`Configure policy: ${settings.configurePolicy}`, settings.verbose);

  const deps = { ...createOrchestratorDeps(settings, logger, ctx.env), ...overrides };
  const report = await new Orchestrator(deps).run({
    autoApprove: settings.yes,
    policy: settings.configurePolicy,
    ...options,
  });

  const result = toCommandResult(report);
  if (ctx.outputFormat === 'human') {
    printReport(report);
    printResult(result, 'human');
  }
  return result;
}
